export { retryCall } from "./retry.js";
export { resolveRetryPolicy } from "./policy.js";
export { scaleDelay, backoffSequence } from "./scale.js";
export { RetryCallBuilder } from "./builder.js";
export { createLoggingNotify, createEmitterNotify, combineNotify } from "./notify.js";
export type {
  AttemptBudget,
  AttemptContext,
  FailureHook,
  FatalErrorPredicate,
  ResolvedRetryPolicy,
  RetryOperation,
  RetryOptions,
  StopSignal,
} from "./types.js";

// Retry
export {
  retryCall,
  resolveRetryPolicy,
  scaleDelay,
  backoffSequence,
  RetryCallBuilder,
  createLoggingNotify,
  createEmitterNotify,
  combineNotify,
} from "./retry/index.js";
export type {
  AttemptBudget,
  AttemptContext,
  FailureHook,
  FatalErrorPredicate,
  ResolvedRetryPolicy,
  RetryOperation,
  RetryOptions,
  StopSignal,
} from "./retry/index.js";

// Clock
export { WallClock } from "./clock/index.js";
export type { Clock } from "./clock/index.js";

// Shared
export {
  RetryError,
  RetryErrorCode,
  findRetryError,
  isAttemptsExceeded,
  isRetryStopped,
  isInvalidConfig,
  toError,
} from "./errors.js";
export { RetryEventEmitter, RetryEvent } from "./events.js";
export type { RetryEventMap } from "./events.js";
export type { LogLevel, Logger, Result } from "./types.js";
export { UNLIMITED_ATTEMPTS, DEFAULT_BACKOFF_FACTOR } from "./constants.js";
export { createDefaultLogger } from "./logger.js";

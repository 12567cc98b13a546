import type { Clock } from "../clock/types.js";
import type { UNLIMITED_ATTEMPTS } from "../constants.js";

/** A positive attempt count, or `UNLIMITED_ATTEMPTS` */
export type AttemptBudget = number | typeof UNLIMITED_ATTEMPTS;

/** Polled between attempts. `AbortSignal` satisfies this. */
export interface StopSignal {
  readonly aborted: boolean;
}

export interface AttemptContext {
  /** 1-based attempt number */
  attempt: number;
  lastError?: Error | undefined;
}

export type RetryOperation<T> = (context: AttemptContext) => T | Promise<T>;

/** Return true to stop immediately and rethrow the error as-is */
export type FatalErrorPredicate = (error: Error) => boolean;

/** Called after every failed, non-fatal attempt */
export type FailureHook = (error: Error, attempt: number) => void | Promise<void>;

export interface RetryOptions<T> {
  /** The operation to invoke (required) */
  operation?: RetryOperation<T> | undefined;
  /** Maximum number of invocations, or `UNLIMITED_ATTEMPTS` (required) */
  attempts?: AttemptBudget | undefined;
  /** Delay in ms before the second attempt (required, may be 0) */
  delayMs?: number | undefined;
  /** Multiplier applied to the delay after every failure, >= 1 (default: 1) */
  backoffFactor?: number | undefined;
  /** Delay ceiling in ms. 0 or unset means no ceiling */
  maxDelayMs?: number | undefined;
  isFatalError?: FatalErrorPredicate | undefined;
  onFailure?: FailureHook | undefined;
  stop?: StopSignal | undefined;
  /** Time source (default: WallClock) */
  clock?: Clock | undefined;
}

/** Validated, defaulted and frozen form of RetryOptions for a single session */
export interface ResolvedRetryPolicy<T> {
  readonly operation: RetryOperation<T>;
  readonly attempts: AttemptBudget;
  readonly delayMs: number;
  readonly backoffFactor: number;
  readonly maxDelayMs: number;
  readonly isFatalError?: FatalErrorPredicate | undefined;
  readonly onFailure?: FailureHook | undefined;
  readonly stop?: StopSignal | undefined;
  readonly clock: Clock;
}

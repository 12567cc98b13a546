import { WallClock } from "../clock/wall-clock.js";
import { DEFAULT_BACKOFF_FACTOR, UNLIMITED_ATTEMPTS } from "../constants.js";
import { RetryError, RetryErrorCode } from "../errors.js";
import type { AttemptBudget, ResolvedRetryPolicy, RetryOptions } from "./types.js";

function invalid(field: string, message: string): RetryError {
  return new RetryError(RetryErrorCode.INVALID_CONFIG, message, { context: { field } });
}

function isValidDuration(ms: number): boolean {
  return Number.isFinite(ms) && ms >= 0;
}

function resolveAttempts(attempts: AttemptBudget | undefined): AttemptBudget {
  if (attempts === undefined || attempts === 0) {
    throw invalid("attempts", "missing attempt budget");
  }
  if (attempts !== UNLIMITED_ATTEMPTS && !(Number.isInteger(attempts) && attempts > 0)) {
    throw invalid("attempts", `invalid attempt count of ${attempts}`);
  }
  return attempts;
}

/**
 * Validate `options` and fill in defaults. Checks run in a fixed order and the first failure
 * is thrown as an INVALID_CONFIG RetryError. `options` itself is left untouched.
 */
export function resolveRetryPolicy<T>(options: RetryOptions<T>): ResolvedRetryPolicy<T> {
  const { operation, delayMs, backoffFactor, maxDelayMs } = options;

  if (typeof operation !== "function") {
    throw invalid("operation", "missing operation");
  }

  const attempts = resolveAttempts(options.attempts);

  if (delayMs === undefined) {
    throw invalid("delayMs", "missing delay");
  }
  if (!isValidDuration(delayMs)) {
    throw invalid("delayMs", `invalid delay of ${delayMs}`);
  }

  if (backoffFactor !== undefined && !(Number.isFinite(backoffFactor) && backoffFactor >= 1)) {
    throw invalid("backoffFactor", `invalid backoff factor of ${backoffFactor}`);
  }

  if (maxDelayMs !== undefined && !isValidDuration(maxDelayMs)) {
    throw invalid("maxDelayMs", `invalid max delay of ${maxDelayMs}`);
  }

  return Object.freeze({
    operation,
    attempts,
    delayMs,
    backoffFactor: backoffFactor ?? DEFAULT_BACKOFF_FACTOR,
    maxDelayMs: maxDelayMs ?? 0,
    isFatalError: options.isFatalError,
    onFailure: options.onFailure,
    stop: options.stop,
    clock: options.clock ?? WallClock,
  });
}

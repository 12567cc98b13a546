import { UNLIMITED_ATTEMPTS } from "../constants.js";
import { RetryError, RetryErrorCode, toError } from "../errors.js";
import type { Result } from "../types.js";
import { resolveRetryPolicy } from "./policy.js";
import { scaleDelay } from "./scale.js";
import type { AttemptContext, ResolvedRetryPolicy, RetryOptions } from "./types.js";

async function invoke<T>(policy: ResolvedRetryPolicy<T>, context: AttemptContext): Promise<Result<T>> {
  try {
    return { ok: true, value: await policy.operation(context) };
  } catch (err) {
    return { ok: false, error: toError(err) };
  }
}

/**
 * Call `options.operation` until it succeeds, throws an error `isFatalError` accepts,
 * runs out of attempts, or `options.stop` is aborted.
 *
 * Resolves with the operation's value on success. Rejects with:
 * - an INVALID_CONFIG RetryError before any attempt if the options don't validate
 * - the operation's own error, unwrapped, if it is fatal
 * - an ATTEMPTS_EXCEEDED RetryError once the budget is spent
 * - a RETRY_STOPPED RetryError if the stop signal is seen between attempts
 *
 * The delay is only awaited between attempts. When the budget runs out on the same attempt
 * the stop signal is raised, ATTEMPTS_EXCEEDED wins. The stop signal never prevents the
 * first attempt and never interrupts one in flight.
 */
export async function retryCall<T>(options: RetryOptions<T>): Promise<T> {
  const policy = resolveRetryPolicy(options);
  let delayMs = policy.delayMs;
  let lastError: Error | undefined;

  for (let attempt = 1; ; attempt++) {
    const result = await invoke(policy, { attempt, lastError });
    if (result.ok) {
      return result.value;
    }

    const { error } = result;
    lastError = error;

    if (policy.isFatalError?.(error)) {
      throw error;
    }

    await policy.onFailure?.(error, attempt);

    if (policy.attempts !== UNLIMITED_ATTEMPTS && attempt >= policy.attempts) {
      throw new RetryError(RetryErrorCode.ATTEMPTS_EXCEEDED, `attempt count exceeded: ${error.message}`, {
        cause: error,
        context: { attempts: attempt },
      });
    }

    if (policy.stop?.aborted) {
      throw new RetryError(RetryErrorCode.RETRY_STOPPED, `retry stopped: ${error.message}`, {
        cause: error,
        context: { attempts: attempt },
      });
    }

    await policy.clock.after(delayMs);
    delayMs = scaleDelay(delayMs, policy.maxDelayMs, policy.backoffFactor);
  }
}

import type { Clock } from "../clock/types.js";
import { UNLIMITED_ATTEMPTS } from "../constants.js";
import { retryCall } from "./retry.js";
import type { FailureHook, FatalErrorPredicate, RetryOperation, RetryOptions, StopSignal } from "./types.js";

/**
 * Fluent builder for a retry session.
 *
 * Usage:
 *   const value = await RetryCallBuilder.create<Response>()
 *     .operation(() => fetchStatus())
 *     .attempts(5)
 *     .delay(500)
 *     .backoff(2)
 *     .maxDelay(10_000)
 *     .stopOn(controller.signal)
 *     .run();
 */
export class RetryCallBuilder<T> {
  private config: RetryOptions<T> = {};

  static create<T>(): RetryCallBuilder<T> {
    return new RetryCallBuilder<T>();
  }

  /** Set the operation to retry */
  operation(fn: RetryOperation<T>): this {
    this.config.operation = fn;
    return this;
  }

  /** Cap the number of invocations */
  attempts(count: number): this {
    this.config.attempts = count;
    return this;
  }

  /** Retry until success, a fatal error, or the stop signal */
  unlimitedAttempts(): this {
    this.config.attempts = UNLIMITED_ATTEMPTS;
    return this;
  }

  /** Delay in ms before the second attempt */
  delay(ms: number): this {
    this.config.delayMs = ms;
    return this;
  }

  /** Multiply the delay by `factor` after every failure */
  backoff(factor: number): this {
    this.config.backoffFactor = factor;
    return this;
  }

  /** Cap the delay at `ms` */
  maxDelay(ms: number): this {
    this.config.maxDelayMs = ms;
    return this;
  }

  /** Stop without retrying when `predicate` returns true */
  fatalWhen(predicate: FatalErrorPredicate): this {
    this.config.isFatalError = predicate;
    return this;
  }

  /** Observe every failed attempt */
  onFailure(hook: FailureHook): this {
    this.config.onFailure = hook;
    return this;
  }

  /** Stop retrying once `signal` is aborted */
  stopOn(signal: StopSignal): this {
    this.config.stop = signal;
    return this;
  }

  /** Use a custom time source */
  clock(clock: Clock): this {
    this.config.clock = clock;
    return this;
  }

  /** Snapshot of the options set so far */
  options(): RetryOptions<T> {
    return { ...this.config };
  }

  /** Run one retry session with the current options */
  run(): Promise<T> {
    return retryCall(this.options());
  }
}

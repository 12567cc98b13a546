/** Error codes for every classified retry outcome */
export enum RetryErrorCode {
  ATTEMPTS_EXCEEDED = "ATTEMPTS_EXCEEDED",
  RETRY_STOPPED = "RETRY_STOPPED",
  INVALID_CONFIG = "INVALID_CONFIG",
}

/** Structured error with a machine-readable code and optional cause/context */
export class RetryError extends Error {
  readonly code: RetryErrorCode;
  override readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    code: RetryErrorCode,
    message: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined },
  ) {
    super(message);
    this.name = "RetryError";
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
  }

  /** The last error returned by the operation, for terminal (non-config) errors */
  get lastError(): Error | undefined {
    return this.code === RetryErrorCode.INVALID_CONFIG ? undefined : this.cause;
  }
}

const MAX_CAUSE_DEPTH = 32;

/** Walk `err` and its `cause` chain, returning the first RetryError carrying `code` */
export function findRetryError(err: unknown, code: RetryErrorCode): RetryError | undefined {
  const seen = new Set<unknown>();
  let current: unknown = err;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current !== undefined && current !== null; depth++) {
    if (seen.has(current)) return undefined;
    seen.add(current);

    if (current instanceof RetryError && current.code === code) return current;
    if (!(current instanceof Error)) return undefined;
    current = current.cause;
  }
  return undefined;
}

/** True if `err` is, or wraps, the error returned when the attempt budget ran out */
export function isAttemptsExceeded(err: unknown): boolean {
  return findRetryError(err, RetryErrorCode.ATTEMPTS_EXCEEDED) !== undefined;
}

/** True if `err` is, or wraps, the error returned when the stop signal ended the loop */
export function isRetryStopped(err: unknown): boolean {
  return findRetryError(err, RetryErrorCode.RETRY_STOPPED) !== undefined;
}

/** True if `err` is, or wraps, a configuration validation failure */
export function isInvalidConfig(err: unknown): boolean {
  return findRetryError(err, RetryErrorCode.INVALID_CONFIG) !== undefined;
}

/** Normalize any thrown value to an Error. Error instances are returned as-is. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** Attempt budget sentinel: retry until success, a fatal error, or the stop signal */
export const UNLIMITED_ATTEMPTS = "unlimited" as const;

/** Linear backoff: every inter-attempt delay equals the base delay */
export const DEFAULT_BACKOFF_FACTOR = 1;

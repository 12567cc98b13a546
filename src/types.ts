export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured logger accepted by `createLoggingNotify` */
export type Logger = Record<LogLevel, (msg: string, data?: Record<string, unknown>) => void>;

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

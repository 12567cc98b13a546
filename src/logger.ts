import type { LogLevel, Logger } from "./types.js";

/**
 * Console-based logger. Messages are prefixed `[backoff-call]`, or `[backoff-call:<scope>]`
 * when a scope is given, so several retry sessions can be told apart. Pass your own Logger to override.
 */
export function createDefaultLogger(scope?: string): Logger {
  const prefix = scope ? `[backoff-call:${scope}]` : "[backoff-call]";

  const write =
    (level: LogLevel) =>
    (msg: string, data?: Record<string, unknown>): void => {
      if (data === undefined) {
        console[level](`${prefix} ${msg}`);
      } else {
        console[level](`${prefix} ${msg}`, data);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

import { RetryEvent, type RetryEventEmitter } from "../events.js";
import { createDefaultLogger } from "../logger.js";
import type { Logger } from "../types.js";
import type { FailureHook } from "./types.js";

/** Failure hook that logs every failed attempt at `warn` level */
export function createLoggingNotify(logger: Logger = createDefaultLogger()): FailureHook {
  return (error, attempt) => {
    logger.warn("Attempt failed", { attempt, error: error.message });
  };
}

/** Failure hook that emits `RetryEvent.ATTEMPT_FAILED` on `emitter` */
export function createEmitterNotify(emitter: RetryEventEmitter): FailureHook {
  return (error, attempt) => {
    emitter.emit(RetryEvent.ATTEMPT_FAILED, { error, attempt });
  };
}

/** Run several failure hooks in order. `undefined` entries are skipped. */
export function combineNotify(...hooks: Array<FailureHook | undefined>): FailureHook {
  const active = hooks.filter((hook): hook is FailureHook => hook !== undefined);
  return async (error, attempt) => {
    for (const hook of active) {
      await hook(error, attempt);
    }
  };
}

import { EventEmitter } from "node:events";

/** Events a retry session can report through `createEmitterNotify` */
export enum RetryEvent {
  ATTEMPT_FAILED = "attempt_failed",
}

export interface RetryEventMap {
  [RetryEvent.ATTEMPT_FAILED]: { error: Error; attempt: number };
}

/** Type-safe event emitter for retry events. Subscribe via `.on(RetryEvent.*, handler)`. */
export class RetryEventEmitter extends EventEmitter {
  override emit<K extends RetryEvent>(event: K, data: RetryEventMap[K]): boolean {
    return super.emit(event, data);
  }

  override on<K extends RetryEvent>(event: K, listener: (data: RetryEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  override once<K extends RetryEvent>(event: K, listener: (data: RetryEventMap[K]) => void): this {
    return super.once(event, listener);
  }
}

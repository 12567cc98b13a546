import type { Clock } from "./types.js";

/** Largest delay `setTimeout` honours; longer ones fire after 1 ms */
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

/** Real time: `Date.now()` and `setTimeout`, chained for delays past the timer limit */
export const WallClock: Clock = Object.freeze({
  now(): number {
    return Date.now();
  },
  after(ms: number): Promise<void> {
    return new Promise((resolve) => {
      let remaining = ms;
      const wait = (): void => {
        if (!(remaining > MAX_TIMEOUT_MS)) {
          setTimeout(resolve, remaining);
          return;
        }
        remaining -= MAX_TIMEOUT_MS;
        setTimeout(wait, MAX_TIMEOUT_MS);
      };
      wait();
    });
  },
});

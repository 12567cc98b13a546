/**
 * Scale `currentMs` by `factor`, truncated to a whole millisecond and capped at `maxDelayMs`.
 *
 * The sign of `factor` is ignored, so -2 doubles the delay. Factors below 1 shrink it and 0
 * yields 0; the retry loop never passes those since validation rejects them. A `maxDelayMs`
 * of 0 means no ceiling.
 */
export function scaleDelay(currentMs: number, maxDelayMs: number, factor: number): number {
  const scaled = Math.trunc(currentMs * Math.abs(factor));
  if (maxDelayMs > 0 && scaled > maxDelayMs) {
    return maxDelayMs;
  }
  return scaled;
}

/**
 * The first `count` inter-attempt delays a retry session would wait for.
 * The first entry is always `baseMs`; later ones go through `scaleDelay`.
 */
export function backoffSequence(baseMs: number, factor: number, count: number, maxDelayMs = 0): number[] {
  const delays: number[] = [];
  let current = baseMs;
  for (let i = 0; i < count; i++) {
    delays.push(current);
    current = scaleDelay(current, maxDelayMs, factor);
  }
  return delays;
}

import { describe, expect, it } from "vitest";
import { backoffSequence, scaleDelay } from "../../src/retry/scale.js";
import { ONE_MINUTE } from "../helpers/recording-clock.js";

describe("scaleDelay", () => {
  it.each([
    { current: ONE_MINUTE, max: 0, factor: 1, expected: ONE_MINUTE },
    { current: ONE_MINUTE, max: 0, factor: 2.5, expected: 2 * ONE_MINUTE + 30_000 },
    { current: ONE_MINUTE, max: 3 * ONE_MINUTE, factor: 10, expected: 3 * ONE_MINUTE },
    { current: ONE_MINUTE, max: 3 * ONE_MINUTE, factor: 2, expected: 2 * ONE_MINUTE },
    { current: ONE_MINUTE, max: 0, factor: 0.5, expected: 30_000 },
    { current: ONE_MINUTE, max: 0, factor: 0, expected: 0 },
    { current: ONE_MINUTE, max: 0, factor: -2, expected: 2 * ONE_MINUTE },
  ])("scales $current by $factor (max $max) to $expected", ({ current, max, factor, expected }) => {
    expect(scaleDelay(current, max, factor)).toBe(expected);
  });

  it("truncates to whole milliseconds", () => {
    expect(scaleDelay(3, 0, 1.5)).toBe(4);
    expect(scaleDelay(5, 0, 0.3)).toBe(1);
  });

  it("returns the ceiling exactly when it is reached", () => {
    expect(scaleDelay(5_000, 10_000, 2)).toBe(10_000);
  });
});

describe("backoffSequence", () => {
  it("holds the base delay with a factor of 1", () => {
    expect(backoffSequence(500, 1, 4)).toEqual([500, 500, 500, 500]);
  });

  it("grows geometrically without a ceiling", () => {
    expect(backoffSequence(ONE_MINUTE, 2, 4)).toEqual([ONE_MINUTE, 2 * ONE_MINUTE, 4 * ONE_MINUTE, 8 * ONE_MINUTE]);
  });

  it("stays at the ceiling once it is reached", () => {
    expect(backoffSequence(ONE_MINUTE, 2, 6, 10 * ONE_MINUTE)).toEqual([
      ONE_MINUTE,
      2 * ONE_MINUTE,
      4 * ONE_MINUTE,
      8 * ONE_MINUTE,
      10 * ONE_MINUTE,
      10 * ONE_MINUTE,
    ]);
  });

  it("returns an empty sequence for a zero count", () => {
    expect(backoffSequence(ONE_MINUTE, 2, 0)).toEqual([]);
  });
});

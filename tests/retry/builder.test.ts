import { describe, expect, it, vi } from "vitest";
import { UNLIMITED_ATTEMPTS } from "../../src/constants.js";
import { isAttemptsExceeded, isInvalidConfig, isRetryStopped } from "../../src/errors.js";
import { RetryCallBuilder } from "../../src/retry/builder.js";
import { ONE_MINUTE, RecordingClock } from "../helpers/recording-clock.js";

describe("RetryCallBuilder", () => {
  it("collects options fluently", () => {
    const clock = new RecordingClock();
    const operation = () => "ok";
    const isFatalError = () => false;
    const onFailure = () => {};
    const stop = { aborted: false };

    const options = RetryCallBuilder.create<string>()
      .operation(operation)
      .attempts(4)
      .delay(100)
      .backoff(2)
      .maxDelay(1_000)
      .fatalWhen(isFatalError)
      .onFailure(onFailure)
      .stopOn(stop)
      .clock(clock)
      .options();

    expect(options).toEqual({
      operation,
      attempts: 4,
      delayMs: 100,
      backoffFactor: 2,
      maxDelayMs: 1_000,
      isFatalError,
      onFailure,
      stop,
      clock,
    });
  });

  it("returns a fresh snapshot from options()", () => {
    const builder = RetryCallBuilder.create<string>().attempts(3);
    const first = builder.options();
    builder.attempts(5);

    expect(first.attempts).toBe(3);
    expect(builder.options().attempts).toBe(5);
  });

  it("sets the unlimited sentinel", () => {
    expect(RetryCallBuilder.create().unlimitedAttempts().options().attempts).toBe(UNLIMITED_ATTEMPTS);
  });

  it("runs a session", async () => {
    const clock = new RecordingClock();
    const fn = vi.fn().mockRejectedValueOnce(new Error("bah")).mockResolvedValueOnce("ok");

    const result = await RetryCallBuilder.create<string>()
      .operation(fn)
      .attempts(3)
      .delay(ONE_MINUTE)
      .clock(clock)
      .run();

    expect(result).toBe("ok");
    expect(clock.delays).toEqual([ONE_MINUTE]);
  });

  it("can run more than one session from the same builder", async () => {
    const clock = new RecordingClock();
    const builder = RetryCallBuilder.create<never>()
      .operation(() => Promise.reject(new Error("bah")))
      .attempts(3)
      .delay(10)
      .backoff(2)
      .clock(clock);

    await expect(builder.run()).rejects.toSatisfy(isAttemptsExceeded);
    await expect(builder.run()).rejects.toSatisfy(isAttemptsExceeded);
    expect(clock.delays).toEqual([10, 20, 10, 20]);
  });

  it("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(() => {
      controller.abort();
      throw new Error("bah");
    });

    await expect(
      RetryCallBuilder.create()
        .operation(fn)
        .unlimitedAttempts()
        .delay(10)
        .stopOn(controller.signal)
        .clock(new RecordingClock())
        .run(),
    ).rejects.toSatisfy(isRetryStopped);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rejects an incomplete configuration", async () => {
    await expect(RetryCallBuilder.create().attempts(3).delay(10).run()).rejects.toSatisfy(isInvalidConfig);
  });
});

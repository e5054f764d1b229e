import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { retryWithBackoff, TimeoutError, withTimeout } from "./retry.js";

describe("withTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the result when the operation finishes in time", async () => {
    await expect(withTimeout(async () => "done", 1000, "op")).resolves.toBe("done");
  });

  it("throws TimeoutError and aborts the signal when the deadline passes", async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<string>(() => {});
      },
      500,
      "provisioner.start",
    );
    const assertion = expect(pending).rejects.toThrow(new TimeoutError("provisioner.start", 500));
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    expect(seen?.aborted).toBe(true);
  });

  it("propagates the operation's own error", async () => {
    await expect(withTimeout(async () => Promise.reject(new Error("boom")), 1000, "op")).rejects.toThrow("boom");
  });
});

describe("retryWithBackoff", () => {
  const transient = new Error("transient");
  const noSleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    noSleep.mockClear();
  });

  it("retries transient failures with doubling delays", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient)
      .mockRejectedValueOnce(transient)
      .mockResolvedValue("ok");

    const result = await retryWithBackoff(fn, {
      attempts: 4,
      baseDelayMs: 100,
      shouldRetry: (err) => err === transient,
      sleep: noSleep,
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(noSleep.mock.calls.map((c) => c[0])).toEqual([100, 200]);
  });

  it("gives up after the configured attempts", async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(transient);
    await expect(
      retryWithBackoff(fn, { attempts: 3, baseDelayMs: 10, shouldRetry: () => true, sleep: noSleep }),
    ).rejects.toBe(transient);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry permanent failures", async () => {
    const permanent = new Error("permanent");
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(permanent);
    await expect(
      retryWithBackoff(fn, { attempts: 5, baseDelayMs: 10, shouldRetry: (err) => err === transient, sleep: noSleep }),
    ).rejects.toBe(permanent);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("caps the delay", async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(transient);
    await expect(
      retryWithBackoff(fn, { attempts: 4, baseDelayMs: 300, maxDelayMs: 500, shouldRetry: () => true, sleep: noSleep }),
    ).rejects.toBe(transient);
    expect(noSleep.mock.calls.map((c) => c[0])).toEqual([300, 500, 500]);
  });
});

import { describe, it, expect, vi } from "vitest";
import { computeBackoffDelay, retryWithBackoff } from "./retry";
import { ForbiddenError, RateLimitError, ServerError } from "./errors";

describe("computeBackoffDelay", () => {
  it("stays within [base*2^a, base*2^a*1.5] for every attempt", () => {
    for (let attempt = 0; attempt < 5; attempt++) {
      const floor = 1000 * Math.pow(2, attempt);
      expect(computeBackoffDelay(attempt, { random: () => 0 })).toBe(floor);
      expect(computeBackoffDelay(attempt, { random: () => 0.999999 })).toBeLessThanOrEqual(floor * 1.5);
      const sampled = computeBackoffDelay(attempt);
      expect(sampled).toBeGreaterThanOrEqual(floor);
      expect(sampled).toBeLessThanOrEqual(floor * 1.5);
    }
  });

  it("caps at maxWait", () => {
    expect(computeBackoffDelay(6, { random: () => 0 })).toBe(60_000);
    expect(computeBackoffDelay(10, { random: () => 0.5 })).toBe(60_000);
    expect(computeBackoffDelay(2, { maxWaitMs: 3_000, random: () => 0 })).toBe(3_000);
  });

  it("scales the jitter with the exponential term", () => {
    // random() = 0.5 -> jitter = 0.25 * 2000
    expect(computeBackoffDelay(1, { random: () => 0.5 })).toBe(2_500);
  });
});

describe("retryWithBackoff", () => {
  it("returns immediately when the first attempt succeeds", async () => {
    const sleepFn = vi.fn(async () => {});
    const result = await retryWithBackoff(async () => "ok", { sleepFn });
    expect(result).toEqual({ value: "ok", retryCount: 0, totalWaitMs: 0 });
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("retries rate limit errors and reports the waits", async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await retryWithBackoff(
      async () => {
        calls++;
        if (calls < 3) throw new RateLimitError();
        return 42;
      },
      { sleepFn: async (ms) => { delays.push(ms); }, random: () => 0 },
    );
    expect(result).toEqual({ value: 42, retryCount: 2, totalWaitMs: 3_000 });
    expect(delays).toEqual([1_000, 2_000]);
  });

  it("rethrows the original error after maxRetries", async () => {
    const original = new RateLimitError("quota");
    const sleepFn = vi.fn(async () => {});
    const fn = vi.fn(async () => {
      throw original;
    });

    await expect(
      retryWithBackoff(fn, { sleepFn, random: () => 0 }),
    ).rejects.toBe(original);
    expect(fn).toHaveBeenCalledTimes(6);
    expect(sleepFn).toHaveBeenCalledTimes(5);
    expect(original.retryStats).toEqual({ retryCount: 5, totalWaitMs: 31_000 });
  });

  it("does not retry other errors", async () => {
    const sleepFn = vi.fn(async () => {});
    const forbidden = new ForbiddenError("no access");
    await expect(
      retryWithBackoff(async () => { throw forbidden; }, { sleepFn }),
    ).rejects.toBe(forbidden);
    await expect(
      retryWithBackoff(async () => { throw new ServerError("boom", 503); }, { sleepFn }),
    ).rejects.toBeInstanceOf(ServerError);
    expect(sleepFn).not.toHaveBeenCalled();
  });
});

import { SourceError } from "@animanga/core";
import { describe, expect, test, vi } from "vitest";
import { type RetryClock, getRetryDelay, parseRetryAfter, withRetry } from "./retry";

function createClock(random = 0): RetryClock & { sleeps: number[] } {
  let now = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
    random: () => random,
  };
}

const fast = { maxAttempts: 3, baseDelayMs: 100, jitterMs: 50, budgetMs: 10_000 };

describe("getRetryDelay", () => {
  test("doubles the base delay per attempt and adds jitter", () => {
    expect(getRetryDelay(0, fast, () => 0)).toBe(100);
    expect(getRetryDelay(1, fast, () => 0)).toBe(200);
    expect(getRetryDelay(2, fast, () => 0.5)).toBe(425);
  });
});

describe("withRetry", () => {
  test("returns the first success without sleeping", async () => {
    const clock = createClock();
    const fn = vi.fn(async () => "ok");

    await expect(withRetry(fn, { source: "anilist", config: fast, clock })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  test("retries retryable failures until one succeeds", async () => {
    const clock = createClock();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new SourceError("UPSTREAM_5XX", "down", { source: "anilist" }))
      .mockResolvedValueOnce("recovered");

    await expect(withRetry(fn, { source: "anilist", config: fast, clock })).resolves.toBe(
      "recovered"
    );
    expect(fn).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([100]);
  });

  test("stops after maxAttempts and surfaces the last failure", async () => {
    const clock = createClock();
    const fn = vi.fn(async (attempt: number) => {
      throw new SourceError("UPSTREAM_5XX", `attempt ${attempt}`, { source: "jikan" });
    });

    await expect(withRetry(fn, { source: "jikan", config: fast, clock })).rejects.toMatchObject({
      code: "UPSTREAM_5XX",
      message: "attempt 2",
    });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  test("surfaces terminal failures immediately", async () => {
    const clock = createClock();
    const fn = vi.fn(async () => {
      throw new SourceError("UPSTREAM_4XX", "bad request", { source: "anilist" });
    });

    await expect(withRetry(fn, { source: "anilist", config: fast, clock })).rejects.toMatchObject({
      code: "UPSTREAM_4XX",
    });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test("classifies unknown errors as INTERNAL and does not retry them", async () => {
    const fn = vi.fn(async () => {
      throw new Error("oops");
    });

    await expect(
      withRetry(fn, { source: "anilist", config: fast, clock: createClock() })
    ).rejects.toMatchObject({ code: "INTERNAL", source: "anilist" });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test("gives up when the next backoff would exceed the budget", async () => {
    const clock = createClock();
    const fn = vi.fn(async () => {
      throw new SourceError("TIMEOUT", "slow", { source: "anilist" });
    });

    await expect(
      withRetry(fn, { source: "anilist", config: { ...fast, budgetMs: 250 }, clock })
    ).rejects.toMatchObject({ code: "TIMEOUT" });
    expect(fn).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([100]);
  });

  test("waits at least as long as Retry-After asks", async () => {
    const clock = createClock();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(
        new SourceError("UPSTREAM_429", "limited", { source: "jikan", retryAfterMs: 1500 })
      )
      .mockResolvedValueOnce("ok");

    await withRetry(fn, { source: "jikan", config: fast, clock });
    expect(clock.sleeps).toEqual([1500]);
  });

  test("turns an aborted backoff into CANCELLED", async () => {
    const controller = new AbortController();
    const clock: RetryClock = {
      now: () => 0,
      random: () => 0,
      sleep: async () => {
        controller.abort();
        throw new Error("aborted");
      },
    };
    const fn = vi.fn(async () => {
      throw new SourceError("UPSTREAM_5XX", "down", { source: "anilist" });
    });

    await expect(
      withRetry(fn, { source: "anilist", config: fast, clock, signal: controller.signal })
    ).rejects.toMatchObject({ code: "CANCELLED", source: "anilist" });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("parseRetryAfter", () => {
  test("reads delta seconds", () => {
    expect(parseRetryAfter("3")).toBe(3000);
  });

  test("returns 0 for missing or unreadable headers", () => {
    expect(parseRetryAfter(null)).toBe(0);
    expect(parseRetryAfter("soon")).toBe(0);
  });
});

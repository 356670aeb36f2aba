import { describe, expect, test } from "vitest";
import { getConfig } from "./config";

describe("getConfig", () => {
  test("falls back to defaults for an empty environment", () => {
    expect(getConfig({})).toEqual({
      name: "animanga-lookup",
      version: "0.1.0",
      maxPerPage: 25,
      timeoutSec: 15,
      recommendationsCap: 10,
      endpoints: {
        anilist: "https://graphql.anilist.co",
        jikan: "https://api.jikan.moe/v4",
      },
      retry: { maxAttempts: 3, baseDelayMs: 700, jitterMs: 400, budgetMs: 30000 },
    });
  });

  test("reads overrides from the environment", () => {
    const config = getConfig({
      ANIMANGA_MAX_PER_PAGE: "10",
      ANIMANGA_TIMEOUT_SEC: "5",
      ANIMANGA_RETRY_JITTER_MS: "0",
      JIKAN_URL: "http://localhost:8080/v4/",
    });

    expect(config.maxPerPage).toBe(10);
    expect(config.timeoutSec).toBe(5);
    expect(config.retry.jitterMs).toBe(0);
    expect(config.endpoints.jikan).toBe("http://localhost:8080/v4");
  });

  test("treats blank variables as unset", () => {
    expect(getConfig({ ANIMANGA_TIMEOUT_SEC: "  " }).timeoutSec).toBe(15);
  });

  test("rejects invalid values with the variable name", () => {
    expect(() => getConfig({ ANIMANGA_MAX_ATTEMPTS: "zero" })).toThrow(
      /Invalid configuration: ANIMANGA_MAX_ATTEMPTS/
    );
    expect(() => getConfig({ ANILIST_URL: "not a url" })).toThrow(/ANILIST_URL/);
  });
});

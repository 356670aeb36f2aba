import { SourceError } from "@animanga/core";
import { describe, expect, test, vi } from "vitest";
import { buildError, buildSuccess } from "./envelope";

describe("buildSuccess", () => {
  test("adds the schema version to the payload", () => {
    expect(buildSuccess({ ok: true })).toEqual({ schemaVersion: "1.0.0", ok: true });
  });
});

describe("buildError", () => {
  test("copies the classified failure", () => {
    const envelope = buildError(
      new SourceError("UPSTREAM_429", "jikan responded with HTTP 429", { source: "jikan" }),
      "anilist"
    );

    expect(envelope).toEqual({
      schemaVersion: "1.0.0",
      error: { code: "UPSTREAM_429", message: "jikan responded with HTTP 429", source: "jikan" },
    });
  });

  test("hides unclassified failures behind INTERNAL", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const envelope = buildError(new RangeError("index 7 out of bounds"), "local");

    expect(envelope).toEqual({
      schemaVersion: "1.0.0",
      error: { code: "INTERNAL", message: "Unexpected internal failure", source: "local" },
    });
    expect(JSON.stringify(envelope)).not.toContain("RangeError");
    spy.mockRestore();
  });
});

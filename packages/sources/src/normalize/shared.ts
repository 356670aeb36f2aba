import {
  type JsonRecord,
  type MediaKind,
  type SourceName,
  SourceError,
  isRecord,
} from "@animanga/core";

export function requireItem(raw: unknown, source: SourceName): JsonRecord {
  if (!isRecord(raw)) {
    throw new SourceError("NORMALIZE_ERROR", `${source} item is not an object`, { source });
  }
  return raw;
}

export function requireId(id: number | null, source: SourceName): number {
  if (id === null || id <= 0) {
    throw new SourceError("NORMALIZE_ERROR", `${source} item has no usable id`, { source });
  }
  return id;
}

// Only the count that matches the kind survives; the other is always null.
export function countsFor(
  kind: MediaKind,
  episodes: number | null,
  chapters: number | null
): { episodes: number | null; chapters: number | null } {
  return kind === "ANIME"
    ? { episodes, chapters: null }
    : { episodes: null, chapters };
}

export function clampScore(value: number | null): number | null {
  if (value === null || value < 0 || value > 100) return null;
  return Math.round(value);
}

// 0–10 decimal scale onto the 0–100 integer scale.
export function rescaleTenPoint(value: number | null): number | null {
  if (value === null || value < 0 || value > 10) return null;
  return Math.round(value * 10);
}

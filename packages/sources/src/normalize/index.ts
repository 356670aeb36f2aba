import type {
  AiringStatus,
  CalendarEntry,
  MediaDetails,
  MediaHit,
  MediaKind,
  SourceName,
} from "@animanga/core";
import { anilistAiring, anilistCalendar, anilistDetails, anilistHit } from "./anilist";
import { jikanDetails, jikanHit } from "./jikan";

export interface NormalizeOptions {
  recommendationsCap: number;
}

export function normalizeHit(kind: MediaKind, raw: unknown, source: SourceName): MediaHit {
  return source === "anilist" ? anilistHit(kind, raw) : jikanHit(kind, raw);
}

export function normalizeHits(kind: MediaKind, raw: unknown[], source: SourceName): MediaHit[] {
  return raw.map((item) => normalizeHit(kind, item, source));
}

export function normalizeDetails(
  kind: MediaKind,
  raw: unknown,
  source: SourceName,
  options: NormalizeOptions
): MediaDetails {
  return source === "anilist" ? anilistDetails(kind, raw, options) : jikanDetails(kind, raw);
}

export function normalizeAiring(raw: unknown): AiringStatus {
  return anilistAiring(raw);
}

export function normalizeCalendar(raw: unknown[]): CalendarEntry[] {
  return anilistCalendar(raw);
}

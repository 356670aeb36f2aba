import {
  type AiringEpisode,
  type AiringStatus,
  type CalendarEntry,
  type ExternalLink,
  type JsonRecord,
  type MediaDetails,
  type MediaHit,
  type MediaKind,
  type MediaStatus,
  type MediaTitles,
  isRecord,
  readArray,
  readInt,
  readNames,
  readNumber,
  readRecord,
  readString,
  stripMarkup,
} from "@animanga/core";
import { clampScore, countsFor, requireId, requireItem } from "./shared";

const STATUSES: ReadonlySet<string> = new Set<MediaStatus>([
  "FINISHED",
  "RELEASING",
  "NOT_YET_RELEASED",
  "CANCELLED",
  "HIATUS",
]);

function readTitles(title: JsonRecord | null): MediaTitles {
  return {
    romaji: readString(title, "romaji"),
    english: readString(title, "english"),
    native: readString(title, "native"),
  };
}

export function isMediaStatus(value: string): value is MediaStatus {
  return STATUSES.has(value);
}

function readStatus(media: JsonRecord): MediaStatus | null {
  const status = readString(media, "status");
  return status !== null && isMediaStatus(status) ? status : null;
}

function readKind(media: JsonRecord, fallback: MediaKind): MediaKind {
  const type = readString(media, "type");
  return type === "ANIME" || type === "MANGA" ? type : fallback;
}

function readAiringEpisode(node: JsonRecord | null): AiringEpisode | null {
  const episode = readInt(node, "episode");
  const airingAt = readInt(node, "airingAt");
  return episode !== null && airingAt !== null ? { episode, airingAt } : null;
}

export function anilistHit(kind: MediaKind, raw: unknown): MediaHit {
  const media = requireItem(raw, "anilist");

  return {
    source: "anilist",
    id: requireId(readInt(media, "id"), "anilist"),
    idMal: readInt(media, "idMal"),
    titles: readTitles(readRecord(media, "title")),
    year: readInt(media, "seasonYear") ?? readInt(readRecord(media, "startDate"), "year"),
    format: readString(media, "format"),
    ...countsFor(kind, readInt(media, "episodes"), readInt(media, "chapters")),
    score: clampScore(readNumber(media, "averageScore")),
    url: readString(media, "siteUrl"),
  };
}

export function anilistDetails(
  kind: MediaKind,
  raw: unknown,
  options: { recommendationsCap: number }
): MediaDetails {
  const { score, ...hit } = anilistHit(kind, raw);
  const media = requireItem(raw, "anilist");

  const external: ExternalLink[] = [];
  for (const link of readArray(media, "externalLinks")) {
    const record = isRecord(link) ? link : null;
    const url = readString(record, "url");
    if (url) external.push({ site: readString(record, "site") ?? "", url });
  }

  const recommendations: MediaHit[] = [];
  for (const node of readArray(readRecord(media, "recommendations"), "nodes")) {
    const recommended = readRecord(isRecord(node) ? node : null, "mediaRecommendation");
    if (!recommended || readInt(recommended, "id") === null) continue;
    recommendations.push(anilistHit(readKind(recommended, kind), recommended));
  }

  const description = readString(media, "description");

  return {
    ...hit,
    status: readStatus(media),
    genres: readNames(media, "genres"),
    tags: readNames(media, "tags"),
    synopsis: description ? stripMarkup(description) : "",
    score: { anilist: score, mal: null },
    external,
    recommendations: recommendations.slice(0, options.recommendationsCap),
  };
}

export function anilistAiring(raw: unknown): AiringStatus {
  const media = requireItem(raw, "anilist");
  const [lastNode] = readArray(readRecord(media, "airingSchedule"), "nodes");

  return {
    id: requireId(readInt(media, "id"), "anilist"),
    titles: readTitles(readRecord(media, "title")),
    url: readString(media, "siteUrl"),
    last: readAiringEpisode(isRecord(lastNode) ? lastNode : null),
    next: readAiringEpisode(readRecord(media, "nextAiringEpisode")),
  };
}

// Entries without a time, an episode or a media id are dropped.
export function anilistCalendar(raw: unknown[]): CalendarEntry[] {
  const entries: CalendarEntry[] = [];
  for (const node of raw) {
    const schedule = isRecord(node) ? node : null;
    const when = readInt(schedule, "airingAt");
    const episode = readInt(schedule, "episode");
    const media = readRecord(schedule, "media");
    if (when === null || episode === null || !media || readInt(media, "id") === null) continue;
    entries.push({ when, episode, media: anilistHit("ANIME", media) });
  }
  return entries.sort((a, b) => a.when - b.when);
}

import {
  type ExternalLink,
  type JsonRecord,
  type MediaDetails,
  type MediaHit,
  type MediaKind,
  type MediaStatus,
  isRecord,
  readArray,
  readInt,
  readNames,
  readNumber,
  readRecord,
  readString,
  stripMarkup,
  toEnumToken,
} from "@animanga/core";
import { countsFor, requireId, requireItem, rescaleTenPoint } from "./shared";

const STATUS_MAP: Record<string, MediaStatus> = {
  "finished airing": "FINISHED",
  "currently airing": "RELEASING",
  "not yet aired": "NOT_YET_RELEASED",
  finished: "FINISHED",
  publishing: "RELEASING",
  "not yet published": "NOT_YET_RELEASED",
  "on hiatus": "HIATUS",
  discontinued: "CANCELLED",
};

function mapStatus(status: string | null): MediaStatus | null {
  return status ? (STATUS_MAP[status.toLowerCase()] ?? null) : null;
}

function readYear(item: JsonRecord): number | null {
  const period = readRecord(item, "aired") ?? readRecord(item, "published");
  const from = readRecord(readRecord(period, "prop"), "from");
  return readInt(item, "year") ?? readInt(from, "year");
}

export function jikanHit(kind: MediaKind, raw: unknown): MediaHit {
  const item = requireItem(raw, "jikan");
  const id = requireId(readInt(item, "mal_id"), "jikan");
  const type = readString(item, "type");

  return {
    source: "jikan",
    id,
    idMal: id,
    titles: {
      romaji: readString(item, "title"),
      english: readString(item, "title_english"),
      native: readString(item, "title_japanese"),
    },
    year: readYear(item),
    format: type ? toEnumToken(type) : null,
    ...countsFor(kind, readInt(item, "episodes"), readInt(item, "chapters")),
    score: rescaleTenPoint(readNumber(item, "score")),
    url: readString(item, "url"),
  };
}

export function jikanDetails(kind: MediaKind, raw: unknown): MediaDetails {
  const { score, ...hit } = jikanHit(kind, raw);
  const item = requireItem(raw, "jikan");

  const external: ExternalLink[] = hit.url ? [{ site: "MyAnimeList", url: hit.url }] : [];
  for (const link of readArray(item, "external")) {
    const record = isRecord(link) ? link : null;
    const url = readString(record, "url");
    if (url) external.push({ site: readString(record, "name") ?? "", url });
  }

  const synopsis = readString(item, "synopsis");

  return {
    ...hit,
    status: mapStatus(readString(item, "status")),
    genres: readNames(item, "genres"),
    tags: [...readNames(item, "themes"), ...readNames(item, "demographics")],
    synopsis: synopsis ? stripMarkup(synopsis) : "",
    score: { anilist: null, mal: score },
    external,
    recommendations: [],
  };
}

import {
  type MediaFormat,
  type MediaHit,
  type MediaKind,
  type SeasonName,
  type SourceName,
  currentSeason,
} from "@animanga/core";
import { type SeasonSort, normalizeHits } from "@animanga/sources";
import { z } from "zod";
import { type ToolContext, clampLimit } from "./context";
import { formatsSchema, kindSchema, limitSchema, seasonSchema } from "./schemas";

const SEASON_SORTS = ["TRENDING_DESC", "POPULARITY_DESC", "SCORE_DESC"] as const satisfies readonly SeasonSort[];

export const seasonTopSchema = z.object({
  kind: kindSchema.default("ANIME"),
  season: seasonSchema.optional(),
  year: z.number().int().min(1940).max(2100).optional(),
  sort: z.enum(SEASON_SORTS).default("TRENDING_DESC"),
  limit: limitSchema.default(10),
  formatIn: formatsSchema.optional(),
});

export type SeasonTopInput = z.infer<typeof seasonTopSchema>;

export interface SeasonTopOutput {
  kind: MediaKind;
  season: SeasonName | null;
  year: number | null;
  sort: SeasonSort;
  formatIn: MediaFormat[] | null;
  source: SourceName;
  results: MediaHit[];
}

// Manga has no broadcast seasons, so its chart is the trending list.
export async function getSeasonTop(
  context: ToolContext,
  input: SeasonTopInput,
  signal?: AbortSignal
): Promise<SeasonTopOutput> {
  const limit = clampLimit(input.limit, context.config.maxPerPage);
  const formats = input.formatIn?.length ? input.formatIn : null;

  if (input.kind === "MANGA") {
    const { value, source } = await context.selector.resolve(
      "trending",
      "MANGA",
      "anilist",
      (adapter, options) => adapter.trending("MANGA", limit, { ...options, formats: formats ?? undefined }),
      { signal }
    );
    return {
      kind: "MANGA",
      season: null,
      year: null,
      sort: "TRENDING_DESC",
      formatIn: formats,
      source,
      results: normalizeHits("MANGA", value, source).slice(0, limit),
    };
  }

  const now = currentSeason(context.now?.());
  const season = input.season ?? now.season;
  const year = input.year ?? now.year;

  const { value, source } = await context.selector.resolve(
    "seasonal",
    "ANIME",
    "anilist",
    (adapter, options) =>
      adapter.seasonal(
        "ANIME",
        { season, year, sort: input.sort, limit, formats: formats ?? undefined },
        options
      ),
    { signal }
  );

  const hits = normalizeHits("ANIME", value, source).filter(
    (hit) => formats === null || formats.some((format) => format === hit.format)
  );

  return {
    kind: "ANIME",
    season,
    year,
    sort: input.sort,
    formatIn: formats,
    source,
    results: hits.slice(0, limit),
  };
}

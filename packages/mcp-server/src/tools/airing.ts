import { type AiringStatus, type CalendarEntry, SourceError } from "@animanga/core";
import { normalizeAiring, normalizeCalendar, normalizeHits, withRetry } from "@animanga/sources";
import { z } from "zod";
import type { ToolContext } from "./context";
import { idSchema } from "./schemas";

export const airingStatusSchema = z
  .object({
    anilistId: idSchema.optional(),
    query: z.string().trim().min(1, "query must not be empty").optional(),
  })
  .refine((input) => input.anilistId !== undefined || input.query !== undefined, {
    message: "either anilistId or query is required",
  });

export type AiringStatusInput = z.infer<typeof airingStatusSchema>;

// Airing schedules only exist on AniList, so there is no fallback here.
export async function getAiringStatus(
  context: ToolContext,
  input: AiringStatusInput,
  signal?: AbortSignal
): Promise<AiringStatus> {
  const anilist = context.adapters.anilist;
  const retry = { source: anilist.source, config: context.config.retry, clock: context.clock, signal };

  let id = input.anilistId;
  if (id === undefined) {
    const text = input.query ?? "";
    const raw = await withRetry(() => anilist.search("ANIME", text, 1, { signal }), retry);
    const [hit] = normalizeHits("ANIME", raw, anilist.source);
    if (!hit) {
      throw new SourceError("NOT_FOUND", `No anime matched "${text}"`, { source: anilist.source });
    }
    id = hit.id;
  }

  const mediaId = id;
  const raw = await withRetry(() => anilist.airing(mediaId, { signal }), retry);
  return normalizeAiring(raw);
}

const DAY_SECONDS = 86400;

export const airingCalendarSchema = z.object({
  days: z.number().int().default(7),
  perPage: z.number().int().default(50),
});

export type AiringCalendarInput = z.infer<typeof airingCalendarSchema>;

export interface AiringCalendarOutput {
  days: number;
  from: number;
  to: number;
  results: CalendarEntry[];
}

function clampRange(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// Upcoming broadcasts from now until `days` ahead, soonest first.
export async function getAiringCalendar(
  context: ToolContext,
  input: AiringCalendarInput,
  signal?: AbortSignal
): Promise<AiringCalendarOutput> {
  const anilist = context.adapters.anilist;
  const days = clampRange(input.days, 1, 30);
  const perPage = clampRange(input.perPage, 1, 50);
  const from = Math.floor((context.now?.() ?? new Date()).getTime() / 1000);
  const to = from + days * DAY_SECONDS;

  const raw = await withRetry(() => anilist.calendar(from, to, perPage, { signal }), {
    source: anilist.source,
    config: context.config.retry,
    clock: context.clock,
    signal,
  });

  return { days, from, to, results: normalizeCalendar(raw).slice(0, perPage) };
}

import type { MediaHit, MediaKind, SourceName } from "@animanga/core";
import { normalizeHits } from "@animanga/sources";
import { z } from "zod";
import { type ToolContext, clampLimit } from "./context";
import { formatSchema, kindSchema, limitSchema } from "./schemas";

const MAX_CANDIDATES = 10;

export const resolveTitleSchema = z.object({
  title: z.string().trim().min(1, "title must not be empty"),
  kind: kindSchema.default("ANIME"),
  preferFormat: formatSchema.optional(),
  limit: limitSchema.default(5),
});

export type ResolveTitleInput = z.infer<typeof resolveTitleSchema>;

export interface ResolveTitleOutput {
  query: string;
  kind: MediaKind;
  source: SourceName;
  best: MediaHit | null;
  candidates: MediaHit[];
}

export function pickBest(hits: MediaHit[], preferFormat?: string): MediaHit | null {
  if (preferFormat) {
    const match = hits.find((hit) => hit.format === preferFormat);
    if (match) return match;
  }
  return hits[0] ?? null;
}

export async function resolveTitle(
  context: ToolContext,
  input: ResolveTitleInput,
  signal?: AbortSignal
): Promise<ResolveTitleOutput> {
  const limit = clampLimit(input.limit, MAX_CANDIDATES);

  const { value, source } = await context.selector.resolve(
    "search",
    input.kind,
    "anilist",
    (adapter, options) => adapter.search(input.kind, input.title, limit, options),
    { signal }
  );

  const candidates = normalizeHits(input.kind, value, source).slice(0, limit);
  return {
    query: input.title,
    kind: input.kind,
    source,
    best: pickBest(candidates, input.preferFormat),
    candidates,
  };
}

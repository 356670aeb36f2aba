import type { MediaFormat, MediaHit, MediaKind } from "@animanga/core";
import { normalizeHits } from "@animanga/sources";
import { z } from "zod";
import { type ToolContext, clampLimit } from "./context";
import { formatsSchema, kindSchema, limitSchema } from "./schemas";

export const trendingSchema = z.object({
  kind: kindSchema.default("ANIME"),
  limit: limitSchema.default(10),
  formatIn: formatsSchema.optional(),
});

export type TrendingInput = z.infer<typeof trendingSchema>;

export interface TrendingOutput {
  kind: MediaKind;
  formatIn: MediaFormat[] | null;
  results: MediaHit[];
}

export async function getTrending(
  context: ToolContext,
  input: TrendingInput,
  signal?: AbortSignal
): Promise<TrendingOutput> {
  const limit = clampLimit(input.limit, context.config.maxPerPage);
  const formats = input.formatIn?.length ? input.formatIn : null;

  const { value, source } = await context.selector.resolve(
    "trending",
    input.kind,
    "anilist",
    (adapter, options) =>
      adapter.trending(input.kind, limit, { ...options, formats: formats ?? undefined }),
    { signal }
  );

  return {
    kind: input.kind,
    formatIn: formats,
    results: normalizeHits(input.kind, value, source).slice(0, limit),
  };
}

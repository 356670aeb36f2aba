import type { MediaHit, MediaKind, MediaQuery, SourceName } from "@animanga/core";
import { normalizeHits } from "@animanga/sources";
import { z } from "zod";
import { type ToolContext, clampLimit } from "./context";
import { kindSchema, limitSchema, sourceSchema } from "./schemas";

export const searchMediaSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  kind: kindSchema.default("ANIME"),
  source: sourceSchema.default("anilist"),
  limit: limitSchema.default(5),
});

export type SearchMediaInput = z.infer<typeof searchMediaSchema>;

export interface SearchMediaOutput {
  query: string;
  kind: MediaKind;
  source: SourceName;
  results: MediaHit[];
}

export function toMediaQuery(input: SearchMediaInput, maxPerPage: number): MediaQuery {
  return Object.freeze({
    text: input.query,
    kind: input.kind,
    preferredSource: input.source,
    limit: clampLimit(input.limit, maxPerPage),
  });
}

export async function searchMedia(
  context: ToolContext,
  input: SearchMediaInput,
  signal?: AbortSignal
): Promise<SearchMediaOutput> {
  const query = toMediaQuery(input, context.config.maxPerPage);

  const { value, source } = await context.selector.resolve(
    "search",
    query.kind,
    query.preferredSource,
    (adapter, options) => adapter.search(query.kind, query.text, query.limit, options),
    { signal }
  );

  return {
    query: query.text,
    kind: query.kind,
    source,
    results: normalizeHits(query.kind, value, source).slice(0, query.limit),
  };
}

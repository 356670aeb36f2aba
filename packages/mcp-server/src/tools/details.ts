import type { MediaDetails } from "@animanga/core";
import { normalizeDetails } from "@animanga/sources";
import { z } from "zod";
import type { ToolContext } from "./context";
import { idSchema, kindSchema, sourceSchema } from "./schemas";

export const mediaDetailsSchema = z.object({
  source: sourceSchema,
  id: idSchema,
  kind: kindSchema.default("ANIME"),
});

export type MediaDetailsInput = z.infer<typeof mediaDetailsSchema>;

// Ids are native to one source, so a failed lookup never moves to the other.
export async function getMediaDetails(
  context: ToolContext,
  input: MediaDetailsInput,
  signal?: AbortSignal
): Promise<MediaDetails> {
  const { value, source } = await context.selector.resolve(
    "fetchById",
    input.kind,
    input.source,
    (adapter, options) => adapter.fetchById(input.kind, input.id, options),
    { signal, allowFallback: false }
  );

  return normalizeDetails(input.kind, value, source, {
    recommendationsCap: context.config.recommendationsCap,
  });
}

import { SCHEMA_VERSION, SOURCE_NAMES, type SourceName } from "@animanga/core";
import type { ServerConfig } from "../config";

export interface HealthOutput {
  ok: true;
  sources: SourceName[];
}

export interface AboutOutput {
  name: string;
  version: string;
  endpoints: Record<SourceName, string>;
  limits: { maxPerPage: number; timeoutSec: number };
}

export interface HelpOutput {
  name: string;
  version: string;
  summary: string;
  tools: { name: string; description: string }[];
  notes: string[];
}

// Static answers only: neither tool contacts an upstream.
export function getHealth(): HealthOutput {
  return { ok: true, sources: [...SOURCE_NAMES] };
}

export function getAbout(config: ServerConfig): AboutOutput {
  return {
    name: config.name,
    version: config.version,
    endpoints: { anilist: config.endpoints.anilist, jikan: config.endpoints.jikan },
    limits: { maxPerPage: config.maxPerPage, timeoutSec: config.timeoutSec },
  };
}

export function getHelp(
  config: ServerConfig,
  tools: readonly { name: string; description?: string }[]
): HelpOutput {
  return {
    name: config.name,
    version: config.version,
    summary: "Anime and manga lookup backed by AniList with Jikan (MyAnimeList) as fallback.",
    tools: tools.map(({ name, description }) => ({ name, description: description ?? "" })),
    notes: [
      `Limits above ${config.maxPerPage} are clamped.`,
      "Trending, airing status and the airing calendar are AniList only.",
      "media_details ids belong to the given source and never fall back.",
      `Every response carries schemaVersion ${SCHEMA_VERSION}.`,
    ],
  };
}

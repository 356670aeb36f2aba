import type { MediaKind, SourceName } from "./media";

export interface SourceConfig {
  name: string;
  baseUrl: string;
  siteUrl: string;
  kinds: readonly MediaKind[];
}

export const SOURCES: Record<SourceName, SourceConfig> = {
  anilist: {
    name: "AniList",
    baseUrl: "https://graphql.anilist.co",
    siteUrl: "https://anilist.co",
    kinds: ["ANIME", "MANGA"],
  },
  jikan: {
    name: "Jikan",
    baseUrl: "https://api.jikan.moe/v4",
    siteUrl: "https://myanimelist.net",
    kinds: ["ANIME", "MANGA"],
  },
} as const;

export function otherSource(source: SourceName): SourceName {
  return source === "anilist" ? "jikan" : "anilist";
}

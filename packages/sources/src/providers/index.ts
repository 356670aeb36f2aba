import { DEFAULT_RECOMMENDATIONS_CAP, DEFAULT_TIMEOUT_SEC, SOURCES } from "@animanga/core";
import type { AniListSource, FetchLike, SourceAdapter } from "../adapter";
import { AniListAdapter } from "./anilist";
import { JikanAdapter } from "./jikan";

export { AniListAdapter } from "./anilist";
export { JikanAdapter } from "./jikan";

export interface SourceAdapters {
  anilist: AniListSource;
  jikan: SourceAdapter;
}

export interface AdaptersConfig {
  endpoints?: Partial<Record<keyof SourceAdapters, string>>;
  timeoutMs?: number;
  recommendationsCap?: number;
  fetch?: FetchLike;
}

export function createAdapters(config: AdaptersConfig = {}): SourceAdapters {
  const shared = {
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_SEC * 1000,
    recommendationsCap: config.recommendationsCap ?? DEFAULT_RECOMMENDATIONS_CAP,
    fetch: config.fetch ?? ((input: string, init?: RequestInit) => fetch(input, init)),
  };

  return {
    anilist: new AniListAdapter({
      ...shared,
      baseUrl: config.endpoints?.anilist ?? SOURCES.anilist.baseUrl,
    }),
    jikan: new JikanAdapter({
      ...shared,
      baseUrl: config.endpoints?.jikan ?? SOURCES.jikan.baseUrl,
    }),
  };
}

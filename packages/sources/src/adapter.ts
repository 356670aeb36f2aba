import type { MediaKind, SeasonName, SourceName } from "@animanga/core";

export type SourceOperation = "search" | "fetchById" | "trending" | "seasonal";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CallOptions {
  signal?: AbortSignal;
}

export interface TrendingOptions extends CallOptions {
  formats?: string[];
}

export type SeasonSort = "TRENDING_DESC" | "POPULARITY_DESC" | "SCORE_DESC";

export interface SeasonalQuery {
  season: SeasonName;
  year: number;
  sort: SeasonSort;
  limit: number;
  formats?: string[];
}

// Adapters hand back provider-shaped JSON; mapping to canonical records is the normalizer's job.
export interface SourceAdapter {
  readonly source: SourceName;
  supports(operation: SourceOperation, kind: MediaKind): boolean;
  search(kind: MediaKind, text: string, limit: number, options?: CallOptions): Promise<unknown[]>;
  fetchById(kind: MediaKind, id: number, options?: CallOptions): Promise<unknown>;
  trending(kind: MediaKind, limit: number, options?: TrendingOptions): Promise<unknown[]>;
  seasonal(kind: MediaKind, query: SeasonalQuery, options?: CallOptions): Promise<unknown[]>;
}

export interface AniListSource extends SourceAdapter {
  readonly source: "anilist";
  airing(id: number, options?: CallOptions): Promise<unknown>;
  calendar(from: number, to: number, perPage: number, options?: CallOptions): Promise<unknown[]>;
}

export interface AdapterConfig {
  baseUrl: string;
  timeoutMs: number;
  recommendationsCap: number;
  fetch: FetchLike;
}

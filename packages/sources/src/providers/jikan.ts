import { type MediaKind, SOURCES, SourceError, isRecord } from "@animanga/core";
import type {
  AdapterConfig,
  CallOptions,
  SeasonalQuery,
  SourceAdapter,
  SourceOperation,
} from "../adapter";
import { requestJson } from "../http";

// Season filters Jikan accepts; other formats are left to the caller to filter.
const JIKAN_SEASON_FILTERS: ReadonlySet<string> = new Set(["tv", "movie", "ova", "special", "ona", "music"]);

function collection(kind: MediaKind): "anime" | "manga" {
  return kind === "ANIME" ? "anime" : "manga";
}

export class JikanAdapter implements SourceAdapter {
  readonly source = "jikan" as const;
  private readonly config: AdapterConfig;

  constructor(config: AdapterConfig) {
    this.config = config;
  }

  supports(operation: SourceOperation, kind: MediaKind): boolean {
    if (!SOURCES.jikan.kinds.includes(kind)) return false;
    switch (operation) {
      case "search":
      case "fetchById":
        return true;
      case "seasonal":
        return kind === "ANIME";
      case "trending":
        return false;
    }
  }

  async search(kind: MediaKind, text: string, limit: number, options: CallOptions = {}) {
    const url = new URL(`${this.config.baseUrl}/${collection(kind)}`);
    url.searchParams.set("q", text);
    url.searchParams.set("limit", String(limit));
    return this.list(await this.get(url, options));
  }

  async fetchById(kind: MediaKind, id: number, options: CallOptions = {}) {
    const url = new URL(`${this.config.baseUrl}/${collection(kind)}/${id}/full`);
    const payload = await this.get(url, options);
    const data = isRecord(payload) ? payload.data : undefined;
    if (!isRecord(data)) {
      throw new SourceError("NORMALIZE_ERROR", "Jikan response has no data object", {
        source: this.source,
      });
    }
    return data;
  }

  async trending(kind: MediaKind): Promise<unknown[]> {
    throw new SourceError("INVALID_ARG", `Jikan does not provide trending ${kind}`, {
      source: this.source,
    });
  }

  async seasonal(kind: MediaKind, query: SeasonalQuery, options: CallOptions = {}) {
    if (!this.supports("seasonal", kind)) {
      throw new SourceError("INVALID_ARG", `Jikan has no seasons for ${kind}`, {
        source: this.source,
      });
    }
    const url = new URL(
      `${this.config.baseUrl}/seasons/${query.year}/${query.season.toLowerCase()}`
    );
    url.searchParams.set("limit", String(query.limit));
    const filter = query.formats?.length === 1 ? query.formats[0].toLowerCase() : null;
    if (filter !== null && JIKAN_SEASON_FILTERS.has(filter)) {
      url.searchParams.set("filter", filter);
    }
    return this.list(await this.get(url, options));
  }

  private get(url: URL, options: CallOptions): Promise<unknown> {
    return requestJson(
      url.toString(),
      { method: "GET" },
      {
        source: this.source,
        timeoutMs: this.config.timeoutMs,
        fetch: this.config.fetch,
        signal: options.signal,
      }
    );
  }

  private list(payload: unknown): unknown[] {
    const data = isRecord(payload) ? payload.data : undefined;
    if (!Array.isArray(data)) {
      throw new SourceError("NORMALIZE_ERROR", "Jikan response has no data list", {
        source: this.source,
      });
    }
    return data;
  }
}

import {
  type MediaKind,
  SOURCES,
  SourceError,
  isRecord,
  readArray,
  readInt,
  readRecord,
  readString,
} from "@animanga/core";
import type {
  AdapterConfig,
  AniListSource,
  CallOptions,
  SeasonalQuery,
  SourceOperation,
  TrendingOptions,
} from "../adapter";
import { requestJson } from "../http";

const HIT_FIELDS = `
  id idMal type siteUrl format episodes chapters averageScore seasonYear
  startDate { year }
  title { romaji english native }
`;

const SEARCH_QUERY = `
  query ($q: String, $type: MediaType, $per: Int) {
    Page(perPage: $per) {
      media(search: $q, type: $type, sort: [SEARCH_MATCH, POPULARITY_DESC]) { ${HIT_FIELDS} }
    }
  }
`;

const TRENDING_QUERY = `
  query ($type: MediaType, $per: Int, $formats: [MediaFormat]) {
    Page(perPage: $per) {
      media(type: $type, sort: TRENDING_DESC, format_in: $formats) { ${HIT_FIELDS} }
    }
  }
`;

const SEASON_QUERY = `
  query ($type: MediaType, $season: MediaSeason, $year: Int, $per: Int, $sort: [MediaSort], $formats: [MediaFormat]) {
    Page(perPage: $per) {
      media(type: $type, season: $season, seasonYear: $year, sort: $sort, format_in: $formats) { ${HIT_FIELDS} }
    }
  }
`;

const DETAILS_QUERY = `
  query ($id: Int, $type: MediaType, $recs: Int) {
    Media(id: $id, type: $type) {
      ${HIT_FIELDS}
      status genres description(asHtml: false)
      tags { name }
      externalLinks { site url }
      recommendations(sort: RATING_DESC, perPage: $recs) {
        nodes { mediaRecommendation { ${HIT_FIELDS} } }
      }
    }
  }
`;

const AIRING_QUERY = `
  query ($id: Int) {
    Media(id: $id, type: ANIME) {
      id siteUrl
      title { romaji english native }
      nextAiringEpisode { episode airingAt }
      airingSchedule(notYetAired: false, perPage: 1, sort: TIME_DESC) { nodes { episode airingAt } }
    }
  }
`;

const CALENDAR_QUERY = `
  query ($from: Int, $to: Int, $per: Int) {
    Page(perPage: $per) {
      airingSchedules(airingAt_greater: $from, airingAt_lesser: $to, sort: TIME) {
        episode airingAt
        media { ${HIT_FIELDS} }
      }
    }
  }
`;

export class AniListAdapter implements AniListSource {
  readonly source = "anilist" as const;
  private readonly config: AdapterConfig;

  constructor(config: AdapterConfig) {
    this.config = config;
  }

  supports(operation: SourceOperation, kind: MediaKind): boolean {
    if (!SOURCES.anilist.kinds.includes(kind)) return false;
    return operation !== "seasonal" || kind === "ANIME";
  }

  async search(kind: MediaKind, text: string, limit: number, options: CallOptions = {}) {
    const data = await this.query(SEARCH_QUERY, { q: text, type: kind, per: limit }, options);
    return this.pageMedia(data);
  }

  async fetchById(kind: MediaKind, id: number, options: CallOptions = {}) {
    const data = await this.query(
      DETAILS_QUERY,
      { id, type: kind, recs: this.config.recommendationsCap },
      options
    );
    return this.singleMedia(data, `No ${kind} with AniList id ${id}`);
  }

  async trending(kind: MediaKind, limit: number, options: TrendingOptions = {}) {
    const formats = options.formats?.length ? options.formats : null;
    const data = await this.query(TRENDING_QUERY, { type: kind, per: limit, formats }, options);
    return this.pageMedia(data);
  }

  async seasonal(kind: MediaKind, query: SeasonalQuery, options: CallOptions = {}) {
    if (!this.supports("seasonal", kind)) {
      throw new SourceError("INVALID_ARG", `AniList has no seasons for ${kind}`, {
        source: this.source,
      });
    }
    const data = await this.query(
      SEASON_QUERY,
      {
        type: kind,
        season: query.season,
        year: query.year,
        per: query.limit,
        sort: [query.sort],
        formats: query.formats?.length ? query.formats : null,
      },
      options
    );
    return this.pageMedia(data);
  }

  async airing(id: number, options: CallOptions = {}) {
    const data = await this.query(AIRING_QUERY, { id }, options);
    return this.singleMedia(data, `No ANIME with AniList id ${id}`);
  }

  async calendar(
    from: number,
    to: number,
    perPage: number,
    options: CallOptions = {}
  ): Promise<unknown[]> {
    const data = await this.query(CALENDAR_QUERY, { from, to, per: perPage }, options);
    const schedules = readRecord(data, "Page")?.airingSchedules;
    if (!Array.isArray(schedules)) {
      throw new SourceError("NORMALIZE_ERROR", "AniList page has no airing schedules", {
        source: this.source,
      });
    }
    return schedules;
  }

  private async query(
    query: string,
    variables: Record<string, unknown>,
    options: CallOptions
  ): Promise<Record<string, unknown>> {
    const payload = await requestJson(
      this.config.baseUrl,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ query, variables }),
      },
      {
        source: this.source,
        timeoutMs: this.config.timeoutMs,
        fetch: this.config.fetch,
        signal: options.signal,
      }
    );

    if (!isRecord(payload)) {
      throw new SourceError("NORMALIZE_ERROR", "AniList response is not an object", {
        source: this.source,
      });
    }

    const [firstError] = readArray(payload, "errors");
    if (firstError !== undefined) {
      const error = isRecord(firstError) ? firstError : null;
      const message = readString(error, "message") ?? "AniList reported an error";
      const status = readInt(error, "status") ?? 400;
      throw new SourceError(status === 404 ? "NOT_FOUND" : "UPSTREAM_4XX", message, {
        source: this.source,
        status,
      });
    }

    const data = readRecord(payload, "data");
    if (!data) {
      throw new SourceError("NORMALIZE_ERROR", "AniList response has no data", {
        source: this.source,
      });
    }
    return data;
  }

  private pageMedia(data: Record<string, unknown>): unknown[] {
    const media = readRecord(data, "Page")?.media;
    if (!Array.isArray(media)) {
      throw new SourceError("NORMALIZE_ERROR", "AniList page has no media list", {
        source: this.source,
      });
    }
    return media;
  }

  private singleMedia(data: Record<string, unknown>, notFound: string): unknown {
    const media = data.Media;
    if (media === null || media === undefined) {
      throw new SourceError("NOT_FOUND", notFound, { source: this.source, status: 404 });
    }
    return media;
  }
}

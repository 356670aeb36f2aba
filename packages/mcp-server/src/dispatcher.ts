import { type Payload, type ResponseEnvelope, SourceError } from "@animanga/core";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { buildError, buildSuccess } from "./envelope";
import {
  type AiringStatusInput,
  airingCalendarSchema,
  airingStatusSchema,
  getAiringCalendar,
  getAiringStatus,
} from "./tools/airing";
import type { ToolContext } from "./tools/context";
import { getMediaDetails, mediaDetailsSchema } from "./tools/details";
import { getAbout, getHealth, getHelp } from "./tools/meta";
import { resolveTitle, resolveTitleSchema } from "./tools/resolve";
import { parseInput } from "./tools/schemas";
import { searchMedia, searchMediaSchema } from "./tools/search";
import { getSeasonTop, seasonTopSchema } from "./tools/season";
import { getTrending, trendingSchema } from "./tools/trending";

const KIND = {
  type: "string",
  enum: ["ANIME", "MANGA"],
  description: "Media kind (default: ANIME)",
};

const FORMAT_IN = {
  type: "array",
  items: { type: "string" },
  description: "Only keep these formats (e.g., ['TV', 'MOVIE'] or ['MANGA', 'ONE_SHOT'])",
};

export const TOOLS: Tool[] = [
  {
    name: "search_media",
    description:
      "Search anime or manga by title. Returns titles, format, year, episode or chapter counts, score and a link.",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Title to search for (e.g., 'frieren', 'vinland saga')",
        },
        kind: KIND,
        source: {
          type: "string",
          enum: ["anilist", "jikan"],
          description: "Preferred source; the other one is used if it is unavailable (default: anilist)",
        },
        limit: {
          type: "number",
          description: "Maximum number of results (default: 5, clamped to the configured maximum)",
        },
      },
      required: ["query"],
    },
  },
  {
    name: "media_details",
    description:
      "Get full metadata for one title: status, genres, tags, synopsis, scores, external links and recommendations.",
    inputSchema: {
      type: "object",
      properties: {
        source: {
          type: "string",
          enum: ["anilist", "jikan"],
          description: "Source the id belongs to",
        },
        id: {
          type: "number",
          description: "AniList id or MyAnimeList id, depending on source",
        },
        kind: KIND,
      },
      required: ["source", "id"],
    },
  },
  {
    name: "trending",
    description: "List what is trending on AniList right now.",
    inputSchema: {
      type: "object",
      properties: {
        kind: KIND,
        limit: {
          type: "number",
          description: "Maximum number of results (default: 10)",
        },
        formatIn: FORMAT_IN,
      },
    },
  },
  {
    name: "season_top",
    description:
      "Top titles of a broadcast season (defaults to the current one). Manga has no seasons and returns the trending list.",
    inputSchema: {
      type: "object",
      properties: {
        kind: KIND,
        season: {
          type: "string",
          enum: ["WINTER", "SPRING", "SUMMER", "FALL"],
          description: "Season name (default: current season)",
        },
        year: {
          type: "number",
          description: "Season year (default: current year)",
        },
        sort: {
          type: "string",
          enum: ["TRENDING_DESC", "POPULARITY_DESC", "SCORE_DESC"],
          description: "Ordering (default: TRENDING_DESC)",
        },
        limit: {
          type: "number",
          description: "Maximum number of results (default: 10)",
        },
        formatIn: FORMAT_IN,
      },
    },
  },
  {
    name: "resolve_title",
    description: "Resolve a loosely typed title to the most likely AniList entry plus the other candidates.",
    inputSchema: {
      type: "object",
      properties: {
        title: {
          type: "string",
          description: "Title as the user wrote it",
        },
        kind: KIND,
        preferFormat: {
          type: "string",
          description: "Pick the first candidate of this format when there is one (e.g., 'MOVIE')",
        },
        limit: {
          type: "number",
          description: "Number of candidates (default: 5, max: 10)",
        },
      },
      required: ["title"],
    },
  },
  {
    name: "airing_status",
    description: "Last aired and next airing episode of an anime, from AniList.",
    inputSchema: {
      type: "object",
      properties: {
        anilistId: {
          type: "number",
          description: "AniList id",
        },
        query: {
          type: "string",
          description: "Title to look up when the id is not known",
        },
      },
    },
  },
  {
    name: "airing_calendar",
    description: "Episodes airing over the next few days, soonest first, from AniList.",
    inputSchema: {
      type: "object",
      properties: {
        days: {
          type: "number",
          description: "How many days ahead to look (default: 7, clamped to 1-30)",
        },
        perPage: {
          type: "number",
          description: "Maximum number of episodes (default: 50, clamped to 1-50)",
        },
      },
    },
  },
  {
    name: "health",
    description: "Report that the server is up and which sources it is configured for.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "about",
    description: "Server name, version, endpoints and limits.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "help",
    description: "Describe the available tools and how they behave.",
    inputSchema: { type: "object", properties: {} },
  },
];

type Handler = (args: unknown, signal?: AbortSignal) => Promise<Payload>;

export class ToolDispatcher {
  private readonly handlers: Record<string, Handler>;

  constructor(readonly context: ToolContext) {
    this.handlers = {
      search_media: (args, signal) =>
        searchMedia(context, parseInput(searchMediaSchema, args), signal),
      media_details: (args, signal) =>
        getMediaDetails(context, parseInput(mediaDetailsSchema, args), signal),
      trending: (args, signal) => getTrending(context, parseInput(trendingSchema, args), signal),
      season_top: (args, signal) =>
        getSeasonTop(context, parseInput(seasonTopSchema, args), signal),
      resolve_title: (args, signal) =>
        resolveTitle(context, parseInput(resolveTitleSchema, args), signal),
      airing_status: (args, signal) => {
        const input: AiringStatusInput = parseInput(airingStatusSchema, args);
        return getAiringStatus(context, input, signal);
      },
      airing_calendar: (args, signal) =>
        getAiringCalendar(context, parseInput(airingCalendarSchema, args), signal),
      health: async () => getHealth(),
      about: async () => getAbout(context.config),
      help: async () => getHelp(context.config, TOOLS),
    };
  }

  async dispatch(name: string, args: unknown, signal?: AbortSignal): Promise<ResponseEnvelope<Payload>> {
    const handler = Object.hasOwn(this.handlers, name) ? this.handlers[name] : undefined;
    if (!handler) {
      return buildError(
        new SourceError("INVALID_ARG", `Unknown tool: ${name}`, { source: "local" }),
        "local"
      );
    }

    try {
      return buildSuccess(await handler(args, signal));
    } catch (error) {
      return buildError(error, "local");
    }
  }
}

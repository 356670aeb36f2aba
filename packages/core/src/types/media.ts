export const MEDIA_KINDS = ["ANIME", "MANGA"] as const;

export type MediaKind = (typeof MEDIA_KINDS)[number];

export type MediaStatus = "FINISHED" | "RELEASING" | "NOT_YET_RELEASED" | "CANCELLED" | "HIATUS";

// AniList's MediaFormat enum; Jikan types map onto the same tokens.
export const MEDIA_FORMATS = [
  "TV",
  "TV_SHORT",
  "MOVIE",
  "SPECIAL",
  "OVA",
  "ONA",
  "MUSIC",
  "MANGA",
  "NOVEL",
  "ONE_SHOT",
] as const;

export type MediaFormat = (typeof MEDIA_FORMATS)[number];

export const SEASON_NAMES = ["WINTER", "SPRING", "SUMMER", "FALL"] as const;

export type SeasonName = (typeof SEASON_NAMES)[number];

export interface MediaTitles {
  romaji: string | null;
  english: string | null;
  native: string | null;
}

export interface MediaQuery {
  readonly text: string;
  readonly kind: MediaKind;
  readonly preferredSource: SourceName;
  readonly limit: number;
}

export interface MediaHit {
  source: SourceName;
  id: number;
  idMal: number | null;
  titles: MediaTitles;
  year: number | null;
  format: string | null;
  episodes: number | null;
  chapters: number | null;
  score: number | null;
  url: string | null;
}

export interface ExternalLink {
  site: string;
  url: string;
}

export interface MediaScores {
  anilist: number | null;
  mal: number | null;
}

export interface MediaDetails extends Omit<MediaHit, "score"> {
  status: MediaStatus | null;
  genres: string[];
  tags: string[];
  synopsis: string;
  score: MediaScores;
  external: ExternalLink[];
  recommendations: MediaHit[];
}

export interface AiringEpisode {
  episode: number;
  airingAt: number;
}

export interface AiringStatus {
  id: number;
  titles: MediaTitles;
  url: string | null;
  last: AiringEpisode | null;
  next: AiringEpisode | null;
}

// One scheduled broadcast; `when` is epoch seconds.
export interface CalendarEntry {
  when: number;
  episode: number;
  media: MediaHit;
}

export const SOURCE_NAMES = ["anilist", "jikan"] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

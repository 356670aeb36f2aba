import { describe, expect, test } from "vitest";
import { anilistAiring, anilistCalendar, anilistDetails, anilistHit } from "./anilist";

function createMedia(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 21,
    idMal: 21,
    type: "ANIME",
    siteUrl: "https://anilist.co/anime/21",
    format: "TV",
    episodes: 1100,
    chapters: null,
    averageScore: 87,
    seasonYear: 1999,
    startDate: { year: 1999 },
    title: { romaji: "ONE PIECE", english: "ONE PIECE", native: "ONE PIECE" },
    ...overrides,
  };
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected a failure");
}

describe("anilistHit", () => {
  test("maps the canonical hit fields", () => {
    expect(anilistHit("ANIME", createMedia())).toEqual({
      source: "anilist",
      id: 21,
      idMal: 21,
      titles: { romaji: "ONE PIECE", english: "ONE PIECE", native: "ONE PIECE" },
      year: 1999,
      format: "TV",
      episodes: 1100,
      chapters: null,
      score: 87,
      url: "https://anilist.co/anime/21",
    });
  });

  test("nulls the count that does not belong to the kind", () => {
    const hit = anilistHit("MANGA", createMedia({ format: "MANGA", episodes: 3, chapters: 90 }));
    expect(hit.episodes).toBeNull();
    expect(hit.chapters).toBe(90);
  });

  test("falls back to startDate for the year", () => {
    expect(anilistHit("ANIME", createMedia({ seasonYear: null, startDate: { year: 2001 } })).year).toBe(
      2001
    );
  });

  test("keeps missing titles null instead of inventing them", () => {
    const hit = anilistHit("ANIME", createMedia({ title: { romaji: "Mushishi" } }));
    expect(hit.titles).toEqual({ romaji: "Mushishi", english: null, native: null });
  });

  test("passes already-canonical scores through unchanged", () => {
    const once = anilistHit("ANIME", createMedia({ averageScore: 86 }));
    const twice = anilistHit("ANIME", createMedia({ averageScore: once.score }));
    expect(twice.score).toBe(86);
  });

  test("drops malformed fields to null", () => {
    const hit = anilistHit(
      "ANIME",
      createMedia({ idMal: "21", episodes: 12.5, averageScore: 140, siteUrl: 5 })
    );
    expect(hit.idMal).toBeNull();
    expect(hit.episodes).toBeNull();
    expect(hit.score).toBeNull();
    expect(hit.url).toBeNull();
  });

  test("raises NORMALIZE_ERROR for items without an id", () => {
    expect(captureError(() => anilistHit("ANIME", createMedia({ id: null })))).toMatchObject({
      code: "NORMALIZE_ERROR",
      source: "anilist",
    });
    expect(captureError(() => anilistHit("ANIME", "nope"))).toMatchObject({
      code: "NORMALIZE_ERROR",
    });
  });
});

describe("anilistDetails", () => {
  const raw = createMedia({
    status: "RELEASING",
    genres: ["Action", "Adventure"],
    tags: [{ name: "Pirates" }, { name: "Ensemble Cast" }],
    description: "Gol D. Roger was known as the <i>Pirate King</i>.<br><br>He hid One Piece.",
    externalLinks: [
      { site: "Official Site", url: "https://example.com/op" },
      { site: "Broken", url: null },
    ],
    recommendations: {
      nodes: [
        { mediaRecommendation: createMedia({ id: 20, idMal: 20, averageScore: 79 }) },
        { mediaRecommendation: null },
        {
          mediaRecommendation: createMedia({
            id: 30013,
            idMal: 13,
            type: "MANGA",
            format: "MANGA",
            episodes: null,
            chapters: 1100,
          }),
        },
      ],
    },
  });

  test("round-trips a null chapters field for anime", () => {
    const details = anilistDetails("ANIME", raw, { recommendationsCap: 10 });
    expect(details.episodes).toBe(1100);
    expect(details.chapters).toBeNull();
  });

  test("builds the detail-only fields", () => {
    const details = anilistDetails("ANIME", raw, { recommendationsCap: 10 });
    expect(details.status).toBe("RELEASING");
    expect(details.genres).toEqual(["Action", "Adventure"]);
    expect(details.tags).toEqual(["Pirates", "Ensemble Cast"]);
    expect(details.synopsis).toBe("Gol D. Roger was known as the Pirate King.\n\nHe hid One Piece.");
    expect(details.score).toEqual({ anilist: 87, mal: null });
    expect(details.external).toEqual([{ site: "Official Site", url: "https://example.com/op" }]);
  });

  test("normalizes recommendations by their own type and skips empty nodes", () => {
    const details = anilistDetails("ANIME", raw, { recommendationsCap: 10 });
    expect(details.recommendations.map((r) => r.id)).toEqual([20, 30013]);
    expect(details.recommendations[1]).toMatchObject({ episodes: null, chapters: 1100 });
  });

  test("caps recommendations", () => {
    const details = anilistDetails("ANIME", raw, { recommendationsCap: 1 });
    expect(details.recommendations).toHaveLength(1);
  });

  test("ignores unknown statuses and missing descriptions", () => {
    const details = anilistDetails(
      "ANIME",
      createMedia({ status: "SOMETHING_NEW", description: null }),
      { recommendationsCap: 10 }
    );
    expect(details.status).toBeNull();
    expect(details.synopsis).toBe("");
    expect(details.genres).toEqual([]);
    expect(details.recommendations).toEqual([]);
  });
});

describe("anilistAiring", () => {
  test("maps last and next episodes", () => {
    const status = anilistAiring({
      id: 21,
      siteUrl: "https://anilist.co/anime/21",
      title: { romaji: "ONE PIECE" },
      nextAiringEpisode: { episode: 1101, airingAt: 1_700_600_000 },
      airingSchedule: { nodes: [{ episode: 1100, airingAt: 1_700_000_000 }] },
    });

    expect(status).toEqual({
      id: 21,
      titles: { romaji: "ONE PIECE", english: null, native: null },
      url: "https://anilist.co/anime/21",
      last: { episode: 1100, airingAt: 1_700_000_000 },
      next: { episode: 1101, airingAt: 1_700_600_000 },
    });
  });

  test("reports null when nothing has aired or is scheduled", () => {
    const status = anilistAiring({ id: 5, nextAiringEpisode: null, airingSchedule: { nodes: [] } });
    expect(status.last).toBeNull();
    expect(status.next).toBeNull();
  });
});

describe("anilistCalendar", () => {
  test("orders entries by airing time and maps their media", () => {
    const entries = anilistCalendar([
      { episode: 12, airingAt: 1_700_200_000, media: createMedia({ id: 2, averageScore: null }) },
      { episode: 1101, airingAt: 1_700_100_000, media: createMedia() },
    ]);

    expect(entries.map((entry) => [entry.when, entry.episode, entry.media.id])).toEqual([
      [1_700_100_000, 1101, 21],
      [1_700_200_000, 12, 2],
    ]);
    expect(entries[0]?.media).toMatchObject({ source: "anilist", format: "TV", chapters: null });
  });

  test("drops entries it cannot place", () => {
    const entries = anilistCalendar([
      { episode: 1, airingAt: null, media: createMedia() },
      { episode: 2, airingAt: 1_700_000_000, media: null },
      { episode: 3, airingAt: 1_700_000_000, media: { title: { romaji: "No id" } } },
      "not a schedule",
    ]);

    expect(entries).toEqual([]);
  });
});

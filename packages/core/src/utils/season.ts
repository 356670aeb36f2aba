import type { SeasonName } from "../types/media";

export function seasonFromMonth(month: number): SeasonName {
  if (month === 12 || month <= 2) return "WINTER";
  if (month <= 5) return "SPRING";
  if (month <= 8) return "SUMMER";
  return "FALL";
}

// December belongs to the winter season of the following year on AniList.
export function currentSeason(now: Date = new Date()): { season: SeasonName; year: number } {
  const month = now.getUTCMonth() + 1;
  const year = now.getUTCFullYear();
  return { season: seasonFromMonth(month), year: month === 12 ? year + 1 : year };
}

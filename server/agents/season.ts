import { DateTime } from "luxon";

/**
 * College football seasons are named for the year they kick off in August.
 * January belongs to the previous season (bowl games); February through July
 * already point at the season starting next August.
 */
export function resolveSeason(today: DateTime): number {
  if (today.month === 1) return today.year - 1;
  return today.year;
}

export function currentSeason(zone: string, now: DateTime = DateTime.now()): number {
  return resolveSeason(now.setZone(zone));
}

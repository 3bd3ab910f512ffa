import { createEvents, type DateArray, type EventAttributes } from "ics";
import type { DateTime } from "luxon";
import type { ParsedGame } from "../agents/types";
import { PublishError } from "../types/errors";

export interface CalendarMeta {
  calName: string;
  productId: string;
  /** Zone the start times were resolved in, named in each description. */
  zone: string;
}

function toUtcDateArray(dt: DateTime): DateArray {
  const u = dt.toUTC();
  return [u.year, u.month, u.day, u.hour, u.minute];
}

export function describeGame(game: ParsedGame, zone: string): string {
  const lines: string[] = [];
  if (game.broadcast) lines.push(`Broadcast on: ${game.broadcast}`);
  lines.push(game.isHome ? "Home Game" : "Away Game");
  lines.push(`Opponent: ${game.opponent}`);
  if (!game.timeConfirmed) lines.push("Kickoff time TBA");
  lines.push(`Times shown in ${zone}`);
  return lines.join("\n");
}

export function toEventAttributes(game: ParsedGame, meta: CalendarMeta): EventAttributes {
  const event: EventAttributes = {
    uid: game.uid,
    title: game.title,
    start: toUtcDateArray(game.start),
    startInputType: "utc",
    startOutputType: "utc",
    end: toUtcDateArray(game.end),
    endInputType: "utc",
    endOutputType: "utc",
    description: describeGame(game, meta.zone),
    status: game.timeConfirmed ? "CONFIRMED" : "TENTATIVE",
    busyStatus: "BUSY",
    calName: meta.calName,
    productId: meta.productId,
  };
  if (game.location) event.location = game.location;
  return event;
}

/**
 * Render games as one VCALENDAR document.
 * @throws PublishError when the ics library rejects an event
 */
export function renderCalendar(games: ParsedGame[], meta: CalendarMeta): string {
  const { error, value } = createEvents(games.map((g) => toEventAttributes(g, meta)));
  if (error || !value) {
    throw new PublishError(`Calendar rendering failed: ${error?.message ?? "empty output"}`, {
      games: games.length,
    });
  }
  return value;
}

import { ParseError } from "../types/errors";
import { GAME_DURATION, parseGameStart, type DateTimeParseOptions } from "./dateTimeNormalizer";
import type { ParsedGame, ParseResult, RawGameRecord } from "./types";

export interface NormalizeContext extends DateTimeParseOptions {
  seasonYear: number;
  teamName: string;
}

export const PLACEHOLDER_OPPONENTS = new Set(["", "unknown opponent", "tba", "tbd", "opponent tba"]);

const OPPONENT_PREFIX_RE = /^(?:(?:vs\.?|versus|at)\s+|vs\.|@\s*)/i;
const RANK_PREFIX_RE = /^(?:#\s?\d{1,2}|no\.\s?\d{1,2})\s+/i;

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Strip "vs", "at" and "@" prefixes, poll rankings and conference-game
 * asterisks from an opponent label.
 */
export function cleanOpponent(text: string): string {
  let name = collapseWhitespace(text);
  name = name.replace(OPPONENT_PREFIX_RE, "").trim();
  name = name.replace(RANK_PREFIX_RE, "").trim();
  name = name.replace(/\s*\*+$/, "").trim();
  return name;
}

export function isPlaceholderOpponent(name: string): boolean {
  return PLACEHOLDER_OPPONENTS.has(name.toLowerCase());
}

export function buildTitle(teamName: string, opponent: string, isHome: boolean): string {
  return isHome ? `${opponent} at ${teamName}` : `${teamName} at ${opponent}`;
}

function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function buildUid(seasonYear: number, isoDate: string, opponent: string): string {
  return `${seasonYear}-${isoDate}-${slugify(opponent)}@football-calendar-feed`;
}

/**
 * Turn one scraped record into a ParsedGame. Records whose date or opponent
 * cannot be resolved come back as a ParseError so the caller can drop them.
 */
export function normalizeRecord(raw: RawGameRecord, ctx: NormalizeContext): ParseResult<ParsedGame> {
  const opponent = cleanOpponent(raw.opponentText);
  if (isPlaceholderOpponent(opponent)) {
    return {
      ok: false,
      error: new ParseError(`missing opponent ("${raw.opponentText}")`, raw.dateText, raw.timeText),
    };
  }

  const parsed = parseGameStart(raw.dateText, raw.timeText, ctx.seasonYear, {
    zone: ctx.zone,
    assumePmBeforeHour: ctx.assumePmBeforeHour,
  });
  if (!parsed.ok) return parsed;

  const { start, timeConfirmed } = parsed.value;
  return {
    ok: true,
    value: {
      uid: buildUid(ctx.seasonYear, start.toISODate() ?? "", opponent),
      title: buildTitle(ctx.teamName, opponent, raw.isHome),
      start,
      end: start.plus(GAME_DURATION),
      location: collapseWhitespace(raw.locationText),
      broadcast: collapseWhitespace(raw.broadcastText),
      isHome: raw.isHome,
      opponent,
      timeConfirmed,
      rawDateText: raw.dateText,
      rawTimeText: raw.timeText,
    },
  };
}

export interface NormalizedBatch {
  games: ParsedGame[];
  failures: ParseError[];
}

export function normalizeRecords(records: RawGameRecord[], ctx: NormalizeContext): NormalizedBatch {
  const games: ParsedGame[] = [];
  const failures: ParseError[] = [];
  for (const record of records) {
    const result = normalizeRecord(record, ctx);
    if (result.ok) games.push(result.value);
    else failures.push(result.error);
  }
  games.sort((a, b) => a.start.toMillis() - b.start.toMillis());
  return { games, failures };
}

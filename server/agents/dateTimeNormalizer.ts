/**
 * Date/Time Normalizer
 *
 * Turns the date and kickoff text found on schedule pages ("SaturdayNov 22",
 * "Aug 30, 2025", "9/6", "2025-09-20" / "3:30 PM", "noon", "TBA") into a zoned
 * luxon DateTime. A date that cannot be resolved is reported as a ParseError;
 * no fallback date is ever produced. A missing or unreadable kickoff time falls
 * back to DEFAULT_KICKOFF and is flagged as unconfirmed.
 *
 * The result depends only on the inputs: nothing here reads the clock.
 */

import { DateTime } from "luxon";
import { ParseError } from "../types/errors";
import type { ParseResult } from "./types";

export const DEFAULT_SPORT_TIMEZONE = "America/New_York";
export const DEFAULT_KICKOFF = { hour: 13, minute: 0 } as const;
export const DEFAULT_ASSUME_PM_BEFORE_HOUR = 8;
export const GAME_DURATION = { hours: 3, minutes: 30 } as const;

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface KickoffTime {
  hour: number;
  minute: number;
  /** false when the kickoff fell back to DEFAULT_KICKOFF */
  confirmed: boolean;
}

export interface DateTimeParseOptions {
  zone?: string;
  /** Hour below which a time without AM/PM is read as PM; null disables. */
  assumePmBeforeHour?: number | null;
}

export interface GameStart {
  start: DateTime;
  timeConfirmed: boolean;
}

// Full names before abbreviations so alternation prefers the longest token.
const MONTH_PATTERN =
  "january|february|march|april|may|june|july|august|september|october|november|december|" +
  "sept|jan|feb|mar|apr|jun|jul|aug|sep|oct|nov|dec";
const WEEKDAY_PATTERN =
  "monday|tuesday|wednesday|thursday|friday|saturday|sunday|" +
  "tues|thurs|thur|mon|tue|wed|thu|fri|sat|sun";

const MONTH_INDEX: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const SLASH_DATE_RE = /\b(\d{1,2})\/(\d{1,2})(?:\/(\d{4}|\d{2}))?\b/;
const ISO_DATE_RE = /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/;
// A weekday is stripped when followed by a non-letter, the end, or a month glued to it.
const WEEKDAY_RE = new RegExp(
  `\\b(?:${WEEKDAY_PATTERN})\\.?,?\\s*(?=$|[^a-z]|(?:${MONTH_PATTERN})(?![a-z]))`,
  "gi",
);
const MONTH_RE = new RegExp(`\\b(${MONTH_PATTERN})\\.?(?![a-z])`, "i");
const DAY_RE = /\b(\d{1,2})(?:st|nd|rd|th)?\b/i;
const YEAR_RE = /\b(20\d{2})\b/;

const NOON_RE = /\bnoon\b/i;
const UNANNOUNCED_RE = /\b(?:tba|tbd)\b/i;
// Past games show a result or status where the kickoff used to be.
const RESULT_RE = /\b[wlt]\b[\s,]*\d+\s*-\s*\d+|\b(?:final|postponed|canceled|cancelled)\b/i;
const TIME_RE = /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm|a|p)?\b/;
const MERIDIEM_RE = /\b(am|pm)\b/;

function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

function fail<T>(reason: string, dateText: string, timeText: string): ParseResult<T> {
  return { ok: false, error: new ParseError(reason, dateText, timeText) };
}

/**
 * Season year Y covers August-December of Y; January through July dates
 * (bowls, spring games, early exhibitions) fall in Y + 1.
 */
export function inferYear(month: number, seasonYear: number): number {
  return month >= 8 ? seasonYear : seasonYear + 1;
}

// Legacy two-digit year rule. Schedules this service reads never predate 2000.
function expandTwoDigitYear(yy: number): number {
  return yy > 50 ? 1900 + yy : 2000 + yy;
}

function isRealDate(date: CalendarDate): boolean {
  return DateTime.fromObject(date, { zone: "utc" }).isValid;
}

function lastDayMatch(text: string): RegExpExecArray | null {
  const re = new RegExp(DAY_RE.source, "gi");
  let found: RegExpExecArray | null = null;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    found = m;
  }
  return found;
}

export function monthFromName(name: string): number | undefined {
  return MONTH_INDEX[name.slice(0, 3).toLowerCase()];
}

/**
 * Resolve the calendar date in a schedule date string. Tries the numeric
 * slash form, then ISO, then month names; the first form found wins.
 */
export function parseCalendarDate(dateText: string, seasonYear: number): ParseResult<CalendarDate> {
  const text = dateText.replace(/\s+/g, " ").trim();
  if (text === "") return fail("empty date text", dateText, "");

  let date: CalendarDate | undefined;

  const slash = SLASH_DATE_RE.exec(text);
  const iso = slash ? null : ISO_DATE_RE.exec(text);
  if (slash) {
    const month = parseInt(slash[1], 10);
    const day = parseInt(slash[2], 10);
    const rawYear: string | undefined = slash[3];
    let year: number;
    if (rawYear === undefined) year = inferYear(month, seasonYear);
    else if (rawYear.length === 2) year = expandTwoDigitYear(parseInt(rawYear, 10));
    else year = parseInt(rawYear, 10);
    date = { year, month, day };
  } else if (iso) {
    date = { year: parseInt(iso[1], 10), month: parseInt(iso[2], 10), day: parseInt(iso[3], 10) };
  } else {
    const stripped = text.replace(WEEKDAY_RE, " ").replace(/\s+/g, " ").trim();
    const monthMatch = MONTH_RE.exec(stripped);
    if (!monthMatch) return fail("no month found", dateText, "");

    const month = monthFromName(monthMatch[1]);
    if (month === undefined) return fail(`unknown month "${monthMatch[1]}"`, dateText, "");

    const after = stripped.slice(monthMatch.index + monthMatch[0].length);
    const before = stripped.slice(0, monthMatch.index);
    const dayMatch = DAY_RE.exec(after) ?? lastDayMatch(before);
    if (!dayMatch) return fail("no day found", dateText, "");

    const explicitYear = YEAR_RE.exec(stripped);
    const year = explicitYear ? parseInt(explicitYear[1], 10) : inferYear(month, seasonYear);
    date = { year, month, day: parseInt(dayMatch[1], 10) };
  }

  if (date.month < 1 || date.month > 12) {
    return fail(`month out of range (${date.month})`, dateText, "");
  }
  if (date.day < 1 || date.day > 31) {
    return fail(`day out of range (${date.day})`, dateText, "");
  }
  if (!isRealDate(date)) {
    return fail(`invalid calendar date ${date.year}-${date.month}-${date.day}`, dateText, "");
  }
  return ok(date);
}

function defaultKickoff(): KickoffTime {
  return { ...DEFAULT_KICKOFF, confirmed: false };
}

/**
 * Read a kickoff time. Only the first of several slash-separated options
 * ("noon/3:30/4 p.m.") is used; a trailing AM/PM applies to it when it has
 * none of its own.
 */
export function parseKickoffTime(
  timeText: string,
  assumePmBeforeHour: number | null = DEFAULT_ASSUME_PM_BEFORE_HOUR,
): KickoffTime {
  const text = timeText.replace(/\s+/g, " ").trim();
  const normalized = text.toLowerCase().replace(/\b([ap])\.\s?m\.?/g, "$1m");
  const firstOption = normalized.split("/")[0].trim();
  if (NOON_RE.test(firstOption)) return { hour: 12, minute: 0, confirmed: true };
  if (firstOption === "" || UNANNOUNCED_RE.test(firstOption) || RESULT_RE.test(firstOption)) return defaultKickoff();

  const m = TIME_RE.exec(firstOption);
  if (!m) return defaultKickoff();

  let hour = parseInt(m[1], 10);
  const minute = m[2] ? parseInt(m[2], 10) : 0;
  const marker = m[3] ?? MERIDIEM_RE.exec(normalized)?.[1];
  if (hour > 23 || minute > 59) return defaultKickoff();

  if (marker?.startsWith("p")) {
    if (hour < 12) hour += 12;
  } else if (marker?.startsWith("a")) {
    if (hour > 12) return defaultKickoff();
    if (hour === 12) hour = 0;
  } else if (assumePmBeforeHour !== null && hour < assumePmBeforeHour) {
    hour += 12;
  }

  return { hour, minute, confirmed: true };
}

/**
 * Parse a game's date and kickoff into a zoned start time.
 */
export function parseGameStart(
  dateText: string,
  timeText: string,
  seasonYear: number,
  options: DateTimeParseOptions = {},
): ParseResult<GameStart> {
  const zone = options.zone ?? DEFAULT_SPORT_TIMEZONE;
  const assumePmBeforeHour =
    options.assumePmBeforeHour === undefined ? DEFAULT_ASSUME_PM_BEFORE_HOUR : options.assumePmBeforeHour;

  const date = parseCalendarDate(dateText, seasonYear);
  if (!date.ok) return fail(date.error.reason, dateText, timeText);

  const kickoff = parseKickoffTime(timeText, assumePmBeforeHour);
  const start = DateTime.fromObject(
    { ...date.value, hour: kickoff.hour, minute: kickoff.minute },
    { zone },
  );
  if (!start.isValid) {
    return fail(start.invalidExplanation ?? start.invalidReason ?? "invalid start time", dateText, timeText);
  }

  return ok({ start, timeConfirmed: kickoff.confirmed });
}

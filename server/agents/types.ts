import type { DateTime } from "luxon";
import type { SourceAttemptJson } from "@shared/schema";
import type { ParseError } from "../types/errors";

/**
 * One game as scraped, before any interpretation. Every field is raw text
 * except isHome, which the extraction strategy infers from markup or prefixes.
 */
export interface RawGameRecord {
  dateText: string;
  timeText: string; // may be "", "TBA" or "TBD"
  opponentText: string;
  isHome: boolean;
  locationText: string;
  broadcastText: string;
}

export interface ParsedGame {
  uid: string;
  title: string;
  start: DateTime; // always zoned to the sport timezone
  end: DateTime; // start + GAME_DURATION
  location: string;
  broadcast: string;
  isHome: boolean;
  opponent: string;
  timeConfirmed: boolean;
  rawDateText: string;
  rawTimeText: string;
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError };

export interface ValidationDiagnostics {
  gameCount: number;
  distinctDates: number;
  distinctDateRatio: number;
  spanDays: number;
  suspiciousDefaultDateCount: number;
  incompleteCount: number;
  outOfSeasonCount: number;
}

export interface ValidationVerdict {
  accepted: boolean;
  reasons: string[];
  diagnostics: ValidationDiagnostics;
}

/**
 * A place the schedule can come from. Implementations throw a CalendarFeedError
 * subclass when the source is unreachable or yields nothing recognizable.
 */
export interface IScheduleSource {
  readonly name: string;
  fetchRecords(): Promise<RawGameRecord[]>;
}

export type SourceAttempt = SourceAttemptJson;

export interface ScheduleRunResult {
  seasonYear: number;
  games: ParsedGame[];
  source: string | null;
  verdict: ValidationVerdict | null;
  attempts: SourceAttempt[];
}

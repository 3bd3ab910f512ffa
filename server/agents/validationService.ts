import { GAME_DURATION } from "./dateTimeNormalizer";
import { isPlaceholderOpponent } from "./gameNormalizer";
import type { ParsedGame, ValidationDiagnostics, ValidationVerdict } from "./types";

export interface ValidationOptions {
  minGames: number;
  minDistinctDateRatio: number;
  minSpanDays: number;
  /** The spread rule only applies to batches larger than this. */
  spreadCheckAbove: number;
  /** Month/day that old parsers fell back to on failure. */
  suspiciousDefaultDate: { month: number; day: number };
}

export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
  minGames: 10,
  minDistinctDateRatio: 0.7,
  minSpanDays: 30,
  spreadCheckAbove: 3,
  suspiciousDefaultDate: { month: 9, day: 1 },
};

const GAME_DURATION_MS = (GAME_DURATION.hours * 60 + GAME_DURATION.minutes) * 60 * 1000;

function isComplete(game: ParsedGame): boolean {
  if (isPlaceholderOpponent(game.opponent.trim())) return false;
  const title = game.title.trim();
  if (title === "" || /unknown opponent/i.test(title)) return false;
  if (!game.start.isValid || !game.end.isValid || game.start.zoneName === null) return false;
  return game.end.toMillis() - game.start.toMillis() === GAME_DURATION_MS;
}

// Whole-batch trust gate: a scrape is published only if every rule passes.
export class ValidationService {
  private readonly options: ValidationOptions;

  constructor(options: Partial<ValidationOptions> = {}) {
    this.options = { ...DEFAULT_VALIDATION_OPTIONS, ...options };
  }

  validate(games: ParsedGame[], seasonYear: number): ValidationVerdict {
    const { minGames, minDistinctDateRatio, minSpanDays, spreadCheckAbove, suspiciousDefaultDate } = this.options;

    const dates = games.filter((g) => g.start.isValid).map((g) => g.start.toISODate() ?? "");
    const distinctDates = new Set(dates).size;
    // Span counts calendar dates in the sport timezone, not hours between kickoffs.
    const days = games
      .filter((g) => g.start.isValid)
      .map((g) => g.start.startOf("day"))
      .sort((a, b) => a.toMillis() - b.toMillis());
    const spanDays = days.length > 0 ? Math.round(days[days.length - 1].diff(days[0], "days").days) : 0;
    const diagnostics: ValidationDiagnostics = {
      gameCount: games.length,
      distinctDates,
      distinctDateRatio: games.length > 0 ? distinctDates / games.length : 0,
      spanDays,
      suspiciousDefaultDateCount: games.filter(
        (g) => g.start.month === suspiciousDefaultDate.month && g.start.day === suspiciousDefaultDate.day,
      ).length,
      incompleteCount: games.filter((g) => !isComplete(g)).length,
      outOfSeasonCount: games.filter((g) => g.start.year !== seasonYear && g.start.year !== seasonYear + 1).length,
    };

    if (games.length === 0) {
      return { accepted: false, reasons: ["no games"], diagnostics };
    }

    const reasons: string[] = [];
    if (games.length < minGames) {
      reasons.push(`too few games: ${games.length} < ${minGames}`);
    }
    if (diagnostics.incompleteCount > 0) {
      reasons.push(`incomplete games: ${diagnostics.incompleteCount} of ${games.length} missing opponent, title or start`);
    }
    if (diagnostics.distinctDateRatio < minDistinctDateRatio) {
      reasons.push(`date clustering: ${distinctDates} distinct dates for ${games.length} games`);
    }
    if (games.length > spreadCheckAbove && spanDays < minSpanDays) {
      reasons.push(`date spread too narrow: ${spanDays} days < ${minSpanDays}`);
    }
    if (diagnostics.suspiciousDefaultDateCount > games.length / 2) {
      const mm = String(suspiciousDefaultDate.month).padStart(2, "0");
      const dd = String(suspiciousDefaultDate.day).padStart(2, "0");
      reasons.push(`suspicious default date: ${diagnostics.suspiciousDefaultDateCount} of ${games.length} games on ${mm}-${dd}`);
    }
    if (diagnostics.outOfSeasonCount > 0) {
      reasons.push(`out of season: ${diagnostics.outOfSeasonCount} games outside ${seasonYear}-${seasonYear + 1}`);
    }

    return { accepted: reasons.length === 0, reasons, diagnostics };
  }
}

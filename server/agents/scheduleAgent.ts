import type { IScheduleSource, ParsedGame, RawGameRecord, ScheduleRunResult, SourceAttempt, ValidationVerdict } from "./types";
import { normalizeRecords } from "./gameNormalizer";
import { ValidationService } from "./validationService";
import { DEFAULT_ASSUME_PM_BEFORE_HOUR, DEFAULT_SPORT_TIMEZONE } from "./dateTimeNormalizer";
import { logError, toError } from "../types/errors";
import { withSource } from "../logger";
import { metrics } from "../metrics";

const log = withSource("schedule-agent");

// Parse failures are logged individually up to this many per source.
const MAX_LOGGED_PARSE_FAILURES = 5;

export interface ScheduleAgentOptions {
  teamName: string;
  zone?: string;
  assumePmBeforeHour?: number | null;
  validator?: ValidationService;
}

/**
 * ScheduleAgent
 *
 * Tries each source in order: fetch raw records, normalize them, and run the
 * whole batch through the validator. The first accepted batch wins. When
 * every source fails the result carries no games and the caller keeps
 * whatever calendar it already has.
 */
export class ScheduleAgent {
  private readonly sources: IScheduleSource[];
  private readonly validator: ValidationService;
  private readonly teamName: string;
  private readonly zone: string;
  private readonly assumePmBeforeHour: number | null;

  constructor(sources: IScheduleSource[], options: ScheduleAgentOptions) {
    this.sources = sources;
    this.validator = options.validator ?? new ValidationService();
    this.teamName = options.teamName;
    this.zone = options.zone ?? DEFAULT_SPORT_TIMEZONE;
    this.assumePmBeforeHour =
      options.assumePmBeforeHour === undefined ? DEFAULT_ASSUME_PM_BEFORE_HOUR : options.assumePmBeforeHour;
  }

  async run(seasonYear: number): Promise<ScheduleRunResult> {
    const attempts: SourceAttempt[] = [];
    let lastVerdict: ValidationVerdict | null = null;

    log.info({ seasonYear, sources: this.sources.map((s) => s.name) }, "starting schedule run");

    for (const source of this.sources) {
      const attempt = await this.trySource(source, seasonYear);
      attempts.push(attempt.report);
      metrics.recordSourceAttempt(source.name, attempt.report.outcome);
      if (attempt.verdict) lastVerdict = attempt.verdict;

      if (attempt.report.outcome === "accepted") {
        log.info({ source: source.name, games: attempt.games.length }, "schedule accepted");
        return { seasonYear, games: attempt.games, source: source.name, verdict: attempt.verdict, attempts };
      }
    }

    log.warn({ seasonYear, attempts }, "no source produced an acceptable schedule");
    return { seasonYear, games: [], source: null, verdict: lastVerdict, attempts };
  }

  private async trySource(
    source: IScheduleSource,
    seasonYear: number,
  ): Promise<{ report: SourceAttempt; games: ParsedGame[]; verdict: ValidationVerdict | null }> {
    const report: SourceAttempt = {
      source: source.name,
      outcome: "failed",
      recordCount: 0,
      parsedCount: 0,
      droppedCount: 0,
      reasons: [],
    };

    let records: RawGameRecord[];
    try {
      records = await source.fetchRecords();
    } catch (err) {
      const error = toError(err);
      logError(log, error, { operation: "fetchRecords", source: source.name });
      report.error = error.message;
      return { report, games: [], verdict: null };
    }

    const { games, failures } = normalizeRecords(records, {
      seasonYear,
      teamName: this.teamName,
      zone: this.zone,
      assumePmBeforeHour: this.assumePmBeforeHour,
    });
    report.recordCount = records.length;
    report.parsedCount = games.length;
    report.droppedCount = failures.length;
    metrics.recordDroppedRecords(source.name, failures.length);

    for (const failure of failures.slice(0, MAX_LOGGED_PARSE_FAILURES)) {
      log.warn({ source: source.name, reason: failure.reason, dateText: failure.dateText, timeText: failure.timeText }, "record dropped");
    }
    if (failures.length > MAX_LOGGED_PARSE_FAILURES) {
      log.warn({ source: source.name, more: failures.length - MAX_LOGGED_PARSE_FAILURES }, "more records dropped");
    }

    if (games.length === 0) {
      report.outcome = "no_games";
      report.reasons = ["no games"];
      return { report, games, verdict: null };
    }

    const verdict = this.validator.validate(games, seasonYear);
    report.reasons = verdict.reasons;
    if (!verdict.accepted) {
      report.outcome = "rejected";
      metrics.recordValidationRejection(source.name);
      log.warn({ source: source.name, reasons: verdict.reasons, diagnostics: verdict.diagnostics }, "schedule rejected");
      return { report, games: [], verdict };
    }

    report.outcome = "accepted";
    return { report, games, verdict };
  }
}

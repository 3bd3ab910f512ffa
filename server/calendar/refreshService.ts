import type { CycleOutcome, CycleReportJson, GameJson, HealthJson } from "@shared/schema";
import type { ParsedGame, ScheduleRunResult } from "../agents/types";
import { renderCalendar, type CalendarMeta } from "./icsWriter";
import type { CalendarStore } from "./calendarStore";
import { logError, toError } from "../types/errors";
import { withSource } from "../logger";
import { metrics } from "../metrics";

const log = withSource("calendar-refresh");

export interface ScheduleRunner {
  run(seasonYear: number): Promise<ScheduleRunResult>;
}

export interface RefreshServiceDeps {
  agent: ScheduleRunner;
  store: CalendarStore;
  meta: CalendarMeta;
  resolveSeasonYear: () => number;
}

export function toGameJson(game: ParsedGame): GameJson {
  return {
    uid: game.uid,
    title: game.title,
    start: game.start.toISO() ?? "",
    end: game.end.toISO() ?? "",
    location: game.location,
    broadcast: game.broadcast,
    isHome: game.isHome,
    opponent: game.opponent,
    timeConfirmed: game.timeConfirmed,
    rawDateText: game.rawDateText,
    rawTimeText: game.rawTimeText,
  };
}

/**
 * CalendarRefreshService
 *
 * Owns the published calendar. One refresh cycle runs at a time; a trigger
 * that arrives while a cycle is running gets that cycle's report. A cycle
 * replaces the calendar only when a source produced an accepted schedule,
 * otherwise the previous file stays in place.
 */
export class CalendarRefreshService {
  private inFlight: Promise<CycleReportJson> | null = null;
  private games: ParsedGame[] = [];
  private published = false;
  private lastSuccessAt: Date | null = null;
  private lastFailureAt: Date | null = null;
  private lastSource: string | null = null;
  private lastReport: CycleReportJson | null = null;

  constructor(private readonly deps: RefreshServiceDeps) {}

  /**
   * Pick up a calendar left by a previous process so it is served before the first cycle ends.
   */
  async init(): Promise<void> {
    this.published = (await this.deps.store.read()) !== null;
    if (this.published) log.info({ file: this.deps.store.filePath }, "serving previously published calendar");
  }

  runCycle(trigger = "manual"): Promise<CycleReportJson> {
    if (this.inFlight) {
      log.info({ trigger }, "refresh already running; joining it");
      return this.inFlight;
    }
    this.inFlight = this.execute(trigger).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async execute(trigger: string): Promise<CycleReportJson> {
    const startedAt = new Date();
    const t0 = performance.now();
    let outcome: CycleOutcome = "failed";
    let result: ScheduleRunResult | null = null;
    let errorMessage: string | undefined;
    let seasonYear = 0;

    try {
      seasonYear = this.deps.resolveSeasonYear();
      log.info({ trigger, seasonYear }, "refresh cycle started");
      result = await this.deps.agent.run(seasonYear);

      if (result.source !== null && result.games.length > 0) {
        await this.deps.store.write(renderCalendar(result.games, this.deps.meta));
        this.games = result.games;
        this.published = true;
        this.lastSuccessAt = new Date();
        this.lastSource = result.source;
        metrics.setPublishedGames(result.games.length);
        outcome = "published";
      } else {
        this.lastFailureAt = new Date();
        log.warn({ trigger, seasonYear }, "no acceptable schedule; keeping the published calendar");
      }
    } catch (err) {
      const error = toError(err);
      logError(log, error, { operation: "runCycle", trigger });
      this.lastFailureAt = new Date();
      errorMessage = error.message;
      outcome = "error";
    }

    const durationMs = Math.round(performance.now() - t0);
    metrics.recordCycle(outcome, durationMs);

    const report: CycleReportJson = {
      trigger,
      seasonYear,
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      durationMs,
      outcome,
      source: outcome === "published" && result ? result.source : null,
      gameCount: outcome === "published" && result ? result.games.length : 0,
      reasons: result?.verdict?.reasons ?? [],
      attempts: result?.attempts ?? [],
    };
    if (errorMessage !== undefined) report.error = errorMessage;
    this.lastReport = report;

    log.info({ trigger, outcome, durationMs, source: report.source, games: report.gameCount }, "refresh cycle finished");
    return report;
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  isPublished(): boolean {
    return this.published;
  }

  getGames(): ParsedGame[] {
    return this.games;
  }

  getLastReport(): CycleReportJson | null {
    return this.lastReport;
  }

  readCalendar(): Promise<string | null> {
    return this.deps.store.read();
  }

  getHealth(): HealthJson {
    let status: HealthJson["status"] = "starting";
    if (this.lastReport) {
      status = this.lastReport.outcome === "published" ? "ok" : "degraded";
    } else if (this.published) {
      status = "ok";
    }
    return {
      status,
      calendarPublished: this.published,
      gameCount: this.games.length,
      lastSuccessAt: this.lastSuccessAt?.toISOString() ?? null,
      lastFailureAt: this.lastFailureAt?.toISOString() ?? null,
      lastSource: this.lastSource,
      cycleInFlight: this.inFlight !== null,
      lastCycle: this.lastReport,
    };
  }
}

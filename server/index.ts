import { config, warnMissingOptionalEnv } from "./config";
import { withSource } from "./logger";
import { createApp } from "./app";
import { createScheduleSources } from "./agents/adapters";
import { ScheduleAgent } from "./agents/scheduleAgent";
import { ValidationService } from "./agents/validationService";
import { currentSeason } from "./agents/season";
import { CalendarStore } from "./calendar/calendarStore";
import { CalendarRefreshService } from "./calendar/refreshService";
import { initWorkers, type RefreshScheduler } from "./jobs/workers";
import { toError } from "./types/errors";

const bootLog = withSource("boot");

async function main(): Promise<void> {
  warnMissingOptionalEnv();
  bootLog.info({ env: config.nodeEnv, port: config.port }, "starting server");
  bootLog.info(
    {
      team: config.teamName,
      primaryUrls: config.sources.primaryUrls,
      secondaryUrls: config.sources.secondaryUrls,
      fallbackScheduleFile: config.sources.fallbackScheduleFile ?? null,
      calendarFile: config.calendarFile,
      seasonYearOverride: config.seasonYearOverride ?? null,
      timezone: config.sportTimezone,
      assumePmBeforeHour: config.assumePmBeforeHour,
      refreshCron: config.refreshCron,
      redisConfigured: !!config.redisUrl,
      scraper: {
        timeoutMs: config.scraperTimeoutMs,
        maxRetries: config.scraperMaxRetries,
        retryDelayMs: config.scraperRetryDelayMs,
      },
    },
    "environment summary",
  );

  const agent = new ScheduleAgent(createScheduleSources(), {
    teamName: config.teamName,
    zone: config.sportTimezone,
    assumePmBeforeHour: config.assumePmBeforeHour,
    validator: new ValidationService({ minGames: config.minGames }),
  });

  const service = new CalendarRefreshService({
    agent,
    store: new CalendarStore(config.calendarFile),
    meta: {
      calName: config.calendarName,
      productId: "football-calendar-feed",
      zone: config.sportTimezone,
    },
    resolveSeasonYear: () => config.seasonYearOverride ?? currentSeason(config.sportTimezone),
  });
  await service.init();

  const app = createApp({
    service,
    calendarName: config.calendarName,
    publicBaseUrl: config.publicBaseUrl,
    manualRefreshEnabled: config.manualRefreshEnabled,
  });

  const server = app.listen(config.port, "0.0.0.0", () => {
    bootLog.info({ port: config.port }, "serving");
  });

  // First cycle runs right away; the scheduler takes over from there.
  void service.runCycle("startup");

  let scheduler: RefreshScheduler | undefined;
  try {
    scheduler = await initWorkers(service);
    bootLog.info({ mode: scheduler.mode }, "refresh scheduler initialized");
  } catch (err) {
    bootLog.error({ err: toError(err).message }, "failed to initialize refresh scheduler");
  }

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    bootLog.info({ signal }, "shutting down");
    try {
      await scheduler?.stop();
    } catch (err) {
      bootLog.warn({ err: toError(err).message }, "scheduler stop failed");
    }
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  bootLog.fatal({ err: toError(err).message }, "startup failed");
  process.exit(1);
});

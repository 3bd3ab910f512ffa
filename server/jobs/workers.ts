import { Worker, type Queue } from "bullmq";
import { DateTime } from "luxon";
import type { CycleReportJson } from "@shared/schema";
import { config } from "../config";
import { withSource } from "../logger";
import { logError, toError } from "../types/errors";
import type { CalendarRefreshService } from "../calendar/refreshService";
import { createRedis, closeRedis } from "./redis";
import {
  CALENDAR_REFRESH_QUEUE,
  DAILY_REFRESH_JOB_ID,
  createRefreshQueue,
  defaultJobOptions,
  type CalendarRefreshPayload,
} from "./queues";

const log = withSource("jobs");

export interface SchedulerOptions {
  redisUrl?: string;
  cron: string;
  zone: string;
  prefix: string;
}

export interface RefreshScheduler {
  mode: "bullmq" | "timer";
  stop(): Promise<void>;
}

/** The slice of the refresh service the schedulers drive. */
export type RefreshRunner = Pick<CalendarRefreshService, "runCycle">;

export interface DailyTime {
  hour: number;
  minute: number;
}

const DEFAULT_DAILY_TIME: DailyTime = { hour: 3, minute: 0 };

/**
 * Read a once-a-day cron pattern ("M H * * *"). Anything else returns null.
 */
export function parseDailyCron(pattern: string): DailyTime | null {
  const m = /^(\d{1,2})\s+(\d{1,2})\s+\*\s+\*\s+\*$/.exec(pattern.trim());
  if (!m) return null;
  const minute = Number(m[1]);
  const hour = Number(m[2]);
  if (minute > 59 || hour > 23) return null;
  return { hour, minute };
}

/**
 * Next occurrence of the wall-clock time in `zone` strictly after `now`.
 */
export function nextDailyRun(now: DateTime, time: DailyTime, zone: string): DateTime {
  const local = now.setZone(zone);
  const today = local.set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 });
  return today > local ? today : today.plus({ days: 1 });
}

/**
 * In-process fallback when no Redis is configured: a timer armed for the next
 * daily run, re-armed after every cycle.
 */
export function startDailyTimer(service: RefreshRunner, options: SchedulerOptions): RefreshScheduler {
  let time = parseDailyCron(options.cron);
  if (!time) {
    log.warn({ cron: options.cron }, "refresh pattern is not a daily time; timer falls back to 03:00");
    time = DEFAULT_DAILY_TIME;
  }
  const daily = time;
  let timer: NodeJS.Timeout | null = null;
  let stopped = false;

  const fire = async (): Promise<void> => {
    try {
      await service.runCycle("schedule");
    } catch (err) {
      logError(log, toError(err), { operation: "scheduledRefresh" });
    } finally {
      arm();
    }
  };

  function arm(): void {
    if (stopped) return;
    const now = DateTime.now();
    const next = nextDailyRun(now, daily, options.zone);
    timer = setTimeout(() => {
      void fire();
    }, next.toMillis() - now.toMillis());
    log.info({ nextRunAt: next.toISO() }, "daily refresh timer armed");
  }

  arm();

  return {
    mode: "timer",
    async stop() {
      stopped = true;
      if (timer) clearTimeout(timer);
    },
  };
}

/**
 * Drop repeatable refresh jobs left behind by an earlier pattern or timezone.
 */
export async function reconcileRepeatableJobs(
  queue: Queue<CalendarRefreshPayload>,
  cron: string,
  zone: string,
): Promise<number> {
  let removed = 0;
  for (const job of await queue.getRepeatableJobs()) {
    if (job.name !== CALENDAR_REFRESH_QUEUE) continue;
    if (job.pattern === cron && job.tz === zone) continue;
    await queue.removeRepeatableByKey(job.key);
    removed++;
    log.info({ key: job.key, pattern: job.pattern }, "removed obsolete repeatable refresh job");
  }
  return removed;
}

async function startBullmqScheduler(
  service: RefreshRunner,
  options: SchedulerOptions & { redisUrl: string },
): Promise<RefreshScheduler> {
  const queueConnection = createRedis(options.redisUrl);
  const workerConnection = createRedis(options.redisUrl);
  const queue = createRefreshQueue(queueConnection, options.prefix);

  const worker = new Worker<CalendarRefreshPayload, CycleReportJson>(
    CALENDAR_REFRESH_QUEUE,
    async (job) => {
      await job.log(`calendar_refresh start: trigger=${job.data.trigger}`);
      const report = await service.runCycle(job.data.trigger);
      await job.log(`calendar_refresh outcome: ${report.outcome}`);
      return report;
    },
    { connection: workerConnection, prefix: options.prefix, concurrency: 1 },
  );

  worker.on("failed", (job, err) => {
    log.error({ jobId: job?.id, err: err.message }, "calendar_refresh failed");
  });
  worker.on("completed", (job, report) => {
    log.info({ jobId: job.id, outcome: report.outcome, games: report.gameCount }, "calendar_refresh completed");
  });

  try {
    await reconcileRepeatableJobs(queue, options.cron, options.zone);
  } catch (err) {
    log.warn({ err: toError(err).message }, "reconcile repeatables failed");
  }

  await queue.add(
    CALENDAR_REFRESH_QUEUE,
    { trigger: "schedule" },
    { ...defaultJobOptions(), jobId: DAILY_REFRESH_JOB_ID, repeat: { pattern: options.cron, tz: options.zone } },
  );
  log.info({ pattern: options.cron, tz: options.zone }, "repeatable calendar_refresh scheduled");

  return {
    mode: "bullmq",
    async stop() {
      await worker.close();
      await queue.close();
      await closeRedis(workerConnection);
      await closeRedis(queueConnection);
    },
  };
}

export async function initWorkers(
  service: RefreshRunner,
  options: SchedulerOptions = {
    redisUrl: config.redisUrl,
    cron: config.refreshCron,
    zone: config.sportTimezone,
    prefix: config.jobQueuePrefix,
  },
): Promise<RefreshScheduler> {
  const { redisUrl } = options;
  if (!redisUrl) {
    log.warn("REDIS_URL not set; using in-process refresh timer");
    return startDailyTimer(service, options);
  }
  return startBullmqScheduler(service, { ...options, redisUrl });
}

import { Queue, type JobsOptions } from "bullmq";
import type { Redis } from "ioredis";
import { config } from "../config";

export const CALENDAR_REFRESH_QUEUE = "calendar_refresh";
export const DAILY_REFRESH_JOB_ID = "calendar_refresh:daily";

export type RefreshTrigger = "startup" | "schedule" | "manual";

export interface CalendarRefreshPayload {
  trigger: RefreshTrigger;
}

export function createRefreshQueue(connection: Redis, prefix: string = config.jobQueuePrefix): Queue<CalendarRefreshPayload> {
  return new Queue<CalendarRefreshPayload>(CALENDAR_REFRESH_QUEUE, { connection, prefix });
}

// A cycle handles its own failures, so a job is never retried.
export function defaultJobOptions(): JobsOptions {
  return {
    attempts: 1,
    removeOnComplete: true,
    removeOnFail: 20,
  };
}

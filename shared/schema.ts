import { z } from "zod";

/**
 * Hand-maintained schedule kept as the last-resort source. Dates and times
 * are written the way a schedule page would show them and go through the
 * same normalizer as scraped text.
 */
export const fallbackGameSchema = z.object({
  date: z.string().min(1),
  time: z.string().default(""),
  opponent: z.string().min(1),
  home: z.boolean(),
  location: z.string().default(""),
  broadcast: z.string().default(""),
});

export const fallbackScheduleSchema = z.object({
  version: z.literal(1),
  season: z.number().int().min(2000).max(2100),
  team: z.string().optional(),
  games: z.array(fallbackGameSchema).min(1),
});

export type FallbackSchedule = z.infer<typeof fallbackScheduleSchema>;

/**
 * Wire shape of a parsed game on the JSON endpoints.
 */
export interface GameJson {
  uid: string;
  title: string;
  start: string;
  end: string;
  location: string;
  broadcast: string;
  isHome: boolean;
  opponent: string;
  timeConfirmed: boolean;
  rawDateText: string;
  rawTimeText: string;
}

export interface SourceAttemptJson {
  source: string;
  outcome: "accepted" | "rejected" | "no_games" | "failed";
  recordCount: number;
  parsedCount: number;
  droppedCount: number;
  reasons: string[];
  error?: string;
}

export type CycleOutcome = "published" | "failed" | "error";

export interface CycleReportJson {
  trigger: string;
  seasonYear: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  outcome: CycleOutcome;
  source: string | null;
  gameCount: number;
  reasons: string[];
  attempts: SourceAttemptJson[];
  error?: string;
}

export interface HealthJson {
  status: "ok" | "degraded" | "starting";
  calendarPublished: boolean;
  gameCount: number;
  lastSuccessAt: string | null;
  lastFailureAt: string | null;
  lastSource: string | null;
  cycleInFlight: boolean;
  lastCycle: CycleReportJson | null;
}

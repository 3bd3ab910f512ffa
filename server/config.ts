import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  // Team and feed identity
  TEAM_NAME: z.string().optional(),
  CALENDAR_NAME: z.string().optional(),
  PUBLIC_BASE_URL: z.string().optional(),
  // Schedule sources, tried in order
  PRIMARY_SCHEDULE_URLS: z.string().optional(),
  SECONDARY_SCHEDULE_URLS: z.string().optional(),
  FALLBACK_SCHEDULE_FILE: z.string().optional(),
  // Calendar output
  CALENDAR_FILE: z.string().optional(),
  // Date parsing and validation
  SEASON_YEAR: z.string().regex(/^\d{4}$/, "SEASON_YEAR must be a 4-digit year").optional(),
  SPORT_TIMEZONE: z.string().optional(),
  ASSUME_PM_BEFORE_HOUR: z.string().optional(),
  MIN_GAMES: z.string().optional(),
  // Refresh scheduling
  REFRESH_CRON: z.string().optional(),
  REDIS_URL: z.string().optional(),
  JOB_QUEUE_PREFIX: z.string().optional(),
  MANUAL_REFRESH_ENABLED: z.string().optional(),
  // Web scraping configuration
  SCRAPER_USER_AGENT: z.string().optional(),
  SCRAPER_TIMEOUT_MS: z.string().optional(),
  SCRAPER_MAX_RETRIES: z.string().optional(),
  SCRAPER_RETRY_DELAY_MS: z.string().optional(),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  throw new Error(`Invalid environment variables: ${parsed.error.message}`);
}

const env = parsed.data;

function toInt(val: string | undefined, fallback: number): number {
  const n = parseInt(val ?? "", 10);
  return Number.isFinite(n) ? n : fallback;
}

function parseCsvList(val: string | undefined): string[] {
  if (!val) return [];
  return val
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

function isTruthy(val: string | undefined): boolean {
  return ["1", "true", "yes"].includes((val ?? "").toLowerCase());
}

/**
 * Hour below which a kickoff time without an AM/PM marker is read as PM.
 * "off", "none" or an empty value disables the bias.
 */
export function parseAssumePmBeforeHour(val: string | undefined): number | null {
  if (val === undefined) return 8;
  const trimmed = val.trim().toLowerCase();
  if (trimmed === "" || trimmed === "off" || trimmed === "none") return null;
  const n = parseInt(trimmed, 10);
  if (!Number.isFinite(n) || n < 0 || n > 12) {
    console.warn(`ASSUME_PM_BEFORE_HOUR out of range (${val}). Using default 8.`);
    return 8;
  }
  return n;
}

const DEFAULT_PRIMARY_URLS = [
  "https://gopsusports.com/sports/football/schedule",
  "https://gopsusports.com/sports/football/schedule/list",
];

const DEFAULT_SECONDARY_URLS = [
  "https://www.espn.com/college-football/team/schedule/_/id/213/penn-state-nittany-lions",
];

const primaryUrls = parseCsvList(env.PRIMARY_SCHEDULE_URLS);
const secondaryUrls = parseCsvList(env.SECONDARY_SCHEDULE_URLS);
const teamName = env.TEAM_NAME?.trim() || "Penn State";

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === "development",
  port: toInt(env.PORT, 5000),
  logLevel: env.LOG_LEVEL ?? "info",
  teamName,
  calendarName: env.CALENDAR_NAME?.trim() || `${teamName} Football`,
  publicBaseUrl: env.PUBLIC_BASE_URL?.trim().replace(/\/+$/, "") || undefined,
  sources: {
    primaryUrls: primaryUrls.length > 0 ? primaryUrls : DEFAULT_PRIMARY_URLS,
    secondaryUrls: secondaryUrls.length > 0 ? secondaryUrls : DEFAULT_SECONDARY_URLS,
    fallbackScheduleFile: env.FALLBACK_SCHEDULE_FILE?.trim() || undefined,
  },
  calendarFile: env.CALENDAR_FILE?.trim() || "data/football.ics",
  seasonYearOverride: env.SEASON_YEAR ? parseInt(env.SEASON_YEAR, 10) : undefined,
  sportTimezone: env.SPORT_TIMEZONE?.trim() || "America/New_York",
  assumePmBeforeHour: parseAssumePmBeforeHour(env.ASSUME_PM_BEFORE_HOUR),
  minGames: Math.max(1, toInt(env.MIN_GAMES, 10)),
  refreshCron: env.REFRESH_CRON ?? "0 3 * * *", // daily at 03:00 in the sport timezone
  redisUrl: env.REDIS_URL,
  jobQueuePrefix: env.JOB_QUEUE_PREFIX ?? "jobs",
  manualRefreshEnabled: isTruthy(env.MANUAL_REFRESH_ENABLED),
  // Web scraping configuration
  scraperUserAgent:
    env.SCRAPER_USER_AGENT ??
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  scraperTimeoutMs: toInt(env.SCRAPER_TIMEOUT_MS, 30_000),
  scraperMaxRetries: Math.max(1, toInt(env.SCRAPER_MAX_RETRIES, 2)),
  scraperRetryDelayMs: Math.max(0, toInt(env.SCRAPER_RETRY_DELAY_MS, 2_000)),
} as const;

export function warnMissingOptionalEnv(): void {
  const notes: string[] = [];
  if (!config.redisUrl) notes.push("REDIS_URL not set; using in-process refresh timer");
  if (!config.publicBaseUrl) notes.push("PUBLIC_BASE_URL not set; landing page derives the feed URL from the request");
  for (const note of notes) {
    console.warn(note);
  }
}

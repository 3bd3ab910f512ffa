import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { app: "football-calendar-feed" },
});

export type Logger = pino.Logger;

export function withSource(source: string) {
  return logger.child({ source });
}

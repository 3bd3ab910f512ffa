import type { Express, NextFunction, Request, Response } from "express";
import type { CalendarRefreshService } from "./calendar/refreshService";
import { toGameJson } from "./calendar/refreshService";
import { renderDebugPage, renderLandingPage } from "./pages";
import { metrics } from "./metrics";
import { withSource } from "./logger";
import {
  CalendarFeedError,
  ERROR_CODES,
  ServiceUnavailableError,
  createErrorResponse,
  logError,
  toError,
} from "./types/errors";

export interface RouteDeps {
  service: CalendarRefreshService;
  calendarName: string;
  publicBaseUrl?: string;
  manualRefreshEnabled: boolean;
}

export const CALENDAR_PATH = "/calendar.ics";

function requestIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === "string" ? id : undefined;
}

function feedUrlFor(req: Request, publicBaseUrl?: string): string {
  const base = publicBaseUrl ?? `${req.protocol}://${req.get("host") ?? "localhost"}`;
  return `${base}${CALENDAR_PATH}`;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  const { service } = deps;

  app.get("/", (req, res) => {
    res.type("html").send(
      renderLandingPage({
        calendarName: deps.calendarName,
        feedUrl: feedUrlFor(req, deps.publicBaseUrl),
        health: service.getHealth(),
      }),
    );
  });

  app.get(CALENDAR_PATH, async (_req, res, next) => {
    try {
      const text = await service.readCalendar();
      if (text === null) {
        throw new ServiceUnavailableError("Calendar has not been published yet", { retryAfterSeconds: 60 });
      }
      res.setHeader("Content-Disposition", 'inline; filename="football.ics"');
      res.setHeader("Cache-Control", "public, max-age=900");
      res.type("text/calendar").send(text);
    } catch (err) {
      next(err);
    }
  });

  app.get("/debug", (_req, res) => {
    res.type("html").send(
      renderDebugPage({
        calendarName: deps.calendarName,
        games: service.getGames(),
        report: service.getLastReport(),
      }),
    );
  });

  app.get("/api/games", (_req, res) => {
    const report = service.getLastReport();
    res.json({
      seasonYear: report?.seasonYear ?? null,
      games: service.getGames().map(toGameJson),
    });
  });

  app.get("/api/health", (_req, res) => {
    res.json(service.getHealth());
  });

  app.get("/metrics", async (_req, res, next) => {
    try {
      const content = await metrics.getMetricsContent();
      res.setHeader("Content-Type", metrics.register.contentType);
      res.send(content);
    } catch (err) {
      next(err);
    }
  });

  app.post("/api/refresh", async (_req, res, next) => {
    if (!deps.manualRefreshEnabled) {
      next(new CalendarFeedError("Manual refresh is disabled", ERROR_CODES.NOT_FOUND, 404));
      return;
    }
    try {
      const report = await service.runCycle("manual");
      res.json(report);
    } catch (err) {
      next(err);
    }
  });
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new CalendarFeedError(`No route for ${req.method} ${req.path}`, ERROR_CODES.NOT_FOUND, 404));
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const error = toError(err);
  const requestId = requestIdOf(res);
  const status = error instanceof CalendarFeedError ? error.statusCode : 500;

  if (status >= 500) {
    logError(withSource("api-error"), error, { operation: `${req.method} ${req.path}`, requestId });
  }
  if (error instanceof ServiceUnavailableError) {
    res.setHeader("Retry-After", "60");
  }
  res.status(status).json(createErrorResponse(error, requestId));
}

import express, { type Express } from "express";
import { randomUUID } from "crypto";
import { metrics } from "./metrics";
import { withSource } from "./logger";
import { errorHandler, notFoundHandler, registerRoutes, type RouteDeps } from "./routes";

const log = withSource("http");

export function createApp(deps: RouteDeps): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json());

  // Attach a per-request ID early for structured logging and tracing
  app.use((_req, res, next) => {
    const id = randomUUID();
    res.locals.requestId = id;
    res.setHeader("X-Request-Id", id);
    next();
  });

  app.use((req, res, next) => {
    const start = performance.now();
    res.on("finish", () => {
      const durationMs = Math.round(performance.now() - start);
      metrics.observeApiRequest(req.path, req.method, res.statusCode, durationMs);
      log.debug({ method: req.method, path: req.path, status: res.statusCode, durationMs }, "request");
    });
    next();
  });

  registerRoutes(app, deps);
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

import express from "express";
import type { ErrorRequestHandler, Express } from "express";
import cors from "cors";
import { createRunsRouter } from "./routes/runs";
import type { RunsRouterOptions } from "./routes/runs";
import type { StreamOrchestrator } from "./orchestrator/streamOrchestrator";
import type { ChannelRegistry } from "./channel/registry";
import { componentLogger, requestIdMiddleware, requestLoggerMiddleware } from "./observability/logger";
import type { Logger } from "./observability/logger";
import { initDefaultMetrics, metricsMiddleware, register } from "./observability/metrics";
import { errorMessage } from "./errors";

export interface AppServices {
  orchestrator: StreamOrchestrator;
  registry: ChannelRegistry;
}

export interface AppOptions extends RunsRouterOptions {
  corsOrigins?: string[];
}

const defaultAllowedHeaders = ["Content-Type", "Accept", "Origin", "X-Requested-With", "Last-Event-ID"];

function corsOptions(origins: string[]): cors.CorsOptions {
  if (origins.length === 0) {
    return { origin: true, allowedHeaders: defaultAllowedHeaders, credentials: false };
  }
  const allowed = new Set(origins);
  return {
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow non-browser (e.g., curl, server-to-server) requests that don't set Origin
      if (!origin) return callback(null, true);
      if (allowed.has(origin)) return callback(null, true);
      return callback(new Error("Not allowed by CORS"));
    },
    allowedHeaders: defaultAllowedHeaders,
    credentials: false
  };
}

function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    log.error({ msg: "request failed", method: req.method, path: req.path, err: errorMessage(err) });
    if (res.headersSent) return next(err);
    res.status(500).json({ error: errorMessage(err) });
  };
}

export function createApp(services: AppServices, options: AppOptions = {}): Express {
  initDefaultMetrics();
  const log = options.logger ?? componentLogger("http");
  const app = express();

  app.use(cors(corsOptions(options.corsOrigins ?? [])));
  app.use(express.json());

  app.use(requestIdMiddleware());
  app.use(requestLoggerMiddleware(log));
  app.use(metricsMiddleware());

  app.get("/ready", (_req, res) => {
    const health = services.registry.validateConfiguration();
    res.status(health.healthy ? 200 : 503).json({ ok: health.healthy, ...health });
  });

  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", register.contentType);
    const body = await register.metrics();
    res.send(body);
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "runstream" });
  });

  app.use("/runs", createRunsRouter(services.orchestrator, options));
  app.use(errorHandler(log));

  return app;
}

import { Registry, collectDefaultMetrics, Counter, Gauge, Histogram } from "prom-client";
import type { Request, Response, NextFunction } from "express";

/**
 * Custom Registry so we can expose default + custom metrics on /metrics
 */
export const register = new Registry();

/**
 * Histogram to measure HTTP request durations with labels method, route, status_code
 */
export const httpRequestDurationSeconds = new Histogram({
  name: "http_request_duration_seconds",
  help: "Duration of HTTP requests in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [register],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5]
});

export const channelEventsPublished = new Counter({
  name: "runstream_channel_events_published_total",
  help: "Events delivered to a run channel",
  labelNames: ["backend"] as const,
  registers: [register]
});

export const eventsStored = new Counter({
  name: "runstream_events_stored_total",
  help: "Events written to the event log",
  labelNames: ["event"] as const,
  registers: [register]
});

export const eventsRejected = new Counter({
  name: "runstream_events_rejected_total",
  help: "Engine events dropped because the run already reached a terminal state",
  labelNames: ["stage"] as const,
  registers: [register]
});

export const backendFallbacks = new Counter({
  name: "runstream_channel_backend_fallbacks_total",
  help: "Times the channel registry degraded from Redis to the in-process backend",
  registers: [register]
});

export const liveChannels = new Gauge({
  name: "runstream_live_channels",
  help: "Channels currently held by the registry",
  labelNames: ["backend"] as const,
  registers: [register]
});

export const openSubscriptions = new Gauge({
  name: "runstream_open_subscriptions",
  help: "Stream subscribers currently attached to a run",
  registers: [register]
});

let defaultsCollected = false;

/**
 * Initialize collection of default Node/process metrics on the custom registry.
 * Safe to call more than once.
 */
export function initDefaultMetrics(): void {
  if (defaultsCollected) return;
  collectDefaultMetrics({ register });
  defaultsCollected = true;
}

/**
 * Express middleware that measures request duration and records into the histogram.
 * Uses req.route?.path when available, otherwise falls back to req.path.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime();
    res.on("finish", () => {
      const diff = process.hrtime(start);
      const durationSeconds = diff[0] + diff[1] / 1e9;
      const routePath: unknown = req.route?.path;
      const route = typeof routePath === "string" ? `${req.baseUrl}${routePath}` : req.path;
      httpRequestDurationSeconds.labels(req.method, route, String(res.statusCode)).observe(durationSeconds);
    });
    next();
  };
}

import type { ChannelMode } from "./channel";
import type { EventLogBackend } from "./eventlog";

export interface StreamingConfig {
  port: number;
  logLevel: string;
  corsOrigins: string[];
  redisUrl: string | null;
  keyPrefix: string;
  channel: {
    mode: ChannelMode;
    pollIntervalMs: number;
    retentionSeconds: number;
    janitorIntervalMs: number;
    finishedFlagTtlSeconds: number;
  };
  eventLog: {
    backend: EventLogBackend;
    retentionSeconds: number;
    pruneIntervalMs: number;
  };
  cancelWaitTimeoutMs: number;
}

export interface ConfigWarning {
  key: string;
  value: string;
  message: string;
}

function positiveNumber(raw: string | undefined, fallback: number): number {
  const n = Number(raw ?? fallback);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function nonEmpty(raw: string | undefined): string | null {
  return typeof raw === "string" && raw.trim() !== "" ? raw.trim() : null;
}

/**
 * Reads the service configuration from environment variables.
 * Invalid enum values fall back to their default and are reported in `warnings`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): { config: StreamingConfig; warnings: ConfigWarning[] } {
  const warnings: ConfigWarning[] = [];
  const redisUrl = nonEmpty(env.REDIS_URL);

  const rawMode = (env.STREAMING_BROKER ?? "auto").trim().toLowerCase();
  let mode: ChannelMode = "auto";
  if (rawMode === "auto" || rawMode === "redis" || rawMode === "memory") {
    mode = rawMode;
  } else {
    warnings.push({ key: "STREAMING_BROKER", value: rawMode, message: "expected auto|redis|memory; using auto" });
  }

  const rawBackend = nonEmpty(env.EVENT_LOG_BACKEND)?.toLowerCase();
  let backend: EventLogBackend = redisUrl ? "redis" : "memory";
  if (rawBackend === "memory" || rawBackend === "redis") {
    backend = rawBackend;
  } else if (rawBackend !== undefined) {
    warnings.push({ key: "EVENT_LOG_BACKEND", value: rawBackend, message: `expected memory|redis; using ${backend}` });
  }

  const corsOrigins = (env.CORS_ORIGINS ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");

  const config: StreamingConfig = {
    port: positiveNumber(env.PORT, 7070),
    logLevel: nonEmpty(env.LOG_LEVEL) ?? "info",
    corsOrigins,
    redisUrl,
    keyPrefix: nonEmpty(env.REDIS_KEY_PREFIX) ?? "runstream",
    channel: {
      mode,
      pollIntervalMs: positiveNumber(env.CHANNEL_POLL_INTERVAL_MS, 1000),
      retentionSeconds: positiveNumber(env.CHANNEL_RETENTION_SECONDS, 3600),
      janitorIntervalMs: positiveNumber(env.CHANNEL_JANITOR_INTERVAL_MS, 300_000),
      finishedFlagTtlSeconds: positiveNumber(env.RUN_FINISHED_TTL_SECONDS, 3600)
    },
    eventLog: {
      backend,
      retentionSeconds: positiveNumber(env.EVENT_RETENTION_SECONDS, 86_400),
      pruneIntervalMs: positiveNumber(env.EVENT_PRUNE_INTERVAL_MS, 600_000)
    },
    cancelWaitTimeoutMs: positiveNumber(env.CANCEL_WAIT_TIMEOUT_MS, 10_000)
  };

  return { config, warnings };
}

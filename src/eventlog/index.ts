import type { EventRecordInput, RunInfo, StoredEvent } from "../types";
import type { Logger } from "../observability/logger";
import type { RedisConnection } from "../redis/connection";
import { MemoryEventLog } from "./memoryEventLog";
import { RedisEventLog } from "./redisEventLog";

export type EventLogBackend = "memory" | "redis";

/**
 * Durable per-run history used for replay. Rows are immutable once written.
 */
export interface EventLog {
  readonly backend: EventLogBackend;
  /**
   * Appends one record. Resolves null when the run already has a stored
   * `end` and this record is another one.
   */
  storeEvent(runId: string, record: EventRecordInput): Promise<StoredEvent | null>;
  getAllEvents(runId: string): Promise<StoredEvent[]>;
  getEventsSince(runId: string, lastEventId: string): Promise<StoredEvent[]>;
  getRunInfo(runId: string): Promise<RunInfo | null>;
  cleanupEvents(runId: string): Promise<void>;
  /** Deletes rows created before `cutoff`; resolves the number removed. */
  pruneOlderThan(cutoff: Date): Promise<number>;
  startPruning(): void;
  stopPruning(): Promise<void>;
}

export interface EventLogOptions {
  retentionSeconds?: number;
  pruneIntervalMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface CreateEventLogOptions extends EventLogOptions {
  redis?: RedisConnection | null;
  keyPrefix?: string;
}

/**
 * Returns the Redis-backed log when asked for and a connection is available,
 * otherwise the in-memory one.
 */
export function createEventLog(backend: EventLogBackend, options: CreateEventLogOptions = {}): EventLog {
  const { redis, keyPrefix, ...rest } = options;
  if (backend === "redis" && redis) {
    return new RedisEventLog(redis, keyPrefix ?? "runstream", rest);
  }
  return new MemoryEventLog(rest);
}

export { MemoryEventLog, RedisEventLog };

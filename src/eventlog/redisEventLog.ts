import type { EventRecordInput, RunInfo, StoredEvent } from "../types";
import type { RedisConnection, ScoreBound } from "../redis/connection";
import { errorMessage } from "../errors";
import type { EventLogOptions } from "./index";
import { BaseEventLog, sinceSequence, storeSequence, summarize } from "./base";

const STREAM_MODES: ReadonlySet<string> = new Set([
  "values",
  "messages",
  "messages/partial",
  "messages/complete",
  "messages/metadata",
  "updates",
  "debug",
  "custom",
  "events",
  "end",
  "error"
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStoredEvent(value: unknown): value is StoredEvent {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.runId === "string" &&
    typeof value.seq === "number" &&
    typeof value.event === "string" &&
    STREAM_MODES.has(value.event) &&
    isRecord(value.data) &&
    typeof value.createdAt === "string"
  );
}

function exclusive(score: number): ScoreBound {
  return `(${score}` as const;
}

/**
 * Event log on Redis sorted sets.
 *
 *   {prefix}:events:{runId}           zset, score = seq, member = StoredEvent JSON
 *   {prefix}:events:index             zset, score = createdAt ms, member = [runId, seq]
 *   {prefix}:events:{runId}:terminal  write-once marker for the run's `end`
 */
export class RedisEventLog extends BaseEventLog {
  public readonly backend = "redis";

  public constructor(
    private readonly redis: RedisConnection,
    private readonly keyPrefix: string,
    options: EventLogOptions = {}
  ) {
    super(options);
  }

  private eventsKey(runId: string): string {
    return `${this.keyPrefix}:events:${runId}`;
  }

  private terminalKey(runId: string): string {
    return `${this.keyPrefix}:events:${runId}:terminal`;
  }

  private get indexKey(): string {
    return `${this.keyPrefix}:events:index`;
  }

  private parseRows(runId: string, members: string[]): StoredEvent[] {
    const rows: StoredEvent[] = [];
    for (const member of members) {
      try {
        const parsed: unknown = JSON.parse(member);
        if (isStoredEvent(parsed)) {
          rows.push(parsed);
          continue;
        }
        this.log.warn({ msg: "skipping malformed stored event", runId });
      } catch (err) {
        this.log.warn({ msg: "skipping unparsable stored event", runId, err: errorMessage(err) });
      }
    }
    return rows;
  }

  public async storeEvent(runId: string, record: EventRecordInput): Promise<StoredEvent | null> {
    if (record.event === "end") {
      const first = await this.redis.set(this.terminalKey(runId), record.id, {
        ttlSeconds: this.retentionSeconds,
        onlyIfAbsent: true
      });
      if (!first) {
        this.log.warn({ msg: "rejected second terminal event", runId, eventId: record.id });
        return null;
      }
    }

    const createdAt = this.now();
    const stored: StoredEvent = {
      id: record.id,
      runId,
      seq: storeSequence(record.id),
      event: record.event,
      data: record.data,
      createdAt: createdAt.toISOString()
    };

    await this.redis.zAdd(this.eventsKey(runId), [{ score: stored.seq, value: JSON.stringify(stored) }]);
    await this.redis.zAdd(this.indexKey, [{ score: createdAt.getTime(), value: JSON.stringify([runId, stored.seq]) }]);
    return stored;
  }

  public async getAllEvents(runId: string): Promise<StoredEvent[]> {
    const members = await this.redis.zRangeByScore(this.eventsKey(runId), "-inf", "+inf");
    return this.parseRows(runId, members);
  }

  public async getEventsSince(runId: string, lastEventId: string): Promise<StoredEvent[]> {
    const members = await this.redis.zRangeByScore(this.eventsKey(runId), exclusive(sinceSequence(lastEventId)), "+inf");
    return this.parseRows(runId, members);
  }

  public async getRunInfo(runId: string): Promise<RunInfo | null> {
    const key = this.eventsKey(runId);
    const rows = await this.redis.zCard(key);
    if (rows === 0) return null;
    const [first] = this.parseRows(runId, (await this.redis.zRangeWithScores(key, 0, 0)).map((m) => m.value));
    const [last] = this.parseRows(runId, (await this.redis.zRangeWithScores(key, -1, -1)).map((m) => m.value));
    if (!first || !last) return null;
    return summarize(runId, first, last, rows);
  }

  public async cleanupEvents(runId: string): Promise<void> {
    await this.redis.del([this.eventsKey(runId), this.terminalKey(runId)]);
  }

  public async pruneOlderThan(cutoff: Date): Promise<number> {
    const upper = exclusive(cutoff.getTime());
    const expired = await this.redis.zRangeByScore(this.indexKey, "-inf", upper);
    let removed = 0;
    for (const member of expired) {
      let entry: unknown;
      try {
        entry = JSON.parse(member);
      } catch (err) {
        this.log.warn({ msg: "skipping malformed index entry", err: errorMessage(err) });
        continue;
      }
      if (!Array.isArray(entry)) continue;
      const runId: unknown = entry[0];
      const seq: unknown = entry[1];
      if (typeof runId !== "string" || typeof seq !== "number") continue;
      removed += await this.redis.zRemRangeByScore(this.eventsKey(runId), seq, seq);
    }
    await this.redis.zRemRangeByScore(this.indexKey, "-inf", upper);
    return removed;
  }
}

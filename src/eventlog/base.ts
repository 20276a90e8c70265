import type { EventRecordInput, RunInfo, StoredEvent } from "../types";
import type { Logger } from "../observability/logger";
import { componentLogger } from "../observability/logger";
import { parseEventSequence } from "../wire/eventIds";
import { IntervalTask } from "../util/intervalTask";
import type { EventLog, EventLogBackend, EventLogOptions } from "./index";

/** Sequence used when storing: ids without a numeric suffix sort first. */
export function storeSequence(eventId: string): number {
  return parseEventSequence(eventId) ?? 0;
}

/** Sequence used when resuming: an unknown id replays everything. */
export function sinceSequence(lastEventId: string): number {
  return parseEventSequence(lastEventId) ?? -1;
}

export function summarize(runId: string, first: StoredEvent, last: StoredEvent, rows: number): RunInfo {
  return {
    runId,
    eventCount: rows > 1 ? last.seq - first.seq + 1 : 1,
    lastEventId: last.id,
    lastEventTime: last.createdAt
  };
}

/**
 * Shared retention loop. Subclasses provide storage.
 */
export abstract class BaseEventLog implements EventLog {
  public abstract readonly backend: EventLogBackend;
  protected readonly log: Logger;
  protected readonly retentionSeconds: number;
  protected readonly now: () => Date;
  private readonly pruner: IntervalTask;

  protected constructor(options: EventLogOptions) {
    this.log = options.logger ?? componentLogger("event-log");
    this.retentionSeconds = options.retentionSeconds ?? 86_400;
    this.now = options.now ?? (() => new Date());
    this.pruner = new IntervalTask("event pruning", options.pruneIntervalMs ?? 600_000, () => this.pruneExpired(), this.log);
  }

  public abstract storeEvent(runId: string, record: EventRecordInput): Promise<StoredEvent | null>;
  public abstract getAllEvents(runId: string): Promise<StoredEvent[]>;
  public abstract getEventsSince(runId: string, lastEventId: string): Promise<StoredEvent[]>;
  public abstract getRunInfo(runId: string): Promise<RunInfo | null>;
  public abstract cleanupEvents(runId: string): Promise<void>;
  public abstract pruneOlderThan(cutoff: Date): Promise<number>;

  private async pruneExpired(): Promise<number> {
    const cutoff = new Date(this.now().getTime() - this.retentionSeconds * 1000);
    const removed = await this.pruneOlderThan(cutoff);
    if (removed > 0) this.log.info({ msg: "pruned expired events", removed, cutoff: cutoff.toISOString() });
    return removed;
  }

  public startPruning(): void {
    this.pruner.start();
  }

  public async stopPruning(): Promise<void> {
    await this.pruner.stop();
  }
}

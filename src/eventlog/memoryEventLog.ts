import type { EventRecordInput, RunInfo, StoredEvent } from "../types";
import type { EventLogOptions } from "./index";
import { BaseEventLog, sinceSequence, storeSequence, summarize } from "./base";

/**
 * Process-local event log. Rows are kept per run in `seq` order.
 */
export class MemoryEventLog extends BaseEventLog {
  public readonly backend = "memory";
  private readonly runs = new Map<string, StoredEvent[]>();
  private readonly terminal = new Set<string>();

  public constructor(options: EventLogOptions = {}) {
    super(options);
  }

  public async storeEvent(runId: string, record: EventRecordInput): Promise<StoredEvent | null> {
    if (record.event === "end") {
      if (this.terminal.has(runId)) {
        this.log.warn({ msg: "rejected second terminal event", runId, eventId: record.id });
        return null;
      }
      this.terminal.add(runId);
    }

    const stored: StoredEvent = {
      id: record.id,
      runId,
      seq: storeSequence(record.id),
      event: record.event,
      data: record.data,
      createdAt: this.now().toISOString()
    };

    const rows = this.runs.get(runId) ?? [];
    let at = rows.length;
    while (at > 0 && rows[at - 1].seq > stored.seq) at--;
    rows.splice(at, 0, stored);
    this.runs.set(runId, rows);
    return stored;
  }

  public async getAllEvents(runId: string): Promise<StoredEvent[]> {
    return [...(this.runs.get(runId) ?? [])];
  }

  public async getEventsSince(runId: string, lastEventId: string): Promise<StoredEvent[]> {
    const since = sinceSequence(lastEventId);
    return (this.runs.get(runId) ?? []).filter((row) => row.seq > since);
  }

  public async getRunInfo(runId: string): Promise<RunInfo | null> {
    const rows = this.runs.get(runId);
    if (!rows || rows.length === 0) return null;
    return summarize(runId, rows[0], rows[rows.length - 1], rows.length);
  }

  public async cleanupEvents(runId: string): Promise<void> {
    this.runs.delete(runId);
    this.terminal.delete(runId);
  }

  public async pruneOlderThan(cutoff: Date): Promise<number> {
    const cutoffMs = cutoff.getTime();
    let removed = 0;
    for (const [runId, rows] of this.runs) {
      const kept = rows.filter((row) => Date.parse(row.createdAt) >= cutoffMs);
      removed += rows.length - kept.length;
      if (kept.length === 0) {
        this.runs.delete(runId);
        this.terminal.delete(runId);
      } else if (kept.length !== rows.length) {
        this.runs.set(runId, kept);
      }
    }
    return removed;
  }
}

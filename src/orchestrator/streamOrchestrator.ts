import type {
  EventRecordInput,
  RawEvent,
  RunInfo,
  RunRef,
  RunStatus,
  RunStreamState,
  StoredEvent,
  TerminalStatus
} from "../types";
import { isTerminalStatus } from "../types";
import type { Logger } from "../observability/logger";
import { componentLogger } from "../observability/logger";
import { channelEventsPublished, eventsRejected, eventsStored, openSubscriptions } from "../observability/metrics";
import type { ChannelRegistry } from "../channel/registry";
import type { ChannelSubscription } from "../channel";
import type { EventLog } from "../eventlog";
import { ChannelPublishError, errorMessage } from "../errors";
import { makeEventId, parseEventSequence } from "../wire/eventIds";
import { rawToFrame, storedToFrame, toEventRecord } from "../wire/records";
import type { SseFrame } from "../wire/records";
import { withTimeout } from "../util/timeout";
import type { RunTaskRegistry } from "./runTasks";

export interface StreamOrchestratorOptions {
  registry: ChannelRegistry;
  eventLog: EventLog;
  tasks: RunTaskRegistry;
  logger?: Logger;
  cancelWaitTimeoutMs?: number;
  /** How many retired runs are remembered for state lookups and late-write rejection. */
  retiredCapacity?: number;
}

export interface StopOptions {
  /** Wait for the execution task to settle before resolving. */
  wait?: boolean;
  timeoutMs?: number;
}

export interface StreamOptions {
  signal?: AbortSignal;
}

interface Seal {
  status: TerminalStatus;
  /** Id of the engine `end` that sealed the run; absent when sealed by cancel or error. */
  eventId?: string;
}

const INTERRUPTED_FRAME_MESSAGE = "live stream ended before the run reached a terminal event";

/**
 * Entry point for everything that produces or consumes run events. Ties the
 * channel registry and the event log together, merges replay with the live
 * tail and makes cancellation final.
 *
 * A run is sealed the moment its first terminal outcome is known: a cancel or
 * interrupt request, an error signal, or an engine `end`. Sealing happens
 * synchronously, before any I/O, and from then on engine writes for the run
 * are rejected. An event admitted to the log before the seal is still
 * published, and terminal signals wait for such publishes to finish.
 */
export class StreamOrchestrator {
  private readonly registry: ChannelRegistry;
  private readonly eventLog: EventLog;
  private readonly tasks: RunTaskRegistry;
  private readonly log: Logger;
  private readonly cancelWaitTimeoutMs: number;
  private readonly retiredCapacity: number;

  private readonly counters = new Map<string, number>();
  private readonly seals = new Map<string, Seal>();
  private readonly retired = new Map<string, TerminalStatus | null>();
  /** Ids the log accepted whose channel put is still owed. */
  private readonly admitted = new Map<string, Set<string>>();
  private readonly inFlight = new Map<string, Set<Promise<void>>>();
  private readonly detachRetire: () => void;

  public constructor(options: StreamOrchestratorOptions) {
    this.registry = options.registry;
    this.eventLog = options.eventLog;
    this.tasks = options.tasks;
    this.log = options.logger ?? componentLogger("stream-orchestrator");
    this.cancelWaitTimeoutMs = options.cancelWaitTimeoutMs ?? 10_000;
    this.retiredCapacity = options.retiredCapacity ?? 10_000;
    this.detachRetire = this.registry.onRetire((runId) => this.retire(runId));
  }

  public dispose(): void {
    this.detachRetire();
  }

  // ---- sequence counter ----

  /** Reserves the next id for the run. */
  public nextEventId(runId: string): string {
    const seq = (this.counters.get(runId) ?? 0) + 1;
    this.counters.set(runId, seq);
    return makeEventId(runId, seq);
  }

  /** Seeds the counter from the event log when this process has not seen the run yet. */
  public async resumeCounter(runId: string): Promise<void> {
    if (this.counters.has(runId)) return;
    const info = await this.eventLog.getRunInfo(runId);
    const seq = info ? parseEventSequence(info.lastEventId) : null;
    if (seq !== null) this.advanceCounter(runId, makeEventId(runId, seq));
  }

  private advanceCounter(runId: string, eventId: string): void {
    const seq = parseEventSequence(eventId);
    if (seq === null) return;
    if (seq > (this.counters.get(runId) ?? 0)) this.counters.set(runId, seq);
  }

  // ---- sealing ----

  public hasTerminal(runId: string): boolean {
    return this.seals.has(runId) || this.retired.has(runId);
  }

  private admit(runId: string, eventId: string, event: RawEvent, stage: "log" | "channel"): boolean {
    const seal = this.seals.get(runId);
    if (seal) {
      if (seal.eventId === eventId) return true;
      eventsRejected.labels(stage).inc();
      this.log.debug({ msg: "rejected event for sealed run", runId, eventId, stage, status: seal.status });
      return false;
    }
    if (this.retired.has(runId)) {
      eventsRejected.labels(stage).inc();
      this.log.debug({ msg: "rejected event for retired run", runId, eventId, stage });
      return false;
    }
    if (event.mode === "end") this.seals.set(runId, { status: event.status, eventId });
    return true;
  }

  /** Lifts the seal an engine `end` set when its record never reached the log. */
  private unseal(runId: string, eventId: string): void {
    if (this.seals.get(runId)?.eventId === eventId) this.seals.delete(runId);
  }

  private rememberAdmitted(runId: string, eventId: string): void {
    let ids = this.admitted.get(runId);
    if (!ids) {
      ids = new Set();
      this.admitted.set(runId, ids);
    }
    ids.add(eventId);
  }

  private takeAdmitted(runId: string, eventId: string): boolean {
    const ids = this.admitted.get(runId);
    if (!ids || !ids.delete(eventId)) return false;
    if (ids.size === 0) this.admitted.delete(runId);
    return true;
  }

  private seal(runId: string, status: TerminalStatus): boolean {
    if (this.hasTerminal(runId)) return false;
    this.seals.set(runId, { status });
    return true;
  }

  // ---- writes ----

  /**
   * Publishes an engine event to the run's channel. An id the log already
   * accepted always goes through. Resolves false when the event was dropped.
   */
  public async putToChannel(runId: string, eventId: string, event: RawEvent): Promise<boolean> {
    if (!this.takeAdmitted(runId, eventId) && !this.admit(runId, eventId, event, "channel")) return false;
    return this.writeChannel(runId, eventId, event);
  }

  /** Stores the normalized record of an engine event. Resolves null when it was rejected. */
  public async storeFromRaw(runId: string, eventId: string, event: RawEvent): Promise<StoredEvent | null> {
    if (!this.admit(runId, eventId, event, "log")) return null;
    let stored: StoredEvent | null;
    try {
      stored = await this.writeLog(runId, toEventRecord(eventId, event));
    } catch (err) {
      this.unseal(runId, eventId);
      throw err;
    }
    if (stored) this.rememberAdmitted(runId, eventId);
    return stored;
  }

  /**
   * Stores then publishes an engine event. Admission is decided synchronously,
   * and terminal signals wait until this write is done.
   */
  public async publishEvent(runId: string, eventId: string, event: RawEvent): Promise<boolean> {
    const pending = this.storeThenPut(runId, eventId, event);
    const settled = pending.then(
      () => undefined,
      () => undefined
    );
    let flights = this.inFlight.get(runId);
    if (!flights) {
      flights = new Set();
      this.inFlight.set(runId, flights);
    }
    flights.add(settled);
    try {
      return await pending;
    } finally {
      flights.delete(settled);
      if (flights.size === 0 && this.inFlight.get(runId) === flights) this.inFlight.delete(runId);
    }
  }

  private async storeThenPut(runId: string, eventId: string, event: RawEvent): Promise<boolean> {
    const stored = await this.storeFromRaw(runId, eventId, event);
    if (!stored) return false;
    return this.putToChannel(runId, eventId, event);
  }

  private async writeLog(runId: string, record: EventRecordInput): Promise<StoredEvent | null> {
    const stored = await this.eventLog.storeEvent(runId, record);
    if (stored) eventsStored.labels(record.event).inc();
    else eventsRejected.labels("log").inc();
    return stored;
  }

  private async writeChannel(runId: string, eventId: string, event: RawEvent): Promise<boolean> {
    this.advanceCounter(runId, eventId);
    let channel = this.registry.getOrCreate(runId);
    let accepted: boolean;
    try {
      accepted = await channel.put(eventId, event);
    } catch (err) {
      if (!(err instanceof ChannelPublishError)) throw err;
      this.log.warn({ msg: "channel publish failed, degrading to in-process channels", runId, eventId, err: err.message });
      this.registry.degrade(err.message, err);
      channel = this.registry.getOrCreate(runId);
      accepted = await channel.put(eventId, event);
    }
    if (accepted) channelEventsPublished.labels(channel.backend).inc();
    return accepted;
  }

  /**
   * Writes the terminal events: every record reaches the log before any is
   * published, and a channel failure never keeps `end` out of the log. A log
   * failure is rethrown once the channel has been finished.
   */
  private async finalize(runId: string, events: RawEvent[]): Promise<void> {
    const flights = this.inFlight.get(runId);
    if (flights) await Promise.all([...flights]);
    await this.resumeCounter(runId);

    const terminal = events.map((event) => ({ eventId: this.nextEventId(runId), event }));
    const logFailures: unknown[] = [];
    for (const { eventId, event } of terminal) {
      try {
        await this.writeLog(runId, toEventRecord(eventId, event));
      } catch (err) {
        logFailures.push(err);
        this.log.error({ msg: "terminal event not stored", runId, eventId, err: errorMessage(err) });
      }
    }
    for (const { eventId, event } of terminal) {
      try {
        await this.writeChannel(runId, eventId, event);
      } catch (err) {
        this.log.warn({ msg: "terminal event not published", runId, eventId, err: errorMessage(err) });
      }
    }
    try {
      await this.registry.cleanup(runId);
    } catch (err) {
      this.log.warn({ msg: "channel not marked finished", runId, err: errorMessage(err) });
    }
    if (logFailures.length > 0) throw logFailures[0];
  }

  /** Records `end { status: interrupted }`. Resolves false when the run had already ended. */
  public async signalCancelled(runId: string): Promise<boolean> {
    if (!this.seal(runId, "interrupted")) return false;
    this.log.info({ msg: "run cancelled", runId });
    await this.finalize(runId, [{ mode: "end", status: "interrupted" }]);
    return true;
  }

  /**
   * Records an `error` event followed by `end { status: error }`, so replay
   * alone tells a failed run from a successful one.
   */
  public async signalError(runId: string, message: string, kind = "Error"): Promise<boolean> {
    if (!this.seal(runId, "error")) return false;
    this.log.info({ msg: "run errored", runId, kind, message });
    await this.finalize(runId, [
      { mode: "error", error: kind, message },
      { mode: "end", status: "error", error: message }
    ]);
    return true;
  }

  public async cancelRun(runId: string, options: StopOptions = {}): Promise<RunStatus | null> {
    return this.stopRun(runId, "interrupted", options);
  }

  public async interruptRun(runId: string, options: StopOptions = {}): Promise<RunStatus | null> {
    return this.stopRun(runId, "error", options);
  }

  private async stopRun(runId: string, outcome: TerminalStatus, options: StopOptions): Promise<RunStatus | null> {
    const task = this.tasks.get(runId);
    task?.cancel();

    if (outcome === "interrupted") await this.signalCancelled(runId);
    else await this.signalError(runId, "Run was interrupted");

    if (options.wait && task) {
      await withTimeout(runId, task.settled, options.timeoutMs ?? this.cancelWaitTimeoutMs);
    }
    return this.getRunStatus(runId);
  }

  // ---- queries ----

  public isRunStreaming(runId: string): boolean {
    const channel = this.registry.get(runId);
    return channel !== undefined && !channel.isFinished();
  }

  public async getRunStatus(runId: string): Promise<RunStatus | null> {
    const seal = this.seals.get(runId);
    if (seal) return seal.status;
    const retiredStatus = this.retired.get(runId);
    if (retiredStatus) return retiredStatus;

    const task = this.tasks.get(runId);
    if ((task && !task.isDone()) || this.isRunStreaming(runId)) return "running";

    const events = await this.eventLog.getAllEvents(runId);
    if (events.length === 0) return null;
    for (let i = events.length - 1; i >= 0; i--) {
      const status = events[i].data.status;
      if (events[i].event === "end" && isTerminalStatus(status)) return status;
    }
    return "running";
  }

  public getStreamState(runId: string): RunStreamState | null {
    const channel = this.registry.get(runId);
    const seal = this.seals.get(runId);

    if (seal) {
      if (!channel) return "retired";
      if (seal.status === "success") return "completed";
      return seal.status === "interrupted" ? "cancelled" : "errored";
    }
    if (channel) {
      if (channel.isFinished()) return "completed";
      return this.counters.has(runId) ? "streaming" : "created";
    }
    return this.retired.has(runId) ? "retired" : null;
  }

  public async getRunInfo(runId: string): Promise<RunInfo | null> {
    return this.eventLog.getRunInfo(runId);
  }

  public async getStoredEvents(runId: string, after?: string): Promise<StoredEvent[]> {
    return after ? this.eventLog.getEventsSince(runId, after) : this.eventLog.getAllEvents(runId);
  }

  public async deleteEvents(runId: string): Promise<void> {
    await this.eventLog.cleanupEvents(runId);
  }

  /** The run as far as streaming knows it, or null when nothing is known. */
  public async describeRun(runId: string): Promise<RunRef | null> {
    const status = await this.getRunStatus(runId);
    if (status === null && !this.registry.get(runId)) return null;
    return status === null ? { runId } : { runId, status };
  }

  // ---- lifecycle ----

  /** Retires a drained, finished channel; forces any other channel finished. */
  public async cleanupRun(runId: string): Promise<void> {
    const channel = this.registry.get(runId);
    if (!channel) return;
    if (channel.isFinished() && !channel.hasBacklog()) {
      this.registry.remove(runId);
      return;
    }
    await this.registry.cleanup(runId);
  }

  private retire(runId: string): void {
    const seal = this.seals.get(runId);
    this.counters.delete(runId);
    this.seals.delete(runId);
    this.admitted.delete(runId);
    this.retired.delete(runId);
    this.retired.set(runId, seal ? seal.status : null);
    while (this.retired.size > this.retiredCapacity) {
      const oldest = this.retired.keys().next();
      if (oldest.done) break;
      this.retired.delete(oldest.value);
    }
  }

  // ---- streaming ----

  /**
   * Replays the stored history (after `lastEventId` when given), then the
   * live tail. The channel is subscribed before the replay is read, and live
   * events at or below the highest replayed sequence are skipped, so the
   * merged stream has no gap and no duplicate.
   */
  public async *streamRunExecution(
    run: RunRef,
    lastEventId?: string,
    options: StreamOptions = {}
  ): AsyncGenerator<SseFrame, void, undefined> {
    const { runId } = run;
    const { signal } = options;
    const terminalStatus = isTerminalStatus(run.status) ? run.status : null;

    const channel = this.registry.get(runId) ?? (terminalStatus ? undefined : this.registry.getOrCreate(runId));
    const subscription: ChannelSubscription | null =
      channel && !channel.isFinished() ? await channel.subscribe() : null;

    if (subscription) openSubscriptions.inc();
    let lastSeq = lastEventId ? parseEventSequence(lastEventId) ?? -1 : -1;
    let sawEnd = false;

    try {
      const replay = lastEventId
        ? await this.eventLog.getEventsSince(runId, lastEventId)
        : await this.eventLog.getAllEvents(runId);
      for (const stored of replay) {
        if (signal?.aborted) return;
        yield storedToFrame(stored);
        lastSeq = Math.max(lastSeq, stored.seq);
        if (stored.event === "end") sawEnd = true;
      }
      if (sawEnd) return;
      if (!subscription) {
        if (terminalStatus) {
          // The stored history is gone but the outcome is known.
          if (!signal?.aborted) yield { event: "end", data: { status: terminalStatus } };
          return;
        }
      } else {
        for await (const { eventId, event } of subscription.events(signal)) {
          const seq = parseEventSequence(eventId);
          if (seq !== null && seq <= lastSeq) continue;
          yield rawToFrame(eventId, event);
          if (seq !== null) lastSeq = seq;
          if (event.mode === "end") {
            sawEnd = true;
            break;
          }
        }
      }
      if (sawEnd || signal?.aborted) return;

      // Events stored while the live tail was ending.
      const tail =
        lastSeq >= 0
          ? await this.eventLog.getEventsSince(runId, makeEventId(runId, lastSeq))
          : await this.eventLog.getAllEvents(runId);
      for (const stored of tail) {
        if (signal?.aborted) return;
        if (stored.seq <= lastSeq) continue;
        yield storedToFrame(stored);
        lastSeq = stored.seq;
        if (stored.event === "end") sawEnd = true;
      }
      if (sawEnd) return;

      this.log.warn({ msg: "stream ended without a terminal event", runId, lastSeq });
      yield { event: "error", data: { error: "StreamInterrupted", message: INTERRUPTED_FRAME_MESSAGE } };
    } finally {
      if (subscription) {
        openSubscriptions.dec();
        await subscription.close();
      }
    }
  }
}

import type { RawEvent } from "../types";
import type { Logger } from "../observability/logger";
import { componentLogger } from "../observability/logger";
import { errorMessage } from "../errors";
import type { StreamOrchestrator } from "./streamOrchestrator";

export interface RunContext {
  runId: string;
  signal: AbortSignal;
}

/** Produces a run's raw events; should stop once `signal` aborts. */
export type ExecutionEngine = (ctx: RunContext) => AsyncIterable<RawEvent>;

export interface RunHandle {
  readonly runId: string;
  readonly signal: AbortSignal;
  /** Resolves once the driver has stopped; never rejects. */
  readonly settled: Promise<void>;
  cancel(): void;
  isDone(): boolean;
}

/**
 * Handles of runs executing in this process, keyed by run id.
 */
export class RunTaskRegistry {
  private readonly handles = new Map<string, RunHandle>();

  public register(handle: RunHandle): void {
    this.handles.set(handle.runId, handle);
  }

  public get(runId: string): RunHandle | undefined {
    return this.handles.get(runId);
  }

  /** Removes `handle` unless a newer handle took its place. */
  public release(handle: RunHandle): void {
    if (this.handles.get(handle.runId) === handle) this.handles.delete(handle.runId);
  }

  public cancelAll(): void {
    for (const handle of this.handles.values()) handle.cancel();
  }
}

/**
 * Drives an execution engine through the orchestrator: every event gets the
 * next id, is stored, then published. A run always ends with exactly one
 * terminal event, synthesized here when the engine stops without one.
 */
export class RunExecutor {
  public constructor(
    private readonly orchestrator: StreamOrchestrator,
    private readonly tasks: RunTaskRegistry,
    private readonly log: Logger = componentLogger("run-executor")
  ) {}

  public start(runId: string, engine: ExecutionEngine): RunHandle {
    const current = this.tasks.get(runId);
    if (current && !current.isDone()) {
      throw new Error(`run ${runId} is already executing`);
    }

    const controller = new AbortController();
    let done = false;
    const settled = this.drive(runId, engine, controller.signal)
      .catch((err: unknown) => {
        this.log.error({ msg: "run driver failed", runId, err: errorMessage(err) });
      })
      .finally(() => {
        done = true;
        this.tasks.release(handle);
      });

    const handle: RunHandle = {
      runId,
      signal: controller.signal,
      settled,
      cancel: () => controller.abort(),
      isDone: () => done
    };
    this.tasks.register(handle);
    this.log.info({ msg: "run started", runId });
    return handle;
  }

  private async emit(runId: string, event: RawEvent): Promise<void> {
    await this.orchestrator.publishEvent(runId, this.orchestrator.nextEventId(runId), event);
  }

  private async drive(runId: string, engine: ExecutionEngine, signal: AbortSignal): Promise<void> {
    await this.orchestrator.resumeCounter(runId);
    let sawError = false;

    try {
      for await (const event of engine({ runId, signal })) {
        if (signal.aborted || this.orchestrator.hasTerminal(runId)) {
          this.log.debug({ msg: "engine event after run ended", runId, mode: event.mode });
          return;
        }
        await this.emit(runId, event);
        if (event.mode === "error") sawError = true;
        if (event.mode === "end") return;
      }
      if (signal.aborted || this.orchestrator.hasTerminal(runId)) return;
      await this.emit(runId, { mode: "end", status: sawError ? "error" : "success" });
    } catch (err) {
      if (signal.aborted) return;
      const kind = err instanceof Error ? err.name : "Error";
      this.log.warn({ msg: "run failed", runId, kind, err: errorMessage(err) });
      await this.orchestrator.signalError(runId, errorMessage(err), kind);
    }
  }
}

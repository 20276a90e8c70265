import type { RawEvent } from "../../types";
import type { ExecutionEngine } from "../../orchestrator/runTasks";

export interface ScriptedEngine {
  engine: ExecutionEngine;
  emit(event: RawEvent): void;
  /** Ends the engine's sequence after the queued events. */
  finish(): void;
  /** Makes the engine throw once the queue is drained. */
  fail(err: Error): void;
}

/**
 * Engine whose events are fed by the test. It waits for the next event and
 * stops as soon as the run is aborted.
 */
export function scriptedEngine(): ScriptedEngine {
  const pending: RawEvent[] = [];
  let finished = false;
  let failure: Error | null = null;
  let wake: (() => void) | null = null;

  const notify = () => {
    const resume = wake;
    wake = null;
    resume?.();
  };

  const engine: ExecutionEngine = async function* ({ signal }) {
    while (!signal.aborted) {
      const next = pending.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (failure) throw failure;
      if (finished) return;
      await new Promise<void>((resolve) => {
        wake = resolve;
        signal.addEventListener("abort", () => resolve(), { once: true });
      });
    }
  };

  return {
    engine,
    emit(event) {
      pending.push(event);
      notify();
    },
    finish() {
      finished = true;
      notify();
    },
    fail(err) {
      failure = err;
      notify();
    }
  };
}

/** Engine that yields a fixed list of events and stops. */
export function listEngine(events: RawEvent[]): ExecutionEngine {
  return async function* () {
    for (const event of events) yield event;
  };
}

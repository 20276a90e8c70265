export type RunStatus = "running" | "success" | "error" | "interrupted";
export type TerminalStatus = Exclude<RunStatus, "running">;

export type RunStreamState = "created" | "streaming" | "completed" | "cancelled" | "errored" | "retired";

export type Namespace = string[];

interface NamespacedEvent {
  namespace?: Namespace;
}

/**
 * Events produced by the execution engine. `mode` is the stream mode the
 * engine emitted the chunk under and is the only discriminant consumers look at.
 */
export type RawEvent = NamespacedEvent &
  (
    | { mode: "values"; chunk: unknown }
    | { mode: "messages"; chunk: unknown; meta?: unknown }
    | { mode: "messages/partial"; messages: unknown }
    | { mode: "messages/complete"; messages: unknown }
    | { mode: "messages/metadata"; metadata: unknown }
    | { mode: "updates"; chunk: unknown }
    | { mode: "debug"; chunk: unknown }
    | { mode: "custom"; chunk: unknown }
    | { mode: "events"; event: unknown }
    | { mode: "end"; status: TerminalStatus; finalOutput?: unknown; error?: string }
    | { mode: "error"; error: string; message: string }
  );

export type StreamMode = RawEvent["mode"];

export interface ChannelEvent {
  eventId: string;
  event: RawEvent;
}

/** Row written to the event log for replay. */
export interface StoredEvent {
  id: string;
  runId: string;
  seq: number;
  event: StreamMode;
  data: Record<string, unknown>;
  createdAt: string;
}

export interface EventRecordInput {
  id: string;
  event: StreamMode;
  data: Record<string, unknown>;
}

export interface RunInfo {
  runId: string;
  eventCount: number;
  lastEventId: string;
  lastEventTime: string;
}

/** Minimal view of a run record needed to stream it. */
export interface RunRef {
  runId: string;
  status?: RunStatus;
}

export function isTerminalStatus(status: unknown): status is TerminalStatus {
  return status === "success" || status === "error" || status === "interrupted";
}

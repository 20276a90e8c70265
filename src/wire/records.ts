import type { EventRecordInput, RawEvent, StoredEvent, StreamMode } from "../types";
import { toJsonCompatible } from "./codec";

export interface SseFrame {
  id?: string;
  event: string;
  data: unknown;
}

function withNamespace(record: Record<string, unknown>, event: RawEvent): Record<string, unknown> {
  if (event.namespace && event.namespace.length > 0) {
    return { ...record, namespace: event.namespace.map((part) => String(part)) };
  }
  return record;
}

function baseRecord(event: RawEvent): Record<string, unknown> {
  switch (event.mode) {
    case "values":
      return { type: "execution_values", chunk: toJsonCompatible(event.chunk) };
    case "messages":
      return {
        type: "messages_stream",
        chunk: toJsonCompatible(event.chunk),
        meta: event.meta === undefined ? null : toJsonCompatible(event.meta)
      };
    case "messages/partial":
      return { type: "messages_partial", messages: toJsonCompatible(event.messages) };
    case "messages/complete":
      return { type: "messages_complete", messages: toJsonCompatible(event.messages) };
    case "messages/metadata":
      return { type: "messages_metadata", metadata: toJsonCompatible(event.metadata) };
    case "updates":
      return { type: "execution_updates", chunk: toJsonCompatible(event.chunk) };
    case "debug":
      return { type: "debug", chunk: toJsonCompatible(event.chunk) };
    case "custom":
      return { type: "custom", chunk: toJsonCompatible(event.chunk) };
    case "events":
      return { type: "engine_event", event: toJsonCompatible(event.event) };
    case "end": {
      const record: Record<string, unknown> = {
        type: "run_complete",
        status: event.status,
        finalOutput: event.finalOutput === undefined ? null : toJsonCompatible(event.finalOutput)
      };
      if (event.error !== undefined) record.error = event.error;
      return record;
    }
    case "error":
      return { type: "run_error", error: event.error, message: event.message };
  }
}

/**
 * Normalized, self-describing JSON record for a raw event. The same record is
 * stored for replay and rendered for live delivery, so both paths produce
 * identical frames.
 */
export function recordFromRaw(event: RawEvent): Record<string, unknown> {
  return withNamespace(baseRecord(event), event);
}

export function toEventRecord(eventId: string, event: RawEvent): EventRecordInput {
  return { id: eventId, event: event.mode, data: recordFromRaw(event) };
}

function readNamespace(data: Record<string, unknown>): string[] {
  const ns = data.namespace;
  if (!Array.isArray(ns)) return [];
  return ns.filter((part): part is string => typeof part === "string");
}

function hasInterrupt(chunk: unknown): boolean {
  return typeof chunk === "object" && chunk !== null && !Array.isArray(chunk) && "__interrupt__" in chunk;
}

/**
 * Renders a normalized record as an outward frame. Update chunks carrying an
 * interrupt are surfaced as `values` so clients see the paused state.
 */
export function recordToFrame(id: string | undefined, mode: StreamMode, data: Record<string, unknown>): SseFrame {
  let event: string = mode;
  let payload: unknown;

  switch (mode) {
    case "values":
    case "debug":
    case "custom":
      payload = data.chunk;
      break;
    case "updates":
      payload = data.chunk;
      if (hasInterrupt(payload)) event = "values";
      break;
    case "messages":
      payload = data.meta === null || data.meta === undefined ? data.chunk : [data.chunk, data.meta];
      break;
    case "messages/partial":
    case "messages/complete":
      payload = data.messages;
      break;
    case "messages/metadata":
      payload = data.metadata;
      break;
    case "events":
      payload = data.event;
      break;
    case "end": {
      const end: Record<string, unknown> = { status: data.status };
      if (data.finalOutput !== null && data.finalOutput !== undefined) end.finalOutput = data.finalOutput;
      if (data.error !== undefined) end.error = data.error;
      payload = end;
      break;
    }
    case "error":
      payload = { error: data.error, message: data.message };
      break;
  }

  const namespace = readNamespace(data);
  if (namespace.length > 0) event = `${event}|${namespace.join("|")}`;

  const frame: SseFrame = { event, data: payload ?? null };
  if (id !== undefined) frame.id = id;
  return frame;
}

export function rawToFrame(eventId: string, event: RawEvent): SseFrame {
  return recordToFrame(eventId, event.mode, recordFromRaw(event));
}

export function storedToFrame(stored: StoredEvent): SseFrame {
  return recordToFrame(stored.id, stored.event, stored.data);
}

export function formatSseFrame(frame: SseFrame): string {
  let out = "";
  if (frame.id !== undefined && frame.id !== "") out += `id: ${frame.id}\n`;
  out += `event: ${frame.event}\n`;
  out += `data: ${JSON.stringify(frame.data ?? null)}\n\n`;
  return out;
}

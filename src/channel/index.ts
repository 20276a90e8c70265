import type { ChannelEvent, RawEvent } from "../types";

export type ChannelMode = "auto" | "redis" | "memory";
export type ChannelBackend = "memory" | "redis";

/**
 * One subscriber's view of a run channel. Iteration starts at the moment of
 * subscription and ends after an `end` event, or once the channel is
 * finished and this subscriber's buffer is drained.
 */
export interface ChannelSubscription {
  events(signal?: AbortSignal): AsyncGenerator<ChannelEvent, void, undefined>;
  close(): Promise<void>;
}

/**
 * Per-run conduit between the execution driver and stream subscribers.
 */
export interface RunChannel {
  readonly runId: string;
  readonly backend: ChannelBackend;
  /** Resolves false when the channel was already finished and the event was dropped. */
  put(eventId: string, event: RawEvent): Promise<boolean>;
  /** The subscription is registered by the time the promise resolves. */
  subscribe(): Promise<ChannelSubscription>;
  /** Idempotent. Subscribers notice within one poll interval. */
  markFinished(): Promise<void>;
  /** Finishes the channel in this process only and wakes its subscribers. */
  close(): void;
  isFinished(): boolean;
  hasBacklog(): boolean;
  /** Milliseconds since creation. */
  getAge(): number;
}

export interface ChannelClock {
  now(): number;
}

export const systemClock: ChannelClock = { now: () => Date.now() };

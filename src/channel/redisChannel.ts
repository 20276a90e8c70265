import type { ChannelEvent, RawEvent } from "../types";
import type { Logger } from "../observability/logger";
import type { RedisConnection, RedisSubscription } from "../redis/connection";
import type { ChannelClock, ChannelSubscription, RunChannel } from "./index";
import { systemClock } from "./index";
import { WaitQueue } from "./waitQueue";
import { ChannelPublishError, WireFormatError, errorMessage } from "../errors";
import { decodePayload, encodePayload } from "../wire/codec";
import { validateEnvelope, validateRawEvent } from "../validation/schemas";
import type { ChannelEnvelope } from "../validation/schemas";

export interface RedisChannelOptions {
  redis: RedisConnection;
  keyPrefix: string;
  pollIntervalMs: number;
  finishedFlagTtlSeconds: number;
  logger: Logger;
  clock?: ChannelClock;
}

export function streamChannelName(keyPrefix: string, runId: string): string {
  return `${keyPrefix}:stream:${runId}`;
}

export function finishedFlagKey(keyPrefix: string, runId: string): string {
  return `${keyPrefix}:run:${runId}:finished`;
}

export function encodeEnvelope(eventId: string, event: RawEvent): string {
  const envelope: ChannelEnvelope = { eventId, payload: encodePayload(event) };
  return JSON.stringify(envelope);
}

/** Parses and validates one pub/sub message. Throws WireFormatError on anything malformed. */
export function decodeEnvelope(message: string): ChannelEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(message);
  } catch (err) {
    throw new WireFormatError(`envelope is not JSON: ${errorMessage(err)}`);
  }
  const envelope = validateEnvelope(parsed);
  if (!envelope.valid) throw new WireFormatError(`invalid envelope: ${envelope.errors.join("; ")}`);
  const event = validateRawEvent(decodePayload(envelope.value.payload));
  if (!event.valid) throw new WireFormatError(`invalid event: ${event.errors.join("; ")}`);
  return { eventId: envelope.value.eventId, event: event.value };
}

class RedisChannelSubscription implements ChannelSubscription {
  public readonly queue = new WaitQueue<ChannelEvent>();
  private handle: RedisSubscription | null = null;
  private failure: Error | null = null;
  private closed = false;

  public constructor(
    private readonly channel: RedisRunChannel,
    private readonly options: RedisChannelOptions
  ) {}

  public async open(): Promise<void> {
    this.handle = await this.options.redis.subscribe(this.channel.channelName, {
      onMessage: (message) => this.receive(message),
      onError: (err) => {
        this.failure = err;
        this.queue.wake();
      }
    });
  }

  private receive(message: string): void {
    try {
      this.queue.push(decodeEnvelope(message));
    } catch (err) {
      this.options.logger.warn({ msg: "dropping malformed channel message", runId: this.channel.runId, err: errorMessage(err) });
    }
  }

  public async *events(signal?: AbortSignal): AsyncGenerator<ChannelEvent, void, undefined> {
    const log = this.options.logger;
    let finishedSeen = false;
    try {
      while (!this.closed && !signal?.aborted) {
        const next = this.queue.shift();
        if (next !== undefined) {
          yield next;
          if (next.event.mode === "end") return;
          continue;
        }
        if (this.failure) {
          log.warn({ msg: "channel subscription lost", runId: this.channel.runId, err: this.failure.message });
          return;
        }
        if (finishedSeen) return;
        try {
          finishedSeen = await this.channel.checkFinished();
        } catch (err) {
          log.warn({ msg: "finished flag check failed", runId: this.channel.runId, err: errorMessage(err) });
          return;
        }
        if (!finishedSeen) await this.queue.wait(this.options.pollIntervalMs, signal);
      }
    } finally {
      await this.close();
    }
  }

  public async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.queue.clear();
    this.queue.wake();
    this.channel.detach(this);
    const handle = this.handle;
    this.handle = null;
    if (!handle) return;
    try {
      await handle.unsubscribe();
    } catch (err) {
      this.options.logger.warn({ msg: "unsubscribe failed", runId: this.channel.runId, err: errorMessage(err) });
    }
  }
}

/**
 * Channel shared across processes through Redis pub/sub. Completion is also
 * recorded in a TTL-bounded flag so subscribers that attach after the run
 * ended stop instead of waiting for events that will never come.
 */
export class RedisRunChannel implements RunChannel {
  public readonly backend = "redis";
  public readonly channelName: string;
  private readonly flagKey: string;
  private finished = false;
  private readonly createdAt: number;
  private readonly subscribers = new Set<RedisChannelSubscription>();
  private readonly clock: ChannelClock;

  public constructor(
    public readonly runId: string,
    private readonly options: RedisChannelOptions
  ) {
    this.channelName = streamChannelName(options.keyPrefix, runId);
    this.flagKey = finishedFlagKey(options.keyPrefix, runId);
    this.clock = options.clock ?? systemClock;
    this.createdAt = this.clock.now();
  }

  public async put(eventId: string, event: RawEvent): Promise<boolean> {
    if (this.finished) return false;
    if (event.mode === "end") this.finished = true;
    try {
      await this.options.redis.publish(this.channelName, encodeEnvelope(eventId, event));
    } catch (err) {
      throw new ChannelPublishError(this.runId, eventId, err);
    }
    if (event.mode === "end") {
      try {
        await this.writeFlag();
      } catch (err) {
        this.options.logger.warn({ msg: "could not set run finished flag", runId: this.runId, err: errorMessage(err) });
      }
    }
    return true;
  }

  public async subscribe(): Promise<ChannelSubscription> {
    const sub = new RedisChannelSubscription(this, this.options);
    await sub.open();
    this.subscribers.add(sub);
    return sub;
  }

  public detach(sub: RedisChannelSubscription): void {
    this.subscribers.delete(sub);
  }

  private async writeFlag(): Promise<void> {
    await this.options.redis.set(this.flagKey, "1", { ttlSeconds: this.options.finishedFlagTtlSeconds });
  }

  public async markFinished(): Promise<void> {
    this.finished = true;
    await this.writeFlag();
  }

  /** Local or remote completion. A remote flag also finishes this copy. */
  public async checkFinished(): Promise<boolean> {
    if (this.finished) return true;
    const flag = await this.options.redis.get(this.flagKey);
    if (flag !== null) this.finished = true;
    return this.finished;
  }

  public close(): void {
    this.finished = true;
    for (const sub of this.subscribers) sub.queue.wake();
  }

  public isFinished(): boolean {
    return this.finished;
  }

  public hasBacklog(): boolean {
    for (const sub of this.subscribers) {
      if (sub.queue.size > 0) return true;
    }
    return false;
  }

  public getAge(): number {
    return this.clock.now() - this.createdAt;
  }
}

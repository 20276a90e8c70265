import type { ChannelEvent, RawEvent } from "../types";
import type { ChannelClock, ChannelSubscription, RunChannel } from "./index";
import { systemClock } from "./index";
import { WaitQueue } from "./waitQueue";

class MemorySubscription implements ChannelSubscription {
  public readonly queue = new WaitQueue<ChannelEvent>();
  private closed = false;

  public constructor(
    private readonly channel: MemoryRunChannel,
    private readonly pollIntervalMs: number
  ) {}

  public async *events(signal?: AbortSignal): AsyncGenerator<ChannelEvent, void, undefined> {
    try {
      while (!this.closed && !signal?.aborted) {
        const next = this.queue.shift();
        if (next !== undefined) {
          yield next;
          if (next.event.mode === "end") return;
          continue;
        }
        if (this.channel.isFinished()) return;
        await this.queue.wait(this.pollIntervalMs, signal);
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
  }
}

/**
 * Channel local to this process. Each subscriber gets its own FIFO, so a slow
 * subscriber never holds back the others.
 */
export class MemoryRunChannel implements RunChannel {
  public readonly backend = "memory";
  private finished = false;
  private readonly createdAt: number;
  private readonly subscribers = new Set<MemorySubscription>();

  public constructor(
    public readonly runId: string,
    private readonly pollIntervalMs: number = 1000,
    private readonly clock: ChannelClock = systemClock
  ) {
    this.createdAt = clock.now();
  }

  public async put(eventId: string, event: RawEvent): Promise<boolean> {
    if (this.finished) return false;
    if (event.mode === "end") this.finished = true;
    for (const sub of this.subscribers) sub.queue.push({ eventId, event });
    return true;
  }

  public async subscribe(): Promise<ChannelSubscription> {
    const sub = new MemorySubscription(this, this.pollIntervalMs);
    this.subscribers.add(sub);
    return sub;
  }

  public detach(sub: MemorySubscription): void {
    this.subscribers.delete(sub);
  }

  public async markFinished(): Promise<void> {
    this.finished = true;
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

  public get subscriberCount(): number {
    return this.subscribers.size;
  }

  public getAge(): number {
    return this.clock.now() - this.createdAt;
  }
}

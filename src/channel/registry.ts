import type { Logger } from "../observability/logger";
import { componentLogger } from "../observability/logger";
import { backendFallbacks, liveChannels } from "../observability/metrics";
import type { RedisConnection } from "../redis/connection";
import { ChannelBackendUnavailableError } from "../errors";
import { IntervalTask } from "../util/intervalTask";
import type { ChannelBackend, ChannelClock, ChannelMode, RunChannel } from "./index";
import { systemClock } from "./index";
import { MemoryRunChannel } from "./memoryChannel";
import { RedisRunChannel } from "./redisChannel";

export interface ChannelRegistryOptions {
  mode: ChannelMode;
  redis?: RedisConnection | null;
  keyPrefix?: string;
  pollIntervalMs?: number;
  retentionSeconds?: number;
  janitorIntervalMs?: number;
  finishedFlagTtlSeconds?: number;
  logger?: Logger;
  clock?: ChannelClock;
}

export interface RegistryHealth {
  mode: ChannelMode;
  backend: ChannelBackend;
  redisConfigured: boolean;
  redisReady: boolean;
  degradedReason: string | null;
  healthy: boolean;
}

type RetireListener = (runId: string) => void;

/**
 * Owns every live channel of this process. The backend is chosen once, when
 * the registry is built, and changes only through {@link degrade}: a Redis
 * that recovers later is not picked up again until restart.
 */
export class ChannelRegistry {
  private readonly channels = new Map<string, RunChannel>();
  private readonly retireListeners = new Set<RetireListener>();
  private readonly janitor: IntervalTask;
  private readonly log: Logger;
  private readonly clock: ChannelClock;
  private readonly redis: RedisConnection | null;
  private backend: ChannelBackend;
  private degradedReason: string | null = null;

  public readonly mode: ChannelMode;
  private readonly keyPrefix: string;
  private readonly pollIntervalMs: number;
  private readonly retentionMs: number;
  private readonly finishedFlagTtlSeconds: number;

  public constructor(options: ChannelRegistryOptions) {
    this.mode = options.mode;
    this.redis = options.redis ?? null;
    this.keyPrefix = options.keyPrefix ?? "runstream";
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.retentionMs = (options.retentionSeconds ?? 3600) * 1000;
    this.finishedFlagTtlSeconds = options.finishedFlagTtlSeconds ?? 3600;
    this.log = options.logger ?? componentLogger("channel-registry");
    this.clock = options.clock ?? systemClock;
    this.janitor = new IntervalTask(
      "channel janitor",
      options.janitorIntervalMs ?? 300_000,
      async () => this.sweep(),
      this.log
    );

    if (this.mode === "redis") {
      if (!this.redis) {
        throw new ChannelBackendUnavailableError("STREAMING_BROKER=redis requires REDIS_URL");
      }
      this.backend = "redis";
    } else if (this.mode === "auto" && this.redis?.isReady()) {
      this.backend = "redis";
    } else {
      this.backend = "memory";
    }
    this.log.info({ msg: "channel backend selected", mode: this.mode, backend: this.backend });
  }

  public get activeBackend(): ChannelBackend {
    return this.backend;
  }

  public onRetire(listener: RetireListener): () => void {
    this.retireListeners.add(listener);
    return () => {
      this.retireListeners.delete(listener);
    };
  }

  public validateConfiguration(): RegistryHealth {
    const redisReady = this.redis?.isReady() ?? false;
    const healthy = this.mode === "redis" ? redisReady && this.backend === "redis" : true;
    return {
      mode: this.mode,
      backend: this.backend,
      redisConfigured: this.redis !== null,
      redisReady,
      degradedReason: this.degradedReason,
      healthy
    };
  }

  private createChannel(runId: string): RunChannel {
    if (this.backend === "redis" && this.redis) {
      return new RedisRunChannel(runId, {
        redis: this.redis,
        keyPrefix: this.keyPrefix,
        pollIntervalMs: this.pollIntervalMs,
        finishedFlagTtlSeconds: this.finishedFlagTtlSeconds,
        logger: this.log,
        clock: this.clock
      });
    }
    return new MemoryRunChannel(runId, this.pollIntervalMs, this.clock);
  }

  public getOrCreate(runId: string): RunChannel {
    const existing = this.channels.get(runId);
    if (existing) return existing;
    const channel = this.createChannel(runId);
    this.channels.set(runId, channel);
    this.updateGauge();
    return channel;
  }

  public get(runId: string): RunChannel | undefined {
    return this.channels.get(runId);
  }

  /** Forces the run's channel finished ahead of its natural completion. */
  public async cleanup(runId: string): Promise<void> {
    const channel = this.channels.get(runId);
    if (channel) await channel.markFinished();
  }

  /** Drops the channel now and notifies retire listeners. */
  public remove(runId: string): boolean {
    const channel = this.channels.get(runId);
    if (!channel) return false;
    channel.close();
    this.channels.delete(runId);
    this.updateGauge();
    for (const listener of this.retireListeners) listener(runId);
    return true;
  }

  /**
   * Switches to in-process channels after a Redis failure. Distributed
   * channels are dropped and their subscribers end; the runs they belonged to
   * are not retired. Events in flight on those channels at this moment may be
   * lost to live subscribers but remain in the event log.
   */
  public degrade(reason: string, cause?: unknown): void {
    if (this.mode === "redis") {
      throw new ChannelBackendUnavailableError(`redis channel backend failed: ${reason}`, cause);
    }
    if (this.backend === "memory") return;
    this.backend = "memory";
    this.degradedReason = reason;
    backendFallbacks.inc();

    let dropped = 0;
    for (const [runId, channel] of this.channels) {
      if (channel.backend !== "redis") continue;
      channel.close();
      this.channels.delete(runId);
      dropped++;
    }
    this.updateGauge();
    this.log.warn({ msg: "channel backend degraded to memory", reason, dropped });
  }

  /** Retires channels that are finished, drained and past retention. */
  public async sweep(): Promise<number> {
    const expired: string[] = [];
    for (const [runId, channel] of this.channels) {
      if (channel.isFinished() && !channel.hasBacklog() && channel.getAge() > this.retentionMs) {
        expired.push(runId);
      }
    }
    for (const runId of expired) this.remove(runId);
    if (expired.length > 0) this.log.info({ msg: "retired expired channels", count: expired.length });
    return expired.length;
  }

  public start(): void {
    this.janitor.start();
  }

  public async stop(): Promise<void> {
    await this.janitor.stop();
  }

  private updateGauge(): void {
    let memory = 0;
    let redis = 0;
    for (const channel of this.channels.values()) {
      if (channel.backend === "redis") redis++;
      else memory++;
    }
    liveChannels.labels("memory").set(memory);
    liveChannels.labels("redis").set(redis);
  }
}

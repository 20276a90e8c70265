import { createClient } from "redis";
import type { Logger } from "../observability/logger";

export type ScoreBound = number | "-inf" | "+inf" | `(${number}`;

export interface ScoredMember {
  value: string;
  score: number;
}

export interface SetOptions {
  ttlSeconds?: number;
  onlyIfAbsent?: boolean;
}

export interface SubscriptionHandlers {
  onMessage(message: string): void;
  onError(err: Error): void;
}

export interface RedisSubscription {
  unsubscribe(): Promise<void>;
}

/**
 * The subset of Redis the channel broker and the event log rely on.
 * Production code talks to node-redis through {@link NodeRedisConnection}.
 */
export interface RedisConnection {
  isReady(): boolean;
  publish(channel: string, message: string): Promise<number>;
  subscribe(channel: string, handlers: SubscriptionHandlers): Promise<RedisSubscription>;
  get(key: string): Promise<string | null>;
  /** Resolves false when `onlyIfAbsent` is set and the key already exists. */
  set(key: string, value: string, options?: SetOptions): Promise<boolean>;
  del(keys: string[]): Promise<number>;
  zAdd(key: string, members: ScoredMember[]): Promise<number>;
  zRangeByScore(key: string, min: ScoreBound, max: ScoreBound): Promise<string[]>;
  zRangeWithScores(key: string, start: number, stop: number): Promise<ScoredMember[]>;
  zRemRangeByScore(key: string, min: ScoreBound, max: ScoreBound): Promise<number>;
  zCard(key: string): Promise<number>;
  close(): Promise<void>;
}

type NodeRedisClient = ReturnType<typeof createClient>;

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * node-redis v4 backed connection. Commands share one client; pub/sub
 * listeners share a duplicated subscriber connection, opened on first use.
 */
export class NodeRedisConnection implements RedisConnection {
  private readonly client: NodeRedisClient;
  private subscriber: Promise<NodeRedisClient> | null = null;
  private readonly errorHandlers = new Set<(err: Error) => void>();

  public constructor(url: string, private readonly log: Logger) {
    this.client = createClient({
      url,
      socket: {
        connectTimeout: 5000,
        reconnectStrategy: (retries: number) => Math.min(retries * 200, 5000)
      }
    });
    this.client.on("error", (err: unknown) => {
      this.log.error({ msg: "redis client error", err: asError(err).message });
    });
  }

  public async connect(): Promise<void> {
    if (!this.client.isOpen) await this.client.connect();
    await this.client.ping();
  }

  public isReady(): boolean {
    return this.client.isReady;
  }

  public async publish(channel: string, message: string): Promise<number> {
    return this.client.publish(channel, message);
  }

  private subscriberReady(): Promise<NodeRedisClient> {
    if (!this.subscriber) {
      const sub = this.client.duplicate();
      sub.on("error", (err: unknown) => {
        const e = asError(err);
        this.log.warn({ msg: "redis subscriber error", err: e.message });
        for (const handler of [...this.errorHandlers]) handler(e);
      });
      this.subscriber = sub.connect().then(() => sub);
      this.subscriber.catch(() => {
        this.subscriber = null;
      });
    }
    return this.subscriber;
  }

  public async subscribe(channel: string, handlers: SubscriptionHandlers): Promise<RedisSubscription> {
    const sub = await this.subscriberReady();
    const listener = (message: string) => handlers.onMessage(message);
    await sub.subscribe(channel, listener);
    this.errorHandlers.add(handlers.onError);
    return {
      unsubscribe: async () => {
        this.errorHandlers.delete(handlers.onError);
        if (sub.isOpen) await sub.unsubscribe(channel, listener);
      }
    };
  }

  public async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  public async set(key: string, value: string, options: SetOptions = {}): Promise<boolean> {
    const { ttlSeconds, onlyIfAbsent } = options;
    let reply: string | null;
    if (ttlSeconds !== undefined) {
      reply = onlyIfAbsent
        ? await this.client.set(key, value, { EX: ttlSeconds, NX: true })
        : await this.client.set(key, value, { EX: ttlSeconds });
    } else {
      reply = onlyIfAbsent ? await this.client.set(key, value, { NX: true }) : await this.client.set(key, value);
    }
    return reply !== null;
  }

  public async del(keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.client.del(keys);
  }

  public async zAdd(key: string, members: ScoredMember[]): Promise<number> {
    return this.client.zAdd(key, members);
  }

  public async zRangeByScore(key: string, min: ScoreBound, max: ScoreBound): Promise<string[]> {
    return this.client.zRangeByScore(key, min, max);
  }

  public async zRangeWithScores(key: string, start: number, stop: number): Promise<ScoredMember[]> {
    return this.client.zRangeWithScores(key, start, stop);
  }

  public async zRemRangeByScore(key: string, min: ScoreBound, max: ScoreBound): Promise<number> {
    return this.client.zRemRangeByScore(key, min, max);
  }

  public async zCard(key: string): Promise<number> {
    return this.client.zCard(key);
  }

  public async close(): Promise<void> {
    const pending = this.subscriber;
    this.subscriber = null;
    this.errorHandlers.clear();
    if (pending) {
      const sub = await pending.catch((err: unknown) => {
        this.log.warn({ msg: "redis subscriber never connected", err: asError(err).message });
        return null;
      });
      if (sub) await NodeRedisConnection.release(sub);
    }
    await NodeRedisConnection.release(this.client);
  }

  private static async release(client: NodeRedisClient): Promise<void> {
    if (client.isReady) await client.quit();
    else if (client.isOpen) await client.disconnect();
  }
}

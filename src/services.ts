import type { StreamingConfig } from "./config";
import type { Logger } from "./observability/logger";
import { componentLogger, logger as rootLogger } from "./observability/logger";
import type { RedisConnection } from "./redis/connection";
import { NodeRedisConnection } from "./redis/connection";
import { ChannelRegistry } from "./channel/registry";
import type { ChannelClock } from "./channel";
import { createEventLog } from "./eventlog";
import type { EventLog } from "./eventlog";
import { StreamOrchestrator } from "./orchestrator/streamOrchestrator";
import { RunExecutor, RunTaskRegistry } from "./orchestrator/runTasks";
import { ChannelBackendUnavailableError, errorMessage } from "./errors";

export interface StreamingServices {
  readonly redis: RedisConnection | null;
  readonly registry: ChannelRegistry;
  readonly eventLog: EventLog;
  readonly tasks: RunTaskRegistry;
  readonly orchestrator: StreamOrchestrator;
  readonly executor: RunExecutor;
  /** Starts the channel janitor and event pruning loops. */
  start(): void;
  /** Cancels local runs, stops both loops and releases the Redis connection it opened. */
  shutdown(): Promise<void>;
}

export interface ServiceOverrides {
  /** Use this connection instead of dialing `config.redisUrl`; null forces no Redis. */
  redis?: RedisConnection | null;
  logger?: Logger;
  clock?: ChannelClock;
}

async function connectRedis(config: StreamingConfig, log: Logger): Promise<RedisConnection | null> {
  if (!config.redisUrl) return null;
  const connection = new NodeRedisConnection(config.redisUrl, log);
  try {
    await connection.connect();
    log.info({ msg: "redis connected" });
    return connection;
  } catch (err) {
    await connection.close();
    if (config.channel.mode === "redis") {
      throw new ChannelBackendUnavailableError("redis is unreachable and STREAMING_BROKER=redis", err);
    }
    log.warn({ msg: "redis unreachable, using in-process channels and event log", err: errorMessage(err) });
    return null;
  }
}

/**
 * Builds the process-wide streaming singletons. Nothing runs in the
 * background until `start()` is called.
 */
export async function createStreamingServices(
  config: StreamingConfig,
  overrides: ServiceOverrides = {}
): Promise<StreamingServices> {
  const log = overrides.logger ?? rootLogger;
  const ownsRedis = overrides.redis === undefined;
  const redis = ownsRedis ? await connectRedis(config, componentLogger("redis", log)) : overrides.redis ?? null;

  const registry = new ChannelRegistry({
    mode: config.channel.mode,
    redis,
    keyPrefix: config.keyPrefix,
    pollIntervalMs: config.channel.pollIntervalMs,
    retentionSeconds: config.channel.retentionSeconds,
    janitorIntervalMs: config.channel.janitorIntervalMs,
    finishedFlagTtlSeconds: config.channel.finishedFlagTtlSeconds,
    logger: componentLogger("channel-registry", log),
    clock: overrides.clock
  });

  if (config.eventLog.backend === "redis" && !redis) {
    log.warn({ msg: "redis event log requested without a connection, using memory" });
  }
  const eventLog = createEventLog(config.eventLog.backend, {
    redis,
    keyPrefix: config.keyPrefix,
    retentionSeconds: config.eventLog.retentionSeconds,
    pruneIntervalMs: config.eventLog.pruneIntervalMs,
    logger: componentLogger("event-log", log)
  });

  const tasks = new RunTaskRegistry();
  const orchestrator = new StreamOrchestrator({
    registry,
    eventLog,
    tasks,
    logger: componentLogger("stream-orchestrator", log),
    cancelWaitTimeoutMs: config.cancelWaitTimeoutMs
  });
  const executor = new RunExecutor(orchestrator, tasks, componentLogger("run-executor", log));

  return {
    redis,
    registry,
    eventLog,
    tasks,
    orchestrator,
    executor,
    start() {
      registry.start();
      eventLog.startPruning();
    },
    async shutdown() {
      tasks.cancelAll();
      await registry.stop();
      await eventLog.stopPruning();
      orchestrator.dispose();
      if (ownsRedis && redis) await redis.close();
      log.info({ msg: "streaming services stopped" });
    }
  };
}

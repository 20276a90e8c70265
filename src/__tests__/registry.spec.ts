import { describe, it, expect } from "vitest";
import { ChannelRegistry } from "../channel/registry";
import { MemoryRunChannel } from "../channel/memoryChannel";
import { RedisRunChannel } from "../channel/redisChannel";
import { ChannelBackendUnavailableError } from "../errors";
import type { ChannelEvent } from "../types";
import { MemoryRedis } from "./helpers/memoryRedis";

describe("ChannelRegistry backend selection", () => {
  it("uses in-process channels in memory mode even with Redis around", () => {
    const registry = new ChannelRegistry({ mode: "memory", redis: new MemoryRedis() });
    expect(registry.activeBackend).toBe("memory");
    expect(registry.getOrCreate("run-1")).toBeInstanceOf(MemoryRunChannel);
  });

  it("prefers Redis in auto mode when the connection is ready", () => {
    const registry = new ChannelRegistry({ mode: "auto", redis: new MemoryRedis() });
    expect(registry.activeBackend).toBe("redis");
    expect(registry.getOrCreate("run-1")).toBeInstanceOf(RedisRunChannel);
  });

  it("falls back to memory in auto mode without a ready connection", () => {
    const down = new MemoryRedis();
    down.ready = false;
    expect(new ChannelRegistry({ mode: "auto", redis: down }).activeBackend).toBe("memory");
    expect(new ChannelRegistry({ mode: "auto" }).activeBackend).toBe("memory");
  });

  it("refuses forced Redis mode without a connection", () => {
    expect(() => new ChannelRegistry({ mode: "redis" })).toThrow(ChannelBackendUnavailableError);
  });

  it("reports forced Redis as unhealthy while the connection is down", () => {
    const redis = new MemoryRedis();
    const registry = new ChannelRegistry({ mode: "redis", redis });
    expect(registry.validateConfiguration().healthy).toBe(true);
    redis.ready = false;
    expect(registry.validateConfiguration()).toEqual({
      mode: "redis",
      backend: "redis",
      redisConfigured: true,
      redisReady: false,
      degradedReason: null,
      healthy: false
    });
  });
});

describe("ChannelRegistry lifecycle", () => {
  it("returns the same channel for a run until it is removed", () => {
    const registry = new ChannelRegistry({ mode: "memory" });
    const channel = registry.getOrCreate("run-1");
    expect(registry.getOrCreate("run-1")).toBe(channel);
    expect(registry.get("run-1")).toBe(channel);
    expect(registry.get("run-2")).toBeUndefined();
  });

  it("forces a channel finished on cleanup", async () => {
    const registry = new ChannelRegistry({ mode: "memory" });
    const channel = registry.getOrCreate("run-1");
    await registry.cleanup("run-1");
    expect(channel.isFinished()).toBe(true);
    expect(registry.get("run-1")).toBe(channel);
  });

  it("notifies retire listeners on remove", () => {
    const registry = new ChannelRegistry({ mode: "memory" });
    const retired: string[] = [];
    registry.onRetire((runId) => retired.push(runId));
    registry.getOrCreate("run-1");

    expect(registry.remove("run-1")).toBe(true);
    expect(registry.remove("run-1")).toBe(false);
    expect(retired).toEqual(["run-1"]);
    expect(registry.get("run-1")).toBeUndefined();
  });

  it("sweeps only finished, drained channels past retention", async () => {
    let now = 0;
    const registry = new ChannelRegistry({ mode: "memory", retentionSeconds: 10, clock: { now: () => now } });
    const retired: string[] = [];
    registry.onRetire((runId) => retired.push(runId));

    const done = registry.getOrCreate("done");
    await done.put("done_event_1", { mode: "end", status: "success" });
    registry.getOrCreate("live");
    const backlogged = registry.getOrCreate("backlogged");
    const sub = await backlogged.subscribe();
    await backlogged.put("backlogged_event_1", { mode: "end", status: "success" });

    now = 5_000;
    expect(await registry.sweep()).toBe(0);

    now = 11_000;
    expect(await registry.sweep()).toBe(1);
    expect(retired).toEqual(["done"]);
    expect(registry.get("live")).toBeDefined();
    expect(registry.get("backlogged")).toBeDefined();

    const drained: ChannelEvent[] = [];
    for await (const event of sub.events()) drained.push(event);
    expect(drained).toHaveLength(1);
    expect(await registry.sweep()).toBe(1);
    expect(retired).toEqual(["done", "backlogged"]);
  });
});

describe("ChannelRegistry degrade", () => {
  it("drops Redis channels and serves in-process channels afterwards", async () => {
    const registry = new ChannelRegistry({ mode: "auto", redis: new MemoryRedis(), pollIntervalMs: 20 });
    const retired: string[] = [];
    registry.onRetire((runId) => retired.push(runId));
    const before = registry.getOrCreate("run-1");
    const sub = await before.subscribe();

    registry.degrade("publish failed");

    expect(registry.activeBackend).toBe("memory");
    expect(registry.get("run-1")).toBeUndefined();
    expect(registry.getOrCreate("run-1")).toBeInstanceOf(MemoryRunChannel);
    expect(registry.validateConfiguration().degradedReason).toBe("publish failed");
    expect(retired).toEqual([]);

    const received: ChannelEvent[] = [];
    for await (const event of sub.events()) received.push(event);
    expect(received).toEqual([]);
  });

  it("rethrows in forced Redis mode", () => {
    const registry = new ChannelRegistry({ mode: "redis", redis: new MemoryRedis() });
    expect(() => registry.degrade("publish failed")).toThrow(ChannelBackendUnavailableError);
    expect(registry.activeBackend).toBe("redis");
  });
});

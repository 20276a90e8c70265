import { describe, it, expect, vi } from "vitest";
import type { EventLog } from "../eventlog";
import { MemoryEventLog, RedisEventLog, createEventLog } from "../eventlog";
import { toEventRecord } from "../wire/records";
import type { RawEvent } from "../types";
import { MemoryRedis } from "./helpers/memoryRedis";

const T0 = Date.parse("2024-05-01T00:00:00.000Z");

interface Harness {
  log: EventLog;
  advance(ms: number): void;
}

type Factory = (options: { pruneIntervalMs?: number; retentionSeconds?: number }) => Harness;

function clocked(make: (now: () => Date) => EventLog): Harness {
  let now = T0;
  return {
    log: make(() => new Date(now)),
    advance(ms) {
      now += ms;
    }
  };
}

const backends: Array<[string, Factory]> = [
  ["memory", (options) => clocked((now) => new MemoryEventLog({ ...options, now }))],
  ["redis", (options) => clocked((now) => new RedisEventLog(new MemoryRedis(), "test", { ...options, now }))]
];

const scenario: RawEvent[] = [
  { mode: "values", chunk: { phase: "start" } },
  { mode: "messages", chunk: "a" },
  { mode: "messages", chunk: "b" },
  { mode: "messages", chunk: "c" },
  { mode: "end", status: "success" }
];

async function storeScenario(log: EventLog, runId = "run1"): Promise<void> {
  for (const [index, event] of scenario.entries()) {
    await log.storeEvent(runId, toEventRecord(`${runId}_event_${index + 1}`, event));
  }
}

describe.each(backends)("%s event log", (_name, factory) => {
  it("replays a run in order and summarizes it", async () => {
    const { log } = factory({});
    await storeScenario(log);

    const all = await log.getAllEvents("run1");
    expect(all.map((e) => e.id)).toEqual(["run1_event_1", "run1_event_2", "run1_event_3", "run1_event_4", "run1_event_5"]);
    expect(all.map((e) => e.seq)).toEqual([1, 2, 3, 4, 5]);
    expect(all.map((e) => e.event)).toEqual(["values", "messages", "messages", "messages", "end"]);
    expect(all[4]).toEqual({
      id: "run1_event_5",
      runId: "run1",
      seq: 5,
      event: "end",
      data: { type: "run_complete", status: "success", finalOutput: null },
      createdAt: "2024-05-01T00:00:00.000Z"
    });

    expect(await log.getRunInfo("run1")).toEqual({
      runId: "run1",
      eventCount: 5,
      lastEventId: "run1_event_5",
      lastEventTime: "2024-05-01T00:00:00.000Z"
    });
  });

  it("returns only events after the last seen id", async () => {
    const { log } = factory({});
    await storeScenario(log);

    expect((await log.getEventsSince("run1", "run1_event_3")).map((e) => e.id)).toEqual(["run1_event_4", "run1_event_5"]);
    expect(await log.getEventsSince("run1", "run1_event_5")).toEqual([]);
  });

  it("replays everything for an id without a sequence", async () => {
    const { log } = factory({});
    await storeScenario(log);

    expect(await log.getEventsSince("run1", "broken_format")).toEqual(await log.getAllEvents("run1"));
  });

  it("orders rows by sequence whatever the arrival order", async () => {
    const { log } = factory({});
    for (const n of [3, 1, 2]) {
      await log.storeEvent("run2", toEventRecord(`run2_event_${n}`, { mode: "custom", chunk: n }));
    }
    await log.storeEvent("run2", toEventRecord("broken_format", { mode: "custom", chunk: 0 }));

    const rows = await log.getAllEvents("run2");
    expect(rows.map((e) => [e.id, e.seq])).toEqual([
      ["broken_format", 0],
      ["run2_event_1", 1],
      ["run2_event_2", 2],
      ["run2_event_3", 3]
    ]);
  });

  it("counts a single row as one and spans gaps between first and last", async () => {
    const { log } = factory({});
    await log.storeEvent("solo", toEventRecord("solo_event_7", { mode: "debug", chunk: 1 }));
    expect((await log.getRunInfo("solo"))?.eventCount).toBe(1);

    await log.storeEvent("gappy", toEventRecord("gappy_event_2", { mode: "debug", chunk: 1 }));
    await log.storeEvent("gappy", toEventRecord("gappy_event_7", { mode: "debug", chunk: 2 }));
    expect((await log.getRunInfo("gappy"))?.eventCount).toBe(6);

    expect(await log.getRunInfo("missing")).toBeNull();
  });

  it("keeps runs apart", async () => {
    const { log } = factory({});
    await storeScenario(log, "run-a");
    await log.storeEvent("run-b", toEventRecord("run-b_event_1", { mode: "values", chunk: 1 }));

    expect(await log.getAllEvents("run-a")).toHaveLength(5);
    expect((await log.getAllEvents("run-b")).map((e) => e.id)).toEqual(["run-b_event_1"]);
  });

  it("accepts a single end per run", async () => {
    const { log } = factory({});
    await storeScenario(log);

    const second = await log.storeEvent("run1", toEventRecord("run1_event_6", { mode: "end", status: "interrupted" }));

    expect(second).toBeNull();
    const ends = (await log.getAllEvents("run1")).filter((e) => e.event === "end");
    expect(ends.map((e) => e.data.status)).toEqual(["success"]);
  });

  it("deletes a run's history on cleanup", async () => {
    const { log } = factory({});
    await storeScenario(log);

    await log.cleanupEvents("run1");

    expect(await log.getAllEvents("run1")).toEqual([]);
    expect(await log.getRunInfo("run1")).toBeNull();
    expect(await log.storeEvent("run1", toEventRecord("run1_event_1", { mode: "end", status: "error" }))).not.toBeNull();
  });

  it("prunes rows older than the cutoff", async () => {
    const { log, advance } = factory({});
    await log.storeEvent("old", toEventRecord("old_event_1", { mode: "values", chunk: 1 }));
    advance(60 * 60 * 1000);
    await log.storeEvent("old", toEventRecord("old_event_2", { mode: "values", chunk: 2 }));
    await log.storeEvent("new", toEventRecord("new_event_1", { mode: "values", chunk: 3 }));

    const removed = await log.pruneOlderThan(new Date(T0 + 30 * 60 * 1000));

    expect(removed).toBe(1);
    expect((await log.getAllEvents("old")).map((e) => e.id)).toEqual(["old_event_2"]);
    expect(await log.getAllEvents("new")).toHaveLength(1);
  });

  it("prunes in the background once started", async () => {
    const { log, advance } = factory({ pruneIntervalMs: 10, retentionSeconds: 60 });
    await log.storeEvent("run1", toEventRecord("run1_event_1", { mode: "values", chunk: 1 }));
    advance(61 * 1000);

    log.startPruning();
    await vi.waitFor(async () => {
      expect(await log.getAllEvents("run1")).toEqual([]);
    });
    await log.stopPruning();
  });
});

describe("RedisEventLog layout", () => {
  it("stores rows in a per-run sorted set scored by sequence", async () => {
    const redis = new MemoryRedis();
    const log = new RedisEventLog(redis, "test", { now: () => new Date(T0) });
    await log.storeEvent("run1", toEventRecord("run1_event_4", { mode: "end", status: "success" }));

    expect(await redis.zRangeWithScores("test:events:run1", 0, -1)).toEqual([
      {
        score: 4,
        value: JSON.stringify({
          id: "run1_event_4",
          runId: "run1",
          seq: 4,
          event: "end",
          data: { type: "run_complete", status: "success", finalOutput: null },
          createdAt: "2024-05-01T00:00:00.000Z"
        })
      }
    ]);
    expect(await redis.zRangeWithScores("test:events:index", 0, -1)).toEqual([
      { score: T0, value: JSON.stringify(["run1", 4]) }
    ]);
    expect(await redis.get("test:events:run1:terminal")).toBe("run1_event_4");
    expect(redis.ttl("test:events:run1:terminal")).toBe(86_400);
  });

  it("skips rows it cannot parse", async () => {
    const redis = new MemoryRedis();
    const log = new RedisEventLog(redis, "test");
    await redis.zAdd("test:events:run1", [{ score: 1, value: "garbage" }]);
    await log.storeEvent("run1", toEventRecord("run1_event_2", { mode: "values", chunk: 1 }));

    expect((await log.getAllEvents("run1")).map((e) => e.id)).toEqual(["run1_event_2"]);
  });
});

describe("createEventLog", () => {
  it("uses Redis only when asked and connected", () => {
    expect(createEventLog("memory", { redis: new MemoryRedis() }).backend).toBe("memory");
    expect(createEventLog("redis", { redis: new MemoryRedis() }).backend).toBe("redis");
    expect(createEventLog("redis", { redis: null }).backend).toBe("memory");
  });
});

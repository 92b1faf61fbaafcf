import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Redis } from "ioredis";
import type { Database } from "@logfeed/shared/db";

const { warn } = vi.hoisted(() => ({ warn: vi.fn() }));

vi.mock("@logfeed/shared/utils", () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn,
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { buildIngestion } from "./bootstrap.js";
import { parseTopology } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { InMemoryStorageEngine } from "./services/storage/memory-engine.js";
import { PostgresStorageEngine } from "./services/storage/postgres-engine.js";

const topology = parseTopology({
  machineId: 7,
  filters: [{ type: "level", threshold: "INFO" }],
  routing: { policy: "service", serviceShards: { billing: 1 } },
  shards: [
    { id: "shard-0", primary: "s0", replicas: ["s0r"] },
    { id: "shard-1", primary: "s1", replicas: ["s1r"], capacity: 10 },
  ],
  replication: { maxAttempts: 2 },
});

describe("buildIngestion", () => {
  beforeEach(() => {
    warn.mockClear();
  });

  it("creates one in-memory store per topology entry", () => {
    const ingestion = buildIngestion(topology);

    expect([...ingestion.stores.keys()]).toEqual(["s0", "s0r", "s1", "s1r"]);
    expect(ingestion.stores.get("s1")).toBeInstanceOf(InMemoryStorageEngine);
    expect(ingestion.router.replicaSets().map((set) => set.id)).toEqual(["shard-0", "shard-1"]);
    expect(ingestion.replication.maxAttempts).toBe(2);
    expect(ingestion.chain.stageNames()).toEqual(["level"]);
    expect(ingestion.generator.machineId).toBe(7);
  });

  it("passes shard capacity to its stores", () => {
    const ingestion = buildIngestion(topology);
    const store = ingestion.stores.get("s1r");

    expect(store instanceof InMemoryStorageEngine && store.capacity).toBe(10);
  });

  it("reports every replica in the lag snapshot before any write", () => {
    const ingestion = buildIngestion(topology);

    expect(Object.keys(ingestion.replication.lagSnapshot())).toEqual(["s0r", "s1r"]);
  });

  it("routes accepted records through the pinned shard", async () => {
    let now = 1_000;
    const ingestion = buildIngestion(topology, { clock: () => now++, sleep: async () => undefined });

    const outcome = await ingestion.pipeline.submit({ service: "billing", level: "WARN", message: "late invoice" });
    await ingestion.replication.drain();

    expect(outcome.status).toBe("accepted");
    expect(await ingestion.stores.get("s1")?.getById(outcome.id ?? "")).not.toBeNull();
    expect(await ingestion.stores.get("s1r")?.getById(outcome.id ?? "")).not.toBeNull();
    expect(await ingestion.storage.getById(outcome.id ?? "")).not.toBeNull();
  });

  it("needs Redis for redis-backed rate limits", () => {
    const withRedis = parseTopology({
      ...topology,
      filters: [{ type: "rate-limit", maxRecords: 5, windowMs: 1_000, store: "redis" }],
    });

    expect(() => buildIngestion(withRedis)).toThrow(ConfigurationError);
    expect(() => buildIngestion(withRedis, { redis: {} as unknown as Redis })).not.toThrow();
  });

  it("warns that postgres stores ignore shard capacity", () => {
    const ingestion = buildIngestion(topology, { db: {} as unknown as Database });

    expect(ingestion.stores.get("s1")).toBeInstanceOf(PostgresStorageEngine);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      { shard: "shard-1", capacity: 10 },
      "Shard capacity is ignored by postgres stores",
    );
  });

  it("keeps quiet about capacity for in-memory stores", () => {
    buildIngestion(topology);

    expect(warn).not.toHaveBeenCalled();
  });
});

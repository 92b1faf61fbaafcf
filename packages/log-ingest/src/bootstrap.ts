import type { Redis } from "ioredis";
import type { Database } from "@logfeed/shared/db";
import { createLogger } from "@logfeed/shared/utils";

import type { Topology } from "./config.js";
import { createFilterChain } from "./services/filters/index.js";
import type { FilterChain } from "./services/filters/filter-chain.js";
import { IdGenerator } from "./services/id-generator.js";
import { IngestionPipeline } from "./services/pipeline.js";
import { LagTracker } from "./services/replication/lag-tracker.js";
import {
  LoggingHealthReporter,
  PrimaryReplicaReplication,
} from "./services/replication/replication-strategy.js";
import { ShardRouter } from "./services/shard-router.js";
import { InMemoryStorageEngine } from "./services/storage/memory-engine.js";
import { PostgresStorageEngine } from "./services/storage/postgres-engine.js";
import { ShardedStorage } from "./services/storage/sharded-storage.js";
import type { ReplicaSet, ReplicationHealthReporter, StorageEngine } from "./types.js";

const logger = createLogger("bootstrap");

export interface IngestionDeps {
  /** Enables Redis-backed rate-limit stages. */
  redis?: Redis;
  /** When set, every store is a PostgresStorageEngine on this database. */
  db?: Database;
  defaultTimeoutMs?: number;
  healthReporter?: ReplicationHealthReporter;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface Ingestion {
  generator: IdGenerator;
  chain: FilterChain;
  router: ShardRouter;
  replication: PrimaryReplicaReplication;
  storage: ShardedStorage;
  pipeline: IngestionPipeline;
  stores: ReadonlyMap<string, StorageEngine>;
}

/** Wire the core components for one topology. */
export function buildIngestion(topology: Topology, deps: IngestionDeps = {}): Ingestion {
  const stores = new Map<string, StorageEngine>();

  const store = (id: string, capacity: number | undefined): StorageEngine => {
    const engine: StorageEngine = deps.db
      ? new PostgresStorageEngine({ id, db: deps.db })
      : new InMemoryStorageEngine({ id, capacity });
    stores.set(id, engine);
    return engine;
  };

  if (deps.db) {
    for (const shard of topology.shards) {
      if (shard.capacity !== undefined) {
        logger.warn(
          { shard: shard.id, capacity: shard.capacity },
          "Shard capacity is ignored by postgres stores",
        );
      }
    }
  }

  const replicaSets: ReplicaSet[] = topology.shards.map((shard) => ({
    id: shard.id,
    primary: store(shard.primary, shard.capacity),
    replicas: (shard.replicas ?? []).map((replica) => store(replica, shard.capacity)),
  }));

  const router = new ShardRouter({
    policy: topology.routing.policy,
    replicaSets,
    bucketMs: topology.routing.bucketMs,
    serviceShards: topology.routing.serviceShards,
  });

  const generator = new IdGenerator({
    machineId: topology.machineId,
    ...topology.generator,
    clock: deps.clock,
    sleep: deps.sleep,
  });

  const chain = createFilterChain(topology.filters ?? [], { redis: deps.redis, now: deps.clock });

  const lagTracker = new LagTracker();
  lagTracker.track(replicaSets.flatMap((set) => set.replicas.map((replica) => replica.id)));

  const replication = new PrimaryReplicaReplication({
    ...topology.replication,
    healthReporter: deps.healthReporter ?? new LoggingHealthReporter(),
    lagTracker,
    clock: deps.clock,
    sleep: deps.sleep,
  });

  const pipeline = new IngestionPipeline({
    generator,
    chain,
    router,
    replication,
    defaultTimeoutMs: deps.defaultTimeoutMs,
  });

  logger.info(
    {
      machineId: topology.machineId,
      policy: router.policy,
      shards: router.shardCount,
      stores: stores.size,
      filters: chain.stageNames(),
      engine: deps.db ? "postgres" : "memory",
    },
    "Ingestion topology built",
  );

  return { generator, chain, router, replication, storage: new ShardedStorage(router), pipeline, stores };
}

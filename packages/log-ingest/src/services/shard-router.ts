import crypto from "node:crypto";

import { ConfigurationError } from "../errors.js";
import type { LogRecord, ReplicaSet, Route, RoutingPolicy, ShardKey } from "../types.js";

export const DEFAULT_BUCKET_MS = 3_600_000;

/** First 32 bits of the SHA-256 digest of `key`. */
export function hashKey(key: string): number {
  const hex = crypto.createHash("sha256").update(key).digest("hex");
  return parseInt(hex.slice(0, 8), 16);
}

export interface ShardRouterOptions {
  policy: RoutingPolicy;
  /** Indexed by partition. */
  replicaSets: readonly ReplicaSet[];
  /** Time bucket width for the time and hybrid policies. Default: one hour */
  bucketMs?: number;
  /** Pins a service to a partition ahead of hashing. */
  serviceShards?: Readonly<Record<string, number>>;
}

/**
 * Maps a record to its replica set. The topology is fixed at construction,
 * so routing a record is a pure function of its service and timestamp.
 */
export class ShardRouter {
  readonly policy: RoutingPolicy;
  readonly bucketMs: number;
  private readonly sets: readonly ReplicaSet[];
  private readonly serviceShards: ReadonlyMap<string, number>;

  constructor(options: ShardRouterOptions) {
    if (options.replicaSets.length === 0) {
      throw new ConfigurationError("ShardRouter needs at least one replica set");
    }

    const bucketMs = options.bucketMs ?? DEFAULT_BUCKET_MS;
    if (!Number.isInteger(bucketMs) || bucketMs < 1) {
      throw new ConfigurationError(`bucketMs must be a positive integer, got ${bucketMs}`);
    }

    const pinned = new Map(Object.entries(options.serviceShards ?? {}));
    for (const [service, partition] of pinned) {
      if (!Number.isInteger(partition) || partition < 0 || partition >= options.replicaSets.length) {
        throw new ConfigurationError(
          `Service "${service}" is pinned to partition ${partition}, but only ${options.replicaSets.length} exist`,
        );
      }
    }

    this.policy = options.policy;
    this.bucketMs = bucketMs;
    this.sets = Object.freeze([...options.replicaSets]);
    this.serviceShards = pinned;
  }

  get shardCount(): number {
    return this.sets.length;
  }

  route(record: LogRecord): Route {
    const key = this.shardKeyFor(record);
    const replicaSet = this.sets[key.partition];
    if (!replicaSet) {
      throw new ConfigurationError(`No replica set for partition ${key.partition}`);
    }
    return { key, replicaSet };
  }

  shardKeyFor(record: Pick<LogRecord, "service" | "timestamp">): ShardKey {
    switch (this.policy) {
      case "service": {
        const partition = this.servicePartition(record.service);
        return { id: `service=${record.service}`, policy: "service", partition, service: record.service };
      }
      case "time": {
        const bucket = this.bucketOf(record.timestamp);
        return { id: `bucket=${bucket}`, policy: "time", partition: bucket % this.shardCount, bucket };
      }
      case "hybrid": {
        const bucket = this.bucketOf(record.timestamp);
        const partition = (this.servicePartition(record.service) + bucket) % this.shardCount;
        return {
          id: `service=${record.service}/bucket=${bucket}`,
          policy: "hybrid",
          partition,
          service: record.service,
          bucket,
        };
      }
    }
  }

  replicaSets(): readonly ReplicaSet[] {
    return this.sets;
  }

  private servicePartition(service: string): number {
    return this.serviceShards.get(service) ?? hashKey(service) % this.shardCount;
  }

  private bucketOf(timestampMs: number): number {
    return Math.floor(timestampMs / this.bucketMs);
  }
}

// ---------------------------------------------------------------------------
// Log Ingest Types
// ---------------------------------------------------------------------------

import type { IngestError } from "./errors.js";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARN", "ERROR", "FATAL"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Severity rank: DEBUG=0 ... FATAL=4. */
export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function parseLevel(value: string): LogLevel | null {
  const upper = value.toUpperCase();
  return LOG_LEVELS.find((level) => level === upper) ?? null;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type LogMetadata = Record<string, JsonValue>;

/** A committed-or-committable record. Frozen once built. */
export interface LogRecord {
  readonly id: string;
  readonly timestamp: number;
  readonly level: LogLevel;
  readonly service: string;
  readonly message: string;
  readonly metadata?: Readonly<LogMetadata>;
  readonly correlationId?: string;
}

/** What a producer hands to the pipeline. */
export interface RawLogRecord {
  service: string;
  level: string;
  message: string;
  metadata?: LogMetadata;
  correlationId?: string;
  /**
   * Producer's clock, epoch milliseconds or ISO-8601. Stored as
   * `metadata.producedAt`; the record timestamp is the id's clock reading.
   */
  timestamp?: number | string;
}

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

export type FilterDecision =
  | { admit: true; record: LogRecord }
  | { admit: false; reason: string; stage: string };

export interface FilterStage {
  readonly name: string;
  evaluate(record: LogRecord): Promise<FilterDecision>;
}

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

export interface QueryPredicate {
  /** Inclusive lower bound, epoch ms. */
  from?: number;
  /** Inclusive upper bound, epoch ms. */
  to?: number;
  service?: string;
  level?: LogLevel;
  minLevel?: LogLevel;
  correlationId?: string;
}

export interface Pagination {
  limit?: number;
  offset?: number;
  /** Id of the last record of the previous page. */
  cursor?: string;
}

export interface QueryResult {
  records: LogRecord[];
  nextCursor: string | null;
}

export interface Ack {
  id: string;
  duplicate: boolean;
}

export interface StorageStats {
  totalRecords: number;
  byService: Record<string, number>;
  byLevel: Partial<Record<LogLevel, number>>;
  oldestTimestamp: number | null;
  newestTimestamp: number | null;
}

export interface StorageEngine {
  readonly id: string;
  append(record: LogRecord): Promise<Ack>;
  query(predicate: QueryPredicate, pagination?: Pagination): Promise<QueryResult>;
  getById(id: string): Promise<LogRecord | null>;
  /** Remove records with timestamp strictly before the bound. */
  deleteBefore(timestampMs: number): Promise<number>;
  stats(): Promise<StorageStats>;
}

// ---------------------------------------------------------------------------
// Sharding
// ---------------------------------------------------------------------------

export type RoutingPolicy = "service" | "time" | "hybrid";

export interface ShardKey {
  id: string;
  policy: RoutingPolicy;
  partition: number;
  service?: string;
  bucket?: number;
}

export interface ReplicaSet {
  id: string;
  primary: StorageEngine;
  replicas: StorageEngine[];
}

export interface Route {
  key: ShardKey;
  replicaSet: ReplicaSet;
}

// ---------------------------------------------------------------------------
// Replication
// ---------------------------------------------------------------------------

export type ReplicationState =
  | "PENDING"
  | "PRIMARY_COMMITTED"
  | "REPLICAS_IN_FLIGHT"
  | "REPLICAS_SETTLED"
  | "COMMITTED"
  | "FAILED";

export interface ReplicationReceipt {
  recordId: string;
  shard: string;
  state: ReplicationState;
  primaryAck: boolean;
  replicaAcks: Record<string, boolean>;
  replicaAttempts: Record<string, number>;
  replicaErrors: Record<string, string>;
  replicaLagMs: Record<string, number>;
  /** ISO timestamp of the primary commit; null until it happens. */
  committedAt: string | null;
}

export interface ReplicaFailure {
  recordId: string;
  shard: string;
  replicaId: string;
  attempts: number;
  error: unknown;
}

export interface ReplicationHealthReporter {
  replicaWriteFailed(failure: ReplicaFailure): void;
}

export interface ReplicaLag {
  lastMs: number | null;
  avgMs: number | null;
  maxMs: number | null;
  samples: number;
  failures: number;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export type Outcome =
  | { status: "accepted"; id: string; receipt: ReplicationReceipt }
  | { status: "rejected"; id: string; reason: string; stage: string }
  | { status: "failed"; id?: string; error: IngestError };

export interface SubmitOptions {
  /** Deadline for reaching primary commit. Replica fan-out is unaffected. */
  timeoutMs?: number;
}

export interface PipelineStats {
  accepted: number;
  rejected: number;
  failed: number;
  rejectionsByStage: Record<string, number>;
}

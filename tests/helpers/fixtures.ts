/**
 * Shared test fixtures for the ingestion test suites.
 *
 * Factory functions for producer records and topologies, plus storage
 * engines that fail on demand.
 */

import { WriteError } from "../../packages/log-ingest/src/errors.js";
import {
  InMemoryStorageEngine,
  type InMemoryStorageOptions,
} from "../../packages/log-ingest/src/services/storage/memory-engine.js";
import type { Ack, LogRecord } from "../../packages/log-ingest/src/types.js";

// ---------------------------------------------------------------------------
// Producer records
// ---------------------------------------------------------------------------

export function createRawRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    service: "checkout",
    level: "INFO",
    message: "order placed",
    metadata: { orderId: "ord-1", items: 2 },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Topologies
// ---------------------------------------------------------------------------

export function createTopologyDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    machineId: 1,
    routing: { policy: "service" },
    shards: [
      { id: "shard-0", primary: "p0", replicas: ["r0"] },
      { id: "shard-1", primary: "p1", replicas: ["r1"] },
    ],
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Storage engines
// ---------------------------------------------------------------------------

/** Rejects its first `failures` appends, then behaves like the in-memory engine. */
export class FlakyStorageEngine extends InMemoryStorageEngine {
  appendCalls = 0;

  constructor(
    options: InMemoryStorageOptions,
    private failures: number,
  ) {
    super(options);
  }

  override async append(record: LogRecord): Promise<Ack> {
    this.appendCalls++;
    if (this.failures > 0) {
      this.failures--;
      throw new WriteError(this.id, "store unavailable");
    }
    return super.append(record);
  }
}

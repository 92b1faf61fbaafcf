import type { Logger } from "pino";
import { createLogger } from "@logfeed/shared/utils";

import { PrimaryWriteError, SubmissionTimeoutError } from "../../errors.js";
import type {
  LogRecord,
  ReplicaFailure,
  ReplicaLag,
  ReplicaSet,
  ReplicationHealthReporter,
  ReplicationReceipt,
  StorageEngine,
} from "../../types.js";
import { untilAborted } from "../../utils/abort.js";
import { sleep as defaultSleep } from "../../utils/mutex.js";
import { LagTracker } from "./lag-tracker.js";

const logger = createLogger("replication");

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_BASE_DELAY_MS = 50;
export const DEFAULT_MAX_DELAY_MS = 2_000;

/** Delay before retry number `attempt + 1`, doubling from `baseDelayMs`. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export interface CommitOptions {
  signal?: AbortSignal;
}

export type ReceiptListener = (receipt: ReplicationReceipt) => void;

export interface ReplicationStrategy {
  /**
   * Resolves once the record is durable on the primary. Replica writes
   * continue in the background.
   */
  commit(record: LogRecord, replicaSet: ReplicaSet, options?: CommitOptions): Promise<ReplicationReceipt>;
  /** Settled receipts; returns an unsubscribe function. */
  onReceipt(listener: ReceiptListener): () => void;
  /** Wait for every in-flight replica fan-out. */
  drain(): Promise<void>;
  lagSnapshot(): Record<string, ReplicaLag>;
}

/** Reports exhausted replicas to the service log. */
export class LoggingHealthReporter implements ReplicationHealthReporter {
  constructor(private readonly log: Pick<Logger, "warn"> = logger) {}

  replicaWriteFailed(failure: ReplicaFailure): void {
    this.log.warn(
      {
        err: failure.error,
        recordId: failure.recordId,
        shard: failure.shard,
        replicaId: failure.replicaId,
        attempts: failure.attempts,
      },
      "Replica write failed after retries",
    );
  }
}

export interface PrimaryReplicaOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  healthReporter?: ReplicationHealthReporter;
  lagTracker?: LagTracker;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function copyReceipt(receipt: ReplicationReceipt): ReplicationReceipt {
  return {
    ...receipt,
    replicaAcks: { ...receipt.replicaAcks },
    replicaAttempts: { ...receipt.replicaAttempts },
    replicaErrors: { ...receipt.replicaErrors },
    replicaLagMs: { ...receipt.replicaLagMs },
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Synchronous primary write, asynchronous replica fan-out. A record is
 * visible once the primary accepts it; replicas converge behind it and a
 * replica that exhausts its retries never rolls the primary back.
 */
export class PrimaryReplicaReplication implements ReplicationStrategy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;

  private readonly healthReporter: ReplicationHealthReporter;
  private readonly lag: LagTracker;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly listeners = new Set<ReceiptListener>();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: PrimaryReplicaOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.healthReporter = options.healthReporter ?? new LoggingHealthReporter();
    this.lag = options.lagTracker ?? new LagTracker();
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  async commit(
    record: LogRecord,
    replicaSet: ReplicaSet,
    options: CommitOptions = {},
  ): Promise<ReplicationReceipt> {
    const receipt: ReplicationReceipt = {
      recordId: record.id,
      shard: replicaSet.id,
      state: "PENDING",
      primaryAck: false,
      replicaAcks: {},
      replicaAttempts: {},
      replicaErrors: {},
      replicaLagMs: {},
      committedAt: null,
    };

    if (options.signal?.aborted) {
      throw new SubmissionTimeoutError();
    }

    try {
      await untilAborted(replicaSet.primary.append(record), options.signal);
    } catch (err) {
      receipt.state = "FAILED";
      if (err instanceof SubmissionTimeoutError) {
        logger.warn(
          { recordId: record.id, shard: replicaSet.id, primary: replicaSet.primary.id },
          "Primary write outlived the submission deadline",
        );
        this.emit(receipt);
        throw err;
      }
      logger.error({ err, recordId: record.id, shard: replicaSet.id }, "Primary write failed");
      this.emit(receipt);
      throw new PrimaryWriteError(record.id, replicaSet.primary.id, err);
    }

    const committedMs = this.clock();
    receipt.primaryAck = true;
    receipt.committedAt = new Date(committedMs).toISOString();
    receipt.state = "PRIMARY_COMMITTED";

    if (replicaSet.replicas.length === 0) {
      receipt.state = "COMMITTED";
      this.emit(receipt);
      return copyReceipt(receipt);
    }

    receipt.state = "REPLICAS_IN_FLIGHT";
    const task: Promise<void> = this.fanOut(record, replicaSet, receipt, committedMs).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);

    return copyReceipt(receipt);
  }

  onReceipt(listener: ReceiptListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  lagSnapshot(): Record<string, ReplicaLag> {
    return this.lag.snapshot();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async fanOut(
    record: LogRecord,
    replicaSet: ReplicaSet,
    receipt: ReplicationReceipt,
    committedMs: number,
  ): Promise<void> {
    await Promise.all(
      replicaSet.replicas.map((replica) => this.replicate(record, replica, replicaSet.id, receipt, committedMs)),
    );

    receipt.state = "REPLICAS_SETTLED";
    logger.debug(
      { recordId: record.id, shard: replicaSet.id, acks: receipt.replicaAcks },
      "Replica fan-out settled",
    );
    receipt.state = "COMMITTED";
    this.emit(receipt);
  }

  private async replicate(
    record: LogRecord,
    replica: StorageEngine,
    shard: string,
    receipt: ReplicationReceipt,
    committedMs: number,
  ): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      receipt.replicaAttempts[replica.id] = attempt;
      try {
        await replica.append(record);
        const lagMs = Math.max(0, this.clock() - committedMs);
        receipt.replicaAcks[replica.id] = true;
        receipt.replicaLagMs[replica.id] = lagMs;
        this.lag.record(replica.id, lagMs);
        return;
      } catch (err) {
        lastError = err;
        if (attempt < this.maxAttempts) {
          const delay = backoffDelay(attempt, this.baseDelayMs, this.maxDelayMs);
          logger.debug({ err, replicaId: replica.id, attempt, delay }, "Replica write failed, retrying");
          await this.sleep(delay);
        }
      }
    }

    receipt.replicaAcks[replica.id] = false;
    receipt.replicaErrors[replica.id] = errorMessage(lastError);
    this.lag.recordFailure(replica.id);

    try {
      this.healthReporter.replicaWriteFailed({
        recordId: record.id,
        shard,
        replicaId: replica.id,
        attempts: this.maxAttempts,
        error: lastError,
      });
    } catch (err) {
      logger.error({ err, replicaId: replica.id }, "Replication health reporter threw");
    }
  }

  private emit(receipt: ReplicationReceipt): void {
    for (const listener of this.listeners) {
      try {
        listener(copyReceipt(receipt));
      } catch (err) {
        logger.error({ err, recordId: receipt.recordId }, "Receipt listener threw");
      }
    }
  }
}

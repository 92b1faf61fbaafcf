import type { Logger } from "pino";
import { createLogger } from "@logfeed/shared/utils";

import {
  ClockRegressionError,
  ConfigurationError,
  SequenceExhaustedError,
  SubmissionTimeoutError,
  type IngestError,
} from "../errors.js";
import { Mutex, sleep } from "../utils/mutex.js";

// ---------------------------------------------------------------------------
// Id layout
// ---------------------------------------------------------------------------
// TTTTTTTTTTTTT-MMMM-SSSS
//   13-digit epoch ms, 4-digit machine id, 4-digit sequence.
// Every field is zero-padded to a fixed width, so comparing two ids as
// strings gives the same answer as comparing (timestamp, machine, sequence).
// ---------------------------------------------------------------------------

const TIMESTAMP_WIDTH = 13;
const FIELD_WIDTH = 4;
const MAX_FIELD_VALUE = 10 ** FIELD_WIDTH - 1;
const ID_PATTERN = /^(\d{13})-(\d{4})-(\d{4})$/;

export const DEFAULT_SEQUENCE_CAPACITY = 4096;
export const DEFAULT_CLOCK_REGRESSION_TOLERANCE_MS = 10;

export type SequenceExhaustionPolicy = "wait" | "error";

export interface IdGeneratorOptions {
  /** Unique within the fleet; provisioning is external. 0-9999. */
  machineId: number;
  /** Ids available per millisecond. Default: 4096 */
  sequenceCapacity?: number;
  /** Backward clock steps up to this size are waited out. Default: 10 */
  clockRegressionToleranceMs?: number;
  /** What to do when a millisecond runs out of sequence numbers. Default: "wait" */
  onSequenceExhausted?: SequenceExhaustionPolicy;
  /** Upper bound on any single wait. Unbounded when unset. */
  maxWaitMs?: number;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ParsedId {
  timestamp: number;
  machineId: number;
  sequence: number;
}

export function formatId(timestamp: number, machineId: number, sequence: number): string {
  return [
    String(timestamp).padStart(TIMESTAMP_WIDTH, "0"),
    String(machineId).padStart(FIELD_WIDTH, "0"),
    String(sequence).padStart(FIELD_WIDTH, "0"),
  ].join("-");
}

export function parseId(id: string): ParsedId | null {
  const match = ID_PATTERN.exec(id);
  if (!match) return null;
  return {
    timestamp: Number(match[1]),
    machineId: Number(match[2]),
    sequence: Number(match[3]),
  };
}

export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

// ---------------------------------------------------------------------------
// IdGenerator
// ---------------------------------------------------------------------------

/**
 * Coordination-free, time-ordered id source. One instance owns one
 * (lastTimestampMs, sequence) pair; calls are serialized through a mutex so
 * concurrent callers get ids in the order they asked.
 */
export class IdGenerator {
  readonly machineId: number;

  private readonly capacity: number;
  private readonly tolerance: number;
  private readonly exhaustionPolicy: SequenceExhaustionPolicy;
  private readonly maxWaitMs: number | undefined;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly mutex = new Mutex();
  private readonly logger: Logger;

  private lastTimestampMs = -1;
  private sequence = 0;

  constructor(options: IdGeneratorOptions) {
    const {
      machineId,
      sequenceCapacity = DEFAULT_SEQUENCE_CAPACITY,
      clockRegressionToleranceMs = DEFAULT_CLOCK_REGRESSION_TOLERANCE_MS,
      onSequenceExhausted = "wait",
      maxWaitMs,
    } = options;

    if (!Number.isInteger(machineId) || machineId < 0 || machineId > MAX_FIELD_VALUE) {
      throw new ConfigurationError(`machineId must be an integer in 0..${MAX_FIELD_VALUE}, got ${machineId}`);
    }
    if (!Number.isInteger(sequenceCapacity) || sequenceCapacity < 1 || sequenceCapacity > MAX_FIELD_VALUE + 1) {
      throw new ConfigurationError(`sequenceCapacity must be an integer in 1..${MAX_FIELD_VALUE + 1}`);
    }
    if (clockRegressionToleranceMs < 0) {
      throw new ConfigurationError("clockRegressionToleranceMs cannot be negative");
    }

    this.machineId = machineId;
    this.capacity = sequenceCapacity;
    this.tolerance = clockRegressionToleranceMs;
    this.exhaustionPolicy = onSequenceExhausted;
    this.maxWaitMs = maxWaitMs;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.logger = createLogger("id-generator", { machineId });
  }

  /** Issue the next id. An aborted signal ends any wait with SubmissionTimeoutError. */
  next(signal?: AbortSignal): Promise<string> {
    return this.mutex.runExclusive(() => this.generate(signal));
  }

  /** Snapshot of the generator state, for diagnostics. */
  state(): { machineId: number; lastTimestampMs: number; sequence: number } {
    return {
      machineId: this.machineId,
      lastTimestampMs: this.lastTimestampMs,
      sequence: this.sequence,
    };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async generate(signal?: AbortSignal): Promise<string> {
    let now = this.clock();

    if (now < this.lastTimestampMs) {
      const drift = this.lastTimestampMs - now;
      if (drift > this.tolerance) {
        this.logger.error({ drift, tolerance: this.tolerance }, "Clock regression beyond tolerance");
        throw new ClockRegressionError(this.lastTimestampMs, now);
      }
      this.logger.warn({ drift }, "Clock moved backwards, waiting for it to catch up");
      const observed = now;
      now = await this.waitUntil(this.lastTimestampMs, signal, () =>
        new ClockRegressionError(this.lastTimestampMs, observed),
      );
    }

    if (now === this.lastTimestampMs) {
      if (this.sequence + 1 < this.capacity) {
        this.sequence += 1;
        return formatId(now, this.machineId, this.sequence);
      }

      if (this.exhaustionPolicy === "error") {
        throw new SequenceExhaustedError(now, this.capacity);
      }

      this.logger.debug({ timestamp: now }, "Sequence exhausted, waiting for next millisecond");
      const exhaustedAt = now;
      now = await this.waitUntil(this.lastTimestampMs + 1, signal, () =>
        new SequenceExhaustedError(exhaustedAt, this.capacity),
      );
    }

    this.lastTimestampMs = now;
    this.sequence = 0;
    return formatId(now, this.machineId, 0);
  }

  private async waitUntil(
    target: number,
    signal: AbortSignal | undefined,
    onTimeout: () => IngestError,
  ): Promise<number> {
    let waited = 0;
    let now = this.clock();

    while (now < target) {
      if (signal?.aborted) {
        throw new SubmissionTimeoutError("Submission timed out waiting for the id clock");
      }
      if (this.maxWaitMs !== undefined && waited >= this.maxWaitMs) {
        throw onTimeout();
      }
      const delay = Math.max(1, target - now);
      await this.sleep(delay);
      waited += delay;
      now = this.clock();
    }

    return now;
  }
}

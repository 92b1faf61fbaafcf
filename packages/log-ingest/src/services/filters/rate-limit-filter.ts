import type { Redis } from "ioredis";
import { createLogger } from "@logfeed/shared/utils";

import type { FilterDecision, FilterStage, LogRecord } from "../../types.js";
import { admit, reject } from "./decision.js";

const logger = createLogger("rate-limit-filter");

// ---------------------------------------------------------------------------
// Stores
// ---------------------------------------------------------------------------

export interface RateLimitResult {
  admitted: boolean;
  /** Admitted records in the current window, this one included. */
  count: number;
  resetInMs: number;
}

export interface RateLimitStore {
  /** Take one slot for `key` if the window still has room. */
  take(key: string, maxRecords: number, windowMs: number): Promise<RateLimitResult>;
}

export type RateLimitStrategy = "fixed" | "sliding";

/** Tracked keys above which take() sweeps expired windows first. */
const SWEEP_THRESHOLD = 10_000;

/**
 * Per-key counters held in process memory. Each take() runs to completion
 * without awaiting, so concurrent submissions never interleave inside one
 * counter update.
 */
export class MemoryRateLimitStore implements RateLimitStore {
  private readonly fixedWindows = new Map<string, { start: number; count: number }>();
  private readonly slidingWindows = new Map<string, number[]>();

  constructor(
    readonly strategy: RateLimitStrategy = "fixed",
    private readonly now: () => number = Date.now,
  ) {}

  async take(key: string, maxRecords: number, windowMs: number): Promise<RateLimitResult> {
    if (this.fixedWindows.size + this.slidingWindows.size > SWEEP_THRESHOLD) {
      this.sweep(windowMs);
    }
    return this.strategy === "fixed"
      ? this.takeFixed(key, maxRecords, windowMs)
      : this.takeSliding(key, maxRecords, windowMs);
  }

  /** Drop windows that have fully expired. */
  sweep(windowMs: number): number {
    const now = this.now();
    let removed = 0;

    for (const [key, window] of this.fixedWindows) {
      if (now - window.start >= windowMs) {
        this.fixedWindows.delete(key);
        removed++;
      }
    }
    for (const [key, hits] of this.slidingWindows) {
      const newest = hits[hits.length - 1];
      if (newest === undefined || now - newest >= windowMs) {
        this.slidingWindows.delete(key);
        removed++;
      }
    }

    return removed;
  }

  private takeFixed(key: string, maxRecords: number, windowMs: number): RateLimitResult {
    const now = this.now();
    let window = this.fixedWindows.get(key);

    if (!window || now - window.start >= windowMs) {
      window = { start: now, count: 0 };
      this.fixedWindows.set(key, window);
    }

    const resetInMs = window.start + windowMs - now;
    if (window.count >= maxRecords) {
      return { admitted: false, count: window.count, resetInMs };
    }

    window.count += 1;
    return { admitted: true, count: window.count, resetInMs };
  }

  private takeSliding(key: string, maxRecords: number, windowMs: number): RateLimitResult {
    const now = this.now();
    const hits = (this.slidingWindows.get(key) ?? []).filter((t) => now - t < windowMs);
    this.slidingWindows.set(key, hits);

    const oldest = hits[0];
    const resetInMs = oldest === undefined ? windowMs : oldest + windowMs - now;
    if (hits.length >= maxRecords) {
      return { admitted: false, count: hits.length, resetInMs };
    }

    hits.push(now);
    return { admitted: true, count: hits.length, resetInMs };
  }
}

/**
 * Fixed-window counters in Redis (INCR + PEXPIRE), shared by every ingest
 * instance pointed at the same Redis.
 */
export class RedisRateLimitStore implements RateLimitStore {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = "ratelimit:logs:",
  ) {}

  async take(key: string, maxRecords: number, windowMs: number): Promise<RateLimitResult> {
    const redisKey = `${this.prefix}${key}`;
    const count = await this.redis.incr(redisKey);

    if (count === 1) {
      // First record in window, start the expiry
      await this.redis.pexpire(redisKey, windowMs);
    }

    const ttl = await this.redis.pttl(redisKey);
    return {
      admitted: count <= maxRecords,
      count,
      resetInMs: ttl > 0 ? ttl : windowMs,
    };
  }
}

// ---------------------------------------------------------------------------
// RateLimitFilter
// ---------------------------------------------------------------------------

export interface RateLimitFilterOptions {
  maxRecords: number;
  windowMs: number;
  store?: RateLimitStore;
  name?: string;
}

/** Per-service admission budget over a time window. */
export class RateLimitFilter implements FilterStage {
  readonly name: string;
  readonly maxRecords: number;
  readonly windowMs: number;
  private readonly store: RateLimitStore;

  constructor(options: RateLimitFilterOptions) {
    this.name = options.name ?? "rate-limit";
    this.maxRecords = options.maxRecords;
    this.windowMs = options.windowMs;
    this.store = options.store ?? new MemoryRateLimitStore();
  }

  async evaluate(record: LogRecord): Promise<FilterDecision> {
    try {
      const result = await this.store.take(record.service, this.maxRecords, this.windowMs);

      if (!result.admitted) {
        logger.warn(
          { service: record.service, count: result.count, maxRecords: this.maxRecords },
          "Rate limit exceeded",
        );
        return reject(this.name, "rate limit exceeded");
      }
    } catch (err) {
      // Counter store unavailable: fail open
      logger.error({ err, service: record.service }, "Rate limit store error, admitting record");
    }

    return admit(record);
  }
}

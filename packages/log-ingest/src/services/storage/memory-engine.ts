import { InvalidPredicateError, WriteError } from "../../errors.js";
import {
  LOG_LEVELS,
  levelRank,
  type Ack,
  type LogLevel,
  type LogRecord,
  type Pagination,
  type QueryPredicate,
  type QueryResult,
  type StorageEngine,
  type StorageStats,
} from "../../types.js";
import { compareRecords } from "../record.js";
import {
  isAfter,
  matchesPredicate,
  nextCursorFor,
  normalizePagination,
  validatePredicate,
} from "./query.js";

interface TimeEntry {
  timestamp: number;
  id: string;
}

function compareEntries(a: TimeEntry, b: TimeEntry): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/** First index whose entry is not less than `target`. */
function lowerBound(entries: readonly TimeEntry[], target: TimeEntry): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const entry = entries[mid];
    if (entry && compareEntries(entry, target) < 0) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** First index whose timestamp is greater than `timestampMs`. */
function upperBoundTimestamp(entries: readonly TimeEntry[], timestampMs: number): number {
  let lo = 0;
  let hi = entries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const entry = entries[mid];
    if (entry && entry.timestamp <= timestampMs) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

class SetIndex {
  private readonly buckets = new Map<string, Set<string>>();

  add(key: string, id: string): void {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new Set();
      this.buckets.set(key, bucket);
    }
    bucket.add(id);
  }

  remove(key: string, id: string): void {
    const bucket = this.buckets.get(key);
    if (!bucket) return;
    bucket.delete(id);
    if (bucket.size === 0) this.buckets.delete(key);
  }

  get(key: string): ReadonlySet<string> {
    return this.buckets.get(key) ?? new Set();
  }

  counts(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [key, bucket] of this.buckets) out[key] = bucket.size;
    return out;
  }
}

export interface InMemoryStorageOptions {
  id: string;
  /** Maximum records held; appends beyond it raise WriteError. */
  capacity?: number;
}

/**
 * One shard's store held in process memory. Records are kept by id with a
 * sorted (timestamp, id) index for range scans and hash indexes for the
 * equality fields of a predicate.
 *
 * Every method mutates or reads the indexes without awaiting in between, so
 * concurrent callers always observe a consistent engine.
 */
export class InMemoryStorageEngine implements StorageEngine {
  readonly id: string;
  readonly capacity: number | undefined;

  private readonly records = new Map<string, LogRecord>();
  private readonly timeIndex: TimeEntry[] = [];
  private readonly byService = new SetIndex();
  private readonly byServiceLevel = new SetIndex();
  private readonly byLevel = new SetIndex();
  private readonly byCorrelationId = new SetIndex();

  constructor(options: InMemoryStorageOptions) {
    this.id = options.id;
    this.capacity = options.capacity;
  }

  get size(): number {
    return this.records.size;
  }

  async append(record: LogRecord): Promise<Ack> {
    if (this.records.has(record.id)) {
      return { id: record.id, duplicate: true };
    }
    if (this.capacity !== undefined && this.records.size >= this.capacity) {
      throw new WriteError(this.id, `capacity of ${this.capacity} records reached`);
    }

    this.records.set(record.id, record);
    const entry = { timestamp: record.timestamp, id: record.id };
    this.timeIndex.splice(lowerBound(this.timeIndex, entry), 0, entry);
    this.indexFields(record);

    return { id: record.id, duplicate: false };
  }

  async query(predicate: QueryPredicate, pagination?: Pagination): Promise<QueryResult> {
    validatePredicate(predicate);
    const page = normalizePagination(pagination);

    let after: LogRecord | undefined;
    if (page.cursor !== undefined) {
      after = this.records.get(page.cursor);
      if (!after) {
        throw new InvalidPredicateError(`Unknown cursor "${page.cursor}"`);
      }
    }

    const candidates = this.candidateIds(predicate);
    let matched: LogRecord[];

    if (candidates) {
      matched = [];
      for (const id of candidates) {
        const record = this.records.get(id);
        if (record && matchesPredicate(record, predicate)) matched.push(record);
      }
      matched.sort(compareRecords);
    } else {
      matched = this.scanTimeRange(predicate);
    }

    if (after) {
      const position = after;
      matched = matched.filter((record) => isAfter(record, position));
    }

    const records = matched.slice(page.offset, page.offset + page.limit);
    return { records, nextCursor: nextCursorFor(records, page.limit) };
  }

  async getById(id: string): Promise<LogRecord | null> {
    return this.records.get(id) ?? null;
  }

  async deleteBefore(timestampMs: number): Promise<number> {
    // Entries older than the bound form a prefix of the time index
    const end = lowerBound(this.timeIndex, { timestamp: timestampMs, id: "" });
    const expired = this.timeIndex.splice(0, end);

    for (const entry of expired) {
      const record = this.records.get(entry.id);
      if (!record) continue;
      this.records.delete(entry.id);
      this.unindexFields(record);
    }

    return expired.length;
  }

  async stats(): Promise<StorageStats> {
    const byLevel: Partial<Record<LogLevel, number>> = {};
    for (const level of LOG_LEVELS) {
      const count = this.byLevel.get(level).size;
      if (count > 0) byLevel[level] = count;
    }

    return {
      totalRecords: this.records.size,
      byService: this.byService.counts(),
      byLevel,
      oldestTimestamp: this.timeIndex[0]?.timestamp ?? null,
      newestTimestamp: this.timeIndex[this.timeIndex.length - 1]?.timestamp ?? null,
    };
  }

  // -----------------------------------------------------------------------
  // Indexes
  // -----------------------------------------------------------------------

  private indexFields(record: LogRecord): void {
    this.byService.add(record.service, record.id);
    this.byServiceLevel.add(`${record.service}|${record.level}`, record.id);
    this.byLevel.add(record.level, record.id);
    if (record.correlationId !== undefined) {
      this.byCorrelationId.add(record.correlationId, record.id);
    }
  }

  private unindexFields(record: LogRecord): void {
    this.byService.remove(record.service, record.id);
    this.byServiceLevel.remove(`${record.service}|${record.level}`, record.id);
    this.byLevel.remove(record.level, record.id);
    if (record.correlationId !== undefined) {
      this.byCorrelationId.remove(record.correlationId, record.id);
    }
  }

  /**
   * Intersect the id sets the predicate's equality fields select, smallest
   * first. Returns null when no hash index applies.
   */
  private candidateIds(predicate: QueryPredicate): Iterable<string> | null {
    const sets: ReadonlySet<string>[] = [];

    if (predicate.correlationId !== undefined) {
      sets.push(this.byCorrelationId.get(predicate.correlationId));
    }
    if (predicate.service !== undefined && predicate.level !== undefined) {
      sets.push(this.byServiceLevel.get(`${predicate.service}|${predicate.level}`));
    } else if (predicate.service !== undefined) {
      sets.push(this.byService.get(predicate.service));
    } else if (predicate.level !== undefined) {
      sets.push(this.byLevel.get(predicate.level));
    } else if (predicate.minLevel !== undefined) {
      const minRank = levelRank(predicate.minLevel);
      const union = new Set<string>();
      for (const level of LOG_LEVELS.filter((l) => levelRank(l) >= minRank)) {
        for (const id of this.byLevel.get(level)) union.add(id);
      }
      sets.push(union);
    }

    if (sets.length === 0) return null;

    sets.sort((a, b) => a.size - b.size);
    const [smallest, ...rest] = sets;
    if (!smallest) return null;

    const result: string[] = [];
    for (const id of smallest) {
      if (rest.every((set) => set.has(id))) result.push(id);
    }
    return result;
  }

  private scanTimeRange(predicate: QueryPredicate): LogRecord[] {
    const start =
      predicate.from === undefined ? 0 : lowerBound(this.timeIndex, { timestamp: predicate.from, id: "" });
    const end =
      predicate.to === undefined ? this.timeIndex.length : upperBoundTimestamp(this.timeIndex, predicate.to);

    const out: LogRecord[] = [];
    for (let i = start; i < end; i++) {
      const entry = this.timeIndex[i];
      const record = entry ? this.records.get(entry.id) : undefined;
      if (record && matchesPredicate(record, predicate)) out.push(record);
    }
    return out;
  }
}

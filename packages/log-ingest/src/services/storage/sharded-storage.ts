import { InvalidPredicateError } from "../../errors.js";
import {
  LOG_LEVELS,
  type Ack,
  type LogRecord,
  type Pagination,
  type QueryPredicate,
  type QueryResult,
  type StorageEngine,
  type StorageStats,
} from "../../types.js";
import { compareRecords } from "../record.js";
import type { ShardRouter } from "../shard-router.js";
import { isAfter, MAX_QUERY_LIMIT, nextCursorFor, normalizePagination, validatePredicate } from "./query.js";

function uniqueEngines(engines: Iterable<StorageEngine>): StorageEngine[] {
  const seen = new Map<string, StorageEngine>();
  for (const engine of engines) {
    if (!seen.has(engine.id)) seen.set(engine.id, engine);
  }
  return [...seen.values()];
}

/**
 * Query facade over every primary of a topology. Reads fan out to each
 * primary and merge by (timestamp, id); writes go to the routed primary.
 */
export class ShardedStorage implements StorageEngine {
  readonly id = "sharded";
  private readonly primaries: StorageEngine[];
  private readonly allStores: StorageEngine[];

  constructor(private readonly router: ShardRouter) {
    const sets = router.replicaSets();
    this.primaries = uniqueEngines(sets.map((set) => set.primary));
    this.allStores = uniqueEngines(sets.flatMap((set) => [set.primary, ...set.replicas]));
  }

  async append(record: LogRecord): Promise<Ack> {
    return this.router.route(record).replicaSet.primary.append(record);
  }

  async query(predicate: QueryPredicate, pagination?: Pagination): Promise<QueryResult> {
    validatePredicate(predicate);
    const page = normalizePagination(pagination);

    let after: LogRecord | null = null;
    if (page.cursor !== undefined) {
      after = await this.getById(page.cursor);
      if (!after) {
        throw new InvalidPredicateError(`Unknown cursor "${page.cursor}"`);
      }
    }

    const need = page.offset + page.limit;
    const perShard = await Promise.all(
      this.primaries.map((engine) => this.collect(engine, predicate, need, after)),
    );

    const merged = perShard.flat().sort(compareRecords);
    const records = merged.slice(page.offset, need);
    return { records, nextCursor: nextCursorFor(records, page.limit) };
  }

  async getById(id: string): Promise<LogRecord | null> {
    const found = await Promise.all(this.primaries.map((engine) => engine.getById(id)));
    return found.find((record): record is LogRecord => record !== null) ?? null;
  }

  /**
   * Purge replicas along with primaries. Returns the number of records
   * removed from the primaries, which is what queries stop seeing.
   */
  async deleteBefore(timestampMs: number): Promise<number> {
    const primaryIds = new Set(this.primaries.map((engine) => engine.id));
    const counts = await Promise.all(
      this.allStores.map(async (engine) => ({
        primary: primaryIds.has(engine.id),
        removed: await engine.deleteBefore(timestampMs),
      })),
    );
    return counts.filter((c) => c.primary).reduce((sum, c) => sum + c.removed, 0);
  }

  async stats(): Promise<StorageStats> {
    const all = await Promise.all(this.primaries.map((engine) => engine.stats()));

    const total: StorageStats = {
      totalRecords: 0,
      byService: {},
      byLevel: {},
      oldestTimestamp: null,
      newestTimestamp: null,
    };

    for (const stats of all) {
      total.totalRecords += stats.totalRecords;
      for (const [service, count] of Object.entries(stats.byService)) {
        total.byService[service] = (total.byService[service] ?? 0) + count;
      }
      for (const level of LOG_LEVELS) {
        const count = stats.byLevel[level];
        if (count !== undefined) total.byLevel[level] = (total.byLevel[level] ?? 0) + count;
      }
      if (stats.oldestTimestamp !== null) {
        total.oldestTimestamp =
          total.oldestTimestamp === null ? stats.oldestTimestamp : Math.min(total.oldestTimestamp, stats.oldestTimestamp);
      }
      if (stats.newestTimestamp !== null) {
        total.newestTimestamp =
          total.newestTimestamp === null ? stats.newestTimestamp : Math.max(total.newestTimestamp, stats.newestTimestamp);
      }
    }

    return total;
  }

  /**
   * Read up to `need` matching records from one engine, in order, strictly
   * after `after` when given. Pages through the engine with its own cursor.
   */
  private async collect(
    engine: StorageEngine,
    predicate: QueryPredicate,
    need: number,
    after: LogRecord | null,
  ): Promise<LogRecord[]> {
    if (after && predicate.to !== undefined && after.timestamp > predicate.to) return [];

    const bounded: QueryPredicate =
      after && (predicate.from === undefined || predicate.from < after.timestamp)
        ? { ...predicate, from: after.timestamp }
        : predicate;

    const out: LogRecord[] = [];
    let cursor: string | undefined;

    while (out.length < need) {
      const { records, nextCursor } = await engine.query(bounded, { limit: MAX_QUERY_LIMIT, cursor });
      for (const record of records) {
        if (!after || isAfter(record, after)) out.push(record);
      }
      if (nextCursor === null) break;
      cursor = nextCursor;
    }

    return out.slice(0, need);
  }
}

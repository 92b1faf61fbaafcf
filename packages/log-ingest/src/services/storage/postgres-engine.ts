import { and, asc, eq, gt, gte, inArray, lt, lte, or, sql, type SQL } from "drizzle-orm";
import { logRecords, type Database, type LogRecordRow } from "@logfeed/shared/db";
import { createLogger } from "@logfeed/shared/utils";

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
import { freezeRecord } from "../record.js";
import { nextCursorFor, normalizePagination, validatePredicate } from "./query.js";

const logger = createLogger("postgres-storage");

function toRecord(row: LogRecordRow): LogRecord {
  return freezeRecord({
    id: row.id,
    timestamp: row.timestampMs,
    level: row.level,
    service: row.service,
    message: row.message,
    ...(row.metadata !== null ? { metadata: row.metadata } : {}),
    ...(row.correlationId !== null ? { correlationId: row.correlationId } : {}),
  });
}

export interface PostgresStorageOptions {
  id: string;
  db: Database;
}

/**
 * Shard store backed by the `log_records` table, scoped to the rows carrying
 * this store's id. Inserts are idempotent on (store_id, id); ordering is
 * (timestamp_ms, id) to match the in-memory engine.
 */
export class PostgresStorageEngine implements StorageEngine {
  readonly id: string;
  private readonly db: Database;

  constructor(options: PostgresStorageOptions) {
    this.id = options.id;
    this.db = options.db;
  }

  async append(record: LogRecord): Promise<Ack> {
    try {
      const inserted = await this.db
        .insert(logRecords)
        .values({
          storeId: this.id,
          id: record.id,
          timestampMs: record.timestamp,
          level: record.level,
          service: record.service,
          message: record.message,
          metadata: record.metadata ? { ...record.metadata } : null,
          correlationId: record.correlationId ?? null,
        })
        .onConflictDoNothing({ target: [logRecords.storeId, logRecords.id] })
        .returning({ id: logRecords.id });

      return { id: record.id, duplicate: inserted.length === 0 };
    } catch (err) {
      logger.error({ err, store: this.id, recordId: record.id }, "Insert failed");
      throw new WriteError(this.id, `insert of ${record.id} failed`, { cause: err });
    }
  }

  async query(predicate: QueryPredicate, pagination?: Pagination): Promise<QueryResult> {
    validatePredicate(predicate);
    const page = normalizePagination(pagination);

    const conditions: SQL[] = [eq(logRecords.storeId, this.id)];

    if (predicate.from !== undefined) conditions.push(gte(logRecords.timestampMs, predicate.from));
    if (predicate.to !== undefined) conditions.push(lte(logRecords.timestampMs, predicate.to));
    if (predicate.service !== undefined) conditions.push(eq(logRecords.service, predicate.service));
    if (predicate.level !== undefined) conditions.push(eq(logRecords.level, predicate.level));
    if (predicate.minLevel !== undefined) {
      const minRank = levelRank(predicate.minLevel);
      conditions.push(inArray(logRecords.level, LOG_LEVELS.filter((level) => levelRank(level) >= minRank)));
    }
    if (predicate.correlationId !== undefined) {
      conditions.push(eq(logRecords.correlationId, predicate.correlationId));
    }

    if (page.cursor !== undefined) {
      const after = await this.getById(page.cursor);
      if (!after) {
        throw new InvalidPredicateError(`Unknown cursor "${page.cursor}"`);
      }
      const position = or(
        gt(logRecords.timestampMs, after.timestamp),
        and(eq(logRecords.timestampMs, after.timestamp), gt(logRecords.id, after.id)),
      );
      if (position) conditions.push(position);
    }

    const rows = await this.db
      .select()
      .from(logRecords)
      .where(and(...conditions))
      .orderBy(asc(logRecords.timestampMs), asc(logRecords.id))
      .limit(page.limit)
      .offset(page.offset);

    const records = rows.map(toRecord);
    return { records, nextCursor: nextCursorFor(records, page.limit) };
  }

  async getById(id: string): Promise<LogRecord | null> {
    const [row] = await this.db
      .select()
      .from(logRecords)
      .where(and(eq(logRecords.storeId, this.id), eq(logRecords.id, id)))
      .limit(1);
    return row ? toRecord(row) : null;
  }

  async deleteBefore(timestampMs: number): Promise<number> {
    const deleted = await this.db
      .delete(logRecords)
      .where(and(eq(logRecords.storeId, this.id), lt(logRecords.timestampMs, timestampMs)))
      .returning({ id: logRecords.id });
    return deleted.length;
  }

  async stats(): Promise<StorageStats> {
    const ownRows = eq(logRecords.storeId, this.id);
    const [totals, services, levels] = await Promise.all([
      this.db
        .select({
          count: sql<number>`count(*)::int`,
          oldest: sql<number | null>`min(${logRecords.timestampMs})`.mapWith(Number),
          newest: sql<number | null>`max(${logRecords.timestampMs})`.mapWith(Number),
        })
        .from(logRecords)
        .where(ownRows),
      this.db
        .select({ service: logRecords.service, count: sql<number>`count(*)::int` })
        .from(logRecords)
        .where(ownRows)
        .groupBy(logRecords.service),
      this.db
        .select({ level: logRecords.level, count: sql<number>`count(*)::int` })
        .from(logRecords)
        .where(ownRows)
        .groupBy(logRecords.level),
    ]);

    const byLevel: Partial<Record<LogLevel, number>> = {};
    for (const row of levels) byLevel[row.level] = row.count;

    return {
      totalRecords: totals[0]?.count ?? 0,
      byService: Object.fromEntries(services.map((row) => [row.service, row.count])),
      byLevel,
      oldestTimestamp: totals[0]?.oldest ?? null,
      newestTimestamp: totals[0]?.newest ?? null,
    };
  }
}

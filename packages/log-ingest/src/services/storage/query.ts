import { InvalidPredicateError } from "../../errors.js";
import { levelRank, LOG_LEVELS, type LogRecord, type Pagination, type QueryPredicate } from "../../types.js";

export const DEFAULT_QUERY_LIMIT = 100;
export const MAX_QUERY_LIMIT = 1000;

export interface NormalizedPagination {
  limit: number;
  offset: number;
  cursor?: string;
}

function isLevel(value: unknown): boolean {
  return LOG_LEVELS.some((level) => level === value);
}

/** Throws InvalidPredicateError for bounds or level names that cannot match. */
export function validatePredicate(predicate: QueryPredicate): void {
  for (const bound of ["from", "to"] as const) {
    const value = predicate[bound];
    if (value !== undefined && !Number.isFinite(value)) {
      throw new InvalidPredicateError(`${bound} must be a finite number`);
    }
  }
  if (predicate.from !== undefined && predicate.to !== undefined && predicate.from > predicate.to) {
    throw new InvalidPredicateError(`from (${predicate.from}) is after to (${predicate.to})`);
  }
  if (predicate.level !== undefined && !isLevel(predicate.level)) {
    throw new InvalidPredicateError(`Unknown log level "${String(predicate.level)}"`);
  }
  if (predicate.minLevel !== undefined && !isLevel(predicate.minLevel)) {
    throw new InvalidPredicateError(`Unknown log level "${String(predicate.minLevel)}"`);
  }
}

export function normalizePagination(pagination: Pagination = {}): NormalizedPagination {
  const limit = pagination.limit ?? DEFAULT_QUERY_LIMIT;
  const offset = pagination.offset ?? 0;

  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidPredicateError("limit must be a positive integer");
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidPredicateError("offset must be a non-negative integer");
  }
  if (pagination.cursor !== undefined && offset > 0) {
    throw new InvalidPredicateError("offset and cursor cannot be combined");
  }

  const normalized: NormalizedPagination = { limit: Math.min(limit, MAX_QUERY_LIMIT), offset };
  if (pagination.cursor !== undefined) normalized.cursor = pagination.cursor;
  return normalized;
}

/** Field-by-field check of a record against every predicate bound. */
export function matchesPredicate(record: LogRecord, predicate: QueryPredicate): boolean {
  if (predicate.from !== undefined && record.timestamp < predicate.from) return false;
  if (predicate.to !== undefined && record.timestamp > predicate.to) return false;
  if (predicate.service !== undefined && record.service !== predicate.service) return false;
  if (predicate.level !== undefined && record.level !== predicate.level) return false;
  if (predicate.minLevel !== undefined && levelRank(record.level) < levelRank(predicate.minLevel)) return false;
  if (predicate.correlationId !== undefined && record.correlationId !== predicate.correlationId) return false;
  return true;
}

/** True when `record` sorts strictly after the (timestamp, id) position. */
export function isAfter(record: LogRecord, position: { timestamp: number; id: string }): boolean {
  if (record.timestamp !== position.timestamp) return record.timestamp > position.timestamp;
  return record.id > position.id;
}

export function nextCursorFor(records: readonly LogRecord[], limit: number): string | null {
  const last = records[records.length - 1];
  return records.length === limit && last ? last.id : null;
}

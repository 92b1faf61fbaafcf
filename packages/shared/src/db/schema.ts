import {
  pgTable,
  pgEnum,
  text,
  bigint,
  jsonb,
  index,
  primaryKey,
} from "drizzle-orm/pg-core";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const logLevelEnum = pgEnum("log_level", [
  "DEBUG",
  "INFO",
  "WARN",
  "ERROR",
  "FATAL",
]);

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/**
 * One row per record per store. Every shard primary and replica writes to
 * this table under its own `store_id`. `id` is the time-ordered generator
 * id, so ordering by (timestamp_ms, id) matches the in-memory engine.
 */
export const logRecords = pgTable(
  "log_records",
  {
    storeId: text("store_id").notNull(),
    id: text("id").notNull(),
    timestampMs: bigint("timestamp_ms", { mode: "number" }).notNull(),
    level: logLevelEnum("level").notNull(),
    service: text("service").notNull(),
    message: text("message").notNull(),
    metadata: jsonb("metadata").$type<{ [key: string]: JsonValue }>(),
    correlationId: text("correlation_id"),
  },
  (table) => [
    primaryKey({ columns: [table.storeId, table.id] }),
    index("idx_log_records_timestamp").on(table.storeId, table.timestampMs, table.id),
    index("idx_log_records_service_level").on(table.storeId, table.service, table.level),
    index("idx_log_records_correlation_id").on(table.storeId, table.correlationId),
  ],
);

export type LogRecordRow = typeof logRecords.$inferSelect;
export type NewLogRecordRow = typeof logRecords.$inferInsert;

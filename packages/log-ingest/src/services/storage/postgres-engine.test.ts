import { describe, it, expect, vi, beforeEach } from "vitest";

// ---------------------------------------------------------------------------
// Module mocks – must be declared before any import that touches them
// ---------------------------------------------------------------------------

vi.mock("@logfeed/shared/utils", () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

vi.mock("@logfeed/shared/db", () => ({
  logRecords: {
    storeId: "store_id",
    id: "id",
    timestampMs: "timestamp_ms",
    level: "level",
    service: "service",
    message: "message",
    metadata: "metadata",
    correlationId: "correlation_id",
  },
}));

// Operators become marker objects so the built conditions can be asserted.
vi.mock("drizzle-orm", () => ({
  eq: vi.fn((col: unknown, val: unknown) => ({ _op: "eq", col, val })),
  gt: vi.fn((col: unknown, val: unknown) => ({ _op: "gt", col, val })),
  gte: vi.fn((col: unknown, val: unknown) => ({ _op: "gte", col, val })),
  lt: vi.fn((col: unknown, val: unknown) => ({ _op: "lt", col, val })),
  lte: vi.fn((col: unknown, val: unknown) => ({ _op: "lte", col, val })),
  inArray: vi.fn((col: unknown, val: unknown) => ({ _op: "inArray", col, val })),
  and: vi.fn((...args: unknown[]) => ({ _op: "and", args })),
  or: vi.fn((...args: unknown[]) => ({ _op: "or", args })),
  asc: vi.fn((col: unknown) => ({ _op: "asc", col })),
  sql: vi.fn(() => ({ _op: "sql", mapWith: vi.fn(() => ({ _op: "sql" })) })),
}));

import type { Database } from "@logfeed/shared/db";

import { PostgresStorageEngine } from "./postgres-engine.js";
import { InvalidPredicateError, WriteError } from "../../errors.js";
import type { LogRecord } from "../../types.js";

// ---------------------------------------------------------------------------
// Helpers – mock factories
// ---------------------------------------------------------------------------

/** Chainable builder that resolves to `resolvedValue` when awaited. */
function createQueryBuilder(resolvedValue: unknown) {
  const builder: Record<string, ReturnType<typeof vi.fn>> = {};

  for (const method of ["from", "where", "orderBy", "limit", "offset", "groupBy", "values", "onConflictDoNothing"]) {
    builder[method] = vi.fn().mockReturnValue(builder);
  }
  builder.returning = vi.fn().mockResolvedValue(resolvedValue);
  builder.then = vi.fn((resolve: (v: unknown) => void) => resolve(resolvedValue));

  return builder;
}

function createMockDb() {
  const selectResults: unknown[] = [];
  const selectBuilders: Record<string, ReturnType<typeof vi.fn>>[] = [];
  let insertResult: unknown = [];
  let deleteResult: unknown = [];
  const inserts: Record<string, ReturnType<typeof vi.fn>>[] = [];
  const deletes: Record<string, ReturnType<typeof vi.fn>>[] = [];

  const db = {
    select: vi.fn(() => {
      const builder = createQueryBuilder(selectResults.shift() ?? []);
      selectBuilders.push(builder);
      return builder;
    }),
    insert: vi.fn(() => {
      const builder = createQueryBuilder(insertResult);
      inserts.push(builder);
      return builder;
    }),
    delete: vi.fn(() => {
      const builder = createQueryBuilder(deleteResult);
      deletes.push(builder);
      return builder;
    }),
  };

  return {
    db,
    selectBuilders,
    inserts,
    deletes,
    queueSelect(...results: unknown[]) {
      selectResults.push(...results);
    },
    setInsertResult(value: unknown) {
      insertResult = value;
    },
    setDeleteResult(value: unknown) {
      deleteResult = value;
    },
  };
}

function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    id: "0000000001000-0001-0000",
    timestamp: 1_000,
    level: "INFO",
    service: "checkout",
    message: "order placed",
    ...overrides,
  };
}

function makeRow(overrides: Record<string, unknown> = {}) {
  return {
    id: "0000000001000-0001-0000",
    timestampMs: 1_000,
    level: "INFO",
    service: "checkout",
    message: "order placed",
    metadata: null,
    correlationId: null,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Test suite
// ---------------------------------------------------------------------------

describe("PostgresStorageEngine", () => {
  let mock: ReturnType<typeof createMockDb>;
  let engine: PostgresStorageEngine;

  beforeEach(() => {
    vi.clearAllMocks();
    mock = createMockDb();
    engine = new PostgresStorageEngine({ id: "pg-a", db: mock.db as unknown as Database });
  });

  describe("append", () => {
    it("inserts the record with conflict suppression", async () => {
      mock.setInsertResult([{ id: "0000000001000-0001-0000" }]);

      const ack = await engine.append(makeRecord({ correlationId: "req-1", metadata: { attempt: 1 } }));

      expect(ack).toEqual({ id: "0000000001000-0001-0000", duplicate: false });
      const insert = mock.inserts[0];
      expect(insert?.values).toHaveBeenCalledWith({
        storeId: "pg-a",
        id: "0000000001000-0001-0000",
        timestampMs: 1_000,
        level: "INFO",
        service: "checkout",
        message: "order placed",
        metadata: { attempt: 1 },
        correlationId: "req-1",
      });
      expect(insert?.onConflictDoNothing).toHaveBeenCalledWith({ target: ["store_id", "id"] });
    });

    it("reports a duplicate when nothing was inserted", async () => {
      mock.setInsertResult([]);
      expect(await engine.append(makeRecord())).toEqual({ id: "0000000001000-0001-0000", duplicate: true });
    });

    it("wraps driver failures in WriteError", async () => {
      mock.db.insert.mockImplementationOnce(() => {
        throw new Error("connection refused");
      });

      const error = await engine.append(makeRecord()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(WriteError);
      expect(error).toMatchObject({ message: "[pg-a] insert of 0000000001000-0001-0000 failed" });
    });
  });

  describe("query", () => {
    it("orders by (timestamp, id) and applies the page bounds", async () => {
      mock.queueSelect([makeRow(), makeRow({ id: "0000000001000-0001-0001", correlationId: "req-9" })]);

      const result = await engine.query({ service: "checkout", from: 500 }, { limit: 2, offset: 4 });

      const builder = mock.selectBuilders[0];
      expect(builder?.orderBy).toHaveBeenCalledWith(
        { _op: "asc", col: "timestamp_ms" },
        { _op: "asc", col: "id" },
      );
      expect(builder?.limit).toHaveBeenCalledWith(2);
      expect(builder?.offset).toHaveBeenCalledWith(4);
      expect(builder?.where).toHaveBeenCalledWith({
        _op: "and",
        args: [
          { _op: "eq", col: "store_id", val: "pg-a" },
          { _op: "gte", col: "timestamp_ms", val: 500 },
          { _op: "eq", col: "service", val: "checkout" },
        ],
      });

      expect(result.records.map((r) => r.id)).toEqual(["0000000001000-0001-0000", "0000000001000-0001-0001"]);
      expect(result.records[0]).not.toHaveProperty("correlationId");
      expect(result.records[1]?.correlationId).toBe("req-9");
      expect(result.nextCursor).toBe("0000000001000-0001-0001");
    });

    it("expands minLevel to the levels at or above it", async () => {
      mock.queueSelect([]);

      await engine.query({ minLevel: "ERROR" });

      expect(mock.selectBuilders[0]?.where).toHaveBeenCalledWith({
        _op: "and",
        args: [{ _op: "eq", col: "store_id", val: "pg-a" }, { _op: "inArray", col: "level", val: ["ERROR", "FATAL"] }],
      });
    });

    it("resumes strictly after the cursor's position", async () => {
      mock.queueSelect([makeRow({ id: "0000000002000-0001-0003", timestampMs: 2_000 })], []);

      const result = await engine.query({}, { cursor: "0000000002000-0001-0003" });

      expect(mock.selectBuilders[0]?.where).toHaveBeenCalledWith({
        _op: "and",
        args: [{ _op: "eq", col: "store_id", val: "pg-a" }, { _op: "eq", col: "id", val: "0000000002000-0001-0003" }],
      });

      expect(mock.selectBuilders[1]?.where).toHaveBeenCalledWith({
        _op: "and",
        args: [
          { _op: "eq", col: "store_id", val: "pg-a" },
          {
            _op: "or",
            args: [
              { _op: "gt", col: "timestamp_ms", val: 2_000 },
              {
                _op: "and",
                args: [
                  { _op: "eq", col: "timestamp_ms", val: 2_000 },
                  { _op: "gt", col: "id", val: "0000000002000-0001-0003" },
                ],
              },
            ],
          },
        ],
      });
      expect(result).toEqual({ records: [], nextCursor: null });
    });

    it("rejects a cursor that names no stored record", async () => {
      mock.queueSelect([]);
      await expect(engine.query({}, { cursor: "missing" })).rejects.toBeInstanceOf(InvalidPredicateError);
    });

    it("rejects inverted time bounds before touching the database", async () => {
      await expect(engine.query({ from: 10, to: 5 })).rejects.toBeInstanceOf(InvalidPredicateError);
      expect(mock.db.select).not.toHaveBeenCalled();
    });
  });

  describe("getById", () => {
    it("returns a frozen record", async () => {
      mock.queueSelect([makeRow({ metadata: { region: "eu" } })]);

      const record = await engine.getById("0000000001000-0001-0000");

      expect(record).toEqual({
        id: "0000000001000-0001-0000",
        timestamp: 1_000,
        level: "INFO",
        service: "checkout",
        message: "order placed",
        metadata: { region: "eu" },
      });
      expect(Object.isFrozen(record)).toBe(true);
    });

    it("returns null when absent", async () => {
      mock.queueSelect([]);
      expect(await engine.getById("nope")).toBeNull();
    });
  });

  describe("deleteBefore", () => {
    it("deletes strictly older rows and returns the count", async () => {
      mock.setDeleteResult([{ id: "a" }, { id: "b" }]);

      expect(await engine.deleteBefore(5_000)).toBe(2);
      expect(mock.deletes[0]?.where).toHaveBeenCalledWith({
        _op: "and",
        args: [{ _op: "eq", col: "store_id", val: "pg-a" }, { _op: "lt", col: "timestamp_ms", val: 5_000 }],
      });
    });
  });

  describe("stats", () => {
    it("aggregates totals, services and levels", async () => {
      mock.queueSelect(
        [{ count: 3, oldest: 1_000, newest: 3_000 }],
        [
          { service: "checkout", count: 2 },
          { service: "auth", count: 1 },
        ],
        [
          { level: "INFO", count: 2 },
          { level: "ERROR", count: 1 },
        ],
      );

      expect(await engine.stats()).toEqual({
        totalRecords: 3,
        byService: { checkout: 2, auth: 1 },
        byLevel: { INFO: 2, ERROR: 1 },
        oldestTimestamp: 1_000,
        newestTimestamp: 3_000,
      });
    });

    it("reports nulls for an empty table", async () => {
      mock.queueSelect([{ count: 0, oldest: null, newest: null }], [], []);

      expect(await engine.stats()).toEqual({
        totalRecords: 0,
        byService: {},
        byLevel: {},
        oldestTimestamp: null,
        newestTimestamp: null,
      });
    });
  });
});

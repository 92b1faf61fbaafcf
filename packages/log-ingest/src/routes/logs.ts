import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";

import { InvalidPredicateError, IngestErrorCode } from "../errors.js";
import type { IngestionPipeline } from "../services/pipeline.js";
import { MAX_QUERY_LIMIT } from "../services/storage/query.js";
import { parseLevel, type LogLevel, type Outcome, type Pagination, type QueryPredicate, type StorageEngine } from "../types.js";

// ---------------------------------------------------------------------------
// Request body / query types
// ---------------------------------------------------------------------------

interface BatchBody {
  records?: unknown;
}

interface LogsQuery {
  from?: string;
  to?: string;
  service?: string;
  level?: string;
  minLevel?: string;
  correlationId?: string;
  limit?: string;
  offset?: string;
  cursor?: string;
}

interface RecentQuery {
  minutes?: string;
  service?: string;
  level?: string;
  minLevel?: string;
  limit?: string;
}

interface PurgeQuery {
  before?: string;
}

interface IdParams {
  id: string;
}

const DEFAULT_RECENT_MINUTES = 60;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

/** Epoch milliseconds or an ISO-8601 string. */
function parseTime(value: string, field: string): number {
  const ms = /^\d+$/.test(value) ? Number(value) : Date.parse(value);
  if (!Number.isFinite(ms)) {
    throw new InvalidPredicateError(`${field} must be epoch milliseconds or an ISO-8601 timestamp`);
  }
  return ms;
}

function parseInteger(value: string, field: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isInteger(n)) {
    throw new InvalidPredicateError(`${field} must be an integer`);
  }
  return n;
}

function parseLevelParam(value: string, field: string): LogLevel {
  const level = parseLevel(value);
  if (!level) {
    throw new InvalidPredicateError(`Unknown log level "${value}" for ${field}`);
  }
  return level;
}

function toPredicate(query: LogsQuery): QueryPredicate {
  const predicate: QueryPredicate = {};
  if (query.from !== undefined) predicate.from = parseTime(query.from, "from");
  if (query.to !== undefined) predicate.to = parseTime(query.to, "to");
  if (query.service) predicate.service = query.service;
  if (query.level !== undefined) predicate.level = parseLevelParam(query.level, "level");
  if (query.minLevel !== undefined) predicate.minLevel = parseLevelParam(query.minLevel, "minLevel");
  if (query.correlationId) predicate.correlationId = query.correlationId;
  return predicate;
}

function toPagination(query: Pick<LogsQuery, "limit" | "offset" | "cursor">): Pagination {
  const pagination: Pagination = {};
  if (query.limit !== undefined) pagination.limit = parseInteger(query.limit, "limit");
  if (query.offset !== undefined) pagination.offset = parseInteger(query.offset, "offset");
  if (query.cursor) pagination.cursor = query.cursor;
  return pagination;
}

/** HTTP status for a submission outcome. */
export function outcomeStatus(outcome: Outcome): number {
  switch (outcome.status) {
    case "accepted":
      return 201;
    case "rejected":
      return 422;
    case "failed":
      if (
        outcome.error.code === IngestErrorCode.INVALID_RECORD ||
        outcome.error.code === IngestErrorCode.SUBMISSION_TIMEOUT
      ) {
        return outcome.error.httpStatus;
      }
      return 503;
  }
}

function outcomeBody(outcome: Outcome) {
  return outcome.status === "failed"
    ? { status: outcome.status, id: outcome.id, error: outcome.error.toJSON() }
    : outcome;
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

/**
 * Register all log routes on the Fastify instance.
 */
export function registerLogRoutes(
  fastify: FastifyInstance,
  pipeline: Pick<IngestionPipeline, "submit" | "submitBatch" | "stats">,
  storage: StorageEngine,
): void {
  // -------------------------------------------------------------------------
  // POST /logs - Submit one record
  // -------------------------------------------------------------------------
  fastify.post("/logs", async (request: FastifyRequest, reply: FastifyReply) => {
    const outcome = await pipeline.submit(request.body);
    return reply.code(outcomeStatus(outcome)).send(outcomeBody(outcome));
  });

  // -------------------------------------------------------------------------
  // POST /logs/batch - Submit records in order, one outcome each
  // -------------------------------------------------------------------------
  fastify.post<{ Body: BatchBody }>(
    "/logs/batch",
    async (request: FastifyRequest<{ Body: BatchBody }>, reply: FastifyReply) => {
      const records = request.body?.records;

      if (!Array.isArray(records) || records.length === 0) {
        return reply.code(400).send({
          error: "Bad request",
          message: "records must be a non-empty array",
        });
      }
      if (records.length > MAX_QUERY_LIMIT) {
        return reply.code(400).send({
          error: "Bad request",
          message: `A batch holds at most ${MAX_QUERY_LIMIT} records`,
        });
      }

      const outcomes = await pipeline.submitBatch(records);

      return reply.code(200).send({
        accepted: outcomes.filter((o) => o.status === "accepted").length,
        rejected: outcomes.filter((o) => o.status === "rejected").length,
        failed: outcomes.filter((o) => o.status === "failed").length,
        outcomes: outcomes.map(outcomeBody),
      });
    },
  );

  // -------------------------------------------------------------------------
  // GET /logs - Query by predicate
  // -------------------------------------------------------------------------
  fastify.get<{ Querystring: LogsQuery }>(
    "/logs",
    async (request: FastifyRequest<{ Querystring: LogsQuery }>, reply: FastifyReply) => {
      const result = await storage.query(toPredicate(request.query), toPagination(request.query));

      return reply.code(200).send({
        timestamp: new Date().toISOString(),
        count: result.records.length,
        nextCursor: result.nextCursor,
        records: result.records,
      });
    },
  );

  // -------------------------------------------------------------------------
  // GET /logs/recent - Records from the last N minutes
  // -------------------------------------------------------------------------
  fastify.get<{ Querystring: RecentQuery }>(
    "/logs/recent",
    async (request: FastifyRequest<{ Querystring: RecentQuery }>, reply: FastifyReply) => {
      const { minutes, limit, ...filters } = request.query;
      const window = minutes !== undefined ? Number(minutes) : DEFAULT_RECENT_MINUTES;

      if (!Number.isFinite(window) || window <= 0) {
        throw new InvalidPredicateError("minutes must be a positive number");
      }

      const from = Date.now() - window * 60_000;
      const predicate = { ...toPredicate(filters), from };
      const result = await storage.query(predicate, toPagination({ limit }));

      return reply.code(200).send({
        timestamp: new Date().toISOString(),
        from: new Date(from).toISOString(),
        count: result.records.length,
        nextCursor: result.nextCursor,
        records: result.records,
      });
    },
  );

  // -------------------------------------------------------------------------
  // GET /logs/stats - Volume per service and level, pipeline counters
  // -------------------------------------------------------------------------
  fastify.get("/logs/stats", async (_request: FastifyRequest, reply: FastifyReply) => {
    const storageStats = await storage.stats();

    return reply.code(200).send({
      timestamp: new Date().toISOString(),
      storage: storageStats,
      pipeline: pipeline.stats(),
    });
  });

  // -------------------------------------------------------------------------
  // GET /logs/:id - Fetch one record
  // -------------------------------------------------------------------------
  fastify.get<{ Params: IdParams }>(
    "/logs/:id",
    async (request: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) => {
      const record = await storage.getById(request.params.id);

      if (!record) {
        return reply.code(404).send({
          error: "Not found",
          message: `No record with id ${request.params.id}`,
        });
      }

      return reply.code(200).send(record);
    },
  );

  // -------------------------------------------------------------------------
  // DELETE /logs - Purge records older than a timestamp
  // -------------------------------------------------------------------------
  fastify.delete<{ Querystring: PurgeQuery }>(
    "/logs",
    async (request: FastifyRequest<{ Querystring: PurgeQuery }>, reply: FastifyReply) => {
      const { before } = request.query;

      if (!before) {
        return reply.code(400).send({
          error: "Bad request",
          message: "Query parameter before is required",
        });
      }

      const cutoff = parseTime(before, "before");
      const purged = await storage.deleteBefore(cutoff);

      return reply.code(200).send({
        purged,
        before: new Date(cutoff).toISOString(),
      });
    },
  );
}

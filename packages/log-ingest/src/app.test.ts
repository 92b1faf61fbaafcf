import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";

vi.mock("@logfeed/shared/utils", () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { buildApp } from "./app.js";
import { buildIngestion, type Ingestion } from "./bootstrap.js";
import { parseTopology } from "./config.js";
import { formatId } from "./services/id-generator.js";
import { freezeRecord } from "./services/record.js";

const API_KEY = "test-secret";

const topology = parseTopology({
  machineId: 1,
  filters: [{ type: "level", threshold: "INFO" }],
  routing: { policy: "service" },
  shards: [
    { id: "shard-0", primary: "p0", replicas: ["r0"] },
    { id: "shard-1", primary: "p1", replicas: ["r1"] },
  ],
});

const headers = { "x-internal-api-key": API_KEY };

describe("log-ingest HTTP API", () => {
  let ingestion: Ingestion;
  let app: FastifyInstance;

  beforeEach(async () => {
    ingestion = buildIngestion(topology);
    app = buildApp(ingestion, { apiKey: API_KEY });
    await app.ready();
  });

  afterEach(async () => {
    await ingestion.replication.drain();
    await app.close();
  });

  async function submit(body: Record<string, unknown>) {
    return app.inject({ method: "POST", url: "/logs", headers, payload: body });
  }

  /** Place an already-stamped record on its primary, as if ingested at `timestamp`. */
  async function seedRecord(timestamp: number, message: string): Promise<string> {
    const record = freezeRecord({ id: formatId(timestamp, 1, 0), timestamp, level: "INFO", service: "api", message });
    await ingestion.router.route(record).replicaSet.primary.append(record);
    return record.id;
  }

  // -------------------------------------------------------------------------
  // Auth and health
  // -------------------------------------------------------------------------

  it("serves /health without an API key", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", service: "log-ingest" });
  });

  it("rejects requests with a missing or wrong API key", async () => {
    const missing = await app.inject({ method: "GET", url: "/logs" });
    const wrong = await app.inject({
      method: "GET",
      url: "/logs",
      headers: { "x-internal-api-key": "not-the-key" },
    });

    expect(missing.statusCode).toBe(401);
    expect(wrong.statusCode).toBe(401);
    expect(missing.json()).toEqual({
      error: "Unauthorized",
      message: "Invalid or missing x-internal-api-key header",
    });
  });

  // -------------------------------------------------------------------------
  // POST /logs
  // -------------------------------------------------------------------------

  it("answers 201 with the receipt for an accepted record", async () => {
    const res = await submit({ service: "api", level: "info", message: "started" });

    expect(res.statusCode).toBe(201);
    const body = res.json();
    expect(body.status).toBe("accepted");
    expect(body.id).toMatch(/^\d{13}-0001-\d{4}$/);
    expect(body.receipt.primaryAck).toBe(true);
    expect(body.receipt.recordId).toBe(body.id);
  });

  it("answers 422 for a record the filter chain rejects", async () => {
    const res = await submit({ service: "api", level: "DEBUG", message: "noise" });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ status: "rejected", stage: "level", reason: "below threshold" });
  });

  it("answers 400 for an invalid record", async () => {
    const res = await submit({ level: "INFO", message: "no service" });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      status: "failed",
      error: { code: "INVALID_RECORD", message: "Field service must be a non-empty string" },
    });
  });

  // -------------------------------------------------------------------------
  // POST /logs/batch
  // -------------------------------------------------------------------------

  it("reports one outcome per batch entry in order", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/logs/batch",
      headers,
      payload: {
        records: [
          { service: "api", level: "INFO", message: "one" },
          { service: "api", level: "DEBUG", message: "two" },
          { service: "worker", level: "ERROR", message: "three" },
        ],
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({ accepted: 2, rejected: 1, failed: 0 });
    expect(body.outcomes.map((o: { status: string }) => o.status)).toEqual([
      "accepted",
      "rejected",
      "accepted",
    ]);
  });

  it("refuses an empty batch", async () => {
    const res = await app.inject({ method: "POST", url: "/logs/batch", headers, payload: { records: [] } });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("records must be a non-empty array");
  });

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  it("queries by service with cursor paging", async () => {
    const first = (await submit({ service: "api", level: "INFO", message: "a" })).json();
    const second = (await submit({ service: "api", level: "WARN", message: "b" })).json();
    await submit({ service: "worker", level: "INFO", message: "c" });

    const page1 = await app.inject({ method: "GET", url: "/logs?service=api&limit=1", headers });
    expect(page1.statusCode).toBe(200);
    expect(page1.json()).toMatchObject({ count: 1, nextCursor: first.id });
    expect(page1.json().records[0].id).toBe(first.id);

    const page2 = await app.inject({
      method: "GET",
      url: `/logs?service=api&limit=1&cursor=${first.id}`,
      headers,
    });
    expect(page2.json().records.map((r: { id: string }) => r.id)).toEqual([second.id]);
  });

  it("filters by minimum level", async () => {
    await submit({ service: "api", level: "INFO", message: "a" });
    const warn = (await submit({ service: "worker", level: "WARN", message: "b" })).json();

    const res = await app.inject({ method: "GET", url: "/logs?minLevel=warn", headers });

    expect(res.json().records.map((r: { id: string }) => r.id)).toEqual([warn.id]);
  });

  it("answers 400 for an unknown level", async () => {
    const res = await app.inject({ method: "GET", url: "/logs?level=bogus", headers });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "INVALID_PREDICATE",
      message: 'Unknown log level "bogus" for level',
    });
  });

  it("answers 400 when from is after to", async () => {
    const res = await app.inject({ method: "GET", url: "/logs?from=2000&to=1000", headers });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("INVALID_PREDICATE");
  });

  it("returns only records from the recent window", async () => {
    await seedRecord(Date.parse("2020-01-01T00:00:00.000Z"), "old");
    const fresh = (await submit({ service: "api", level: "INFO", message: "fresh" })).json();

    const res = await app.inject({ method: "GET", url: "/logs/recent?minutes=5", headers });

    expect(res.statusCode).toBe(200);
    expect(res.json().records.map((r: { id: string }) => r.id)).toEqual([fresh.id]);
  });

  it("fetches one record by id and 404s on unknown ids", async () => {
    const accepted = (await submit({ service: "api", level: "ERROR", message: "boom" })).json();

    const found = await app.inject({ method: "GET", url: `/logs/${accepted.id}`, headers });
    const missing = await app.inject({ method: "GET", url: "/logs/0000000000001-0001-0000", headers });

    expect(found.statusCode).toBe(200);
    expect(found.json()).toMatchObject({ id: accepted.id, service: "api", level: "ERROR", message: "boom" });
    expect(missing.statusCode).toBe(404);
  });

  it("summarizes storage and pipeline counters", async () => {
    await submit({ service: "api", level: "INFO", message: "a" });
    await submit({ service: "api", level: "DEBUG", message: "b" });

    const res = await app.inject({ method: "GET", url: "/logs/stats", headers });
    const body = res.json();

    expect(body.storage.totalRecords).toBe(1);
    expect(body.storage.byService).toEqual({ api: 1 });
    expect(body.pipeline).toEqual({
      accepted: 1,
      rejected: 1,
      failed: 0,
      rejectionsByStage: { level: 1 },
    });
  });

  // -------------------------------------------------------------------------
  // DELETE /logs
  // -------------------------------------------------------------------------

  it("purges records older than before", async () => {
    await seedRecord(1_000, "old");
    await submit({ service: "api", level: "INFO", message: "new" });
    await ingestion.replication.drain();

    const res = await app.inject({ method: "DELETE", url: "/logs?before=2000", headers });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ purged: 1, before: "1970-01-01T00:00:02.000Z" });
    expect((await ingestion.storage.stats()).totalRecords).toBe(1);
  });

  it("requires before on DELETE /logs", async () => {
    const res = await app.inject({ method: "DELETE", url: "/logs", headers });

    expect(res.statusCode).toBe(400);
  });

  // -------------------------------------------------------------------------
  // GET /replication/lag
  // -------------------------------------------------------------------------

  it("reports lag for every replica", async () => {
    await submit({ service: "api", level: "INFO", message: "a" });
    await ingestion.replication.drain();

    const res = await app.inject({ method: "GET", url: "/replication/lag", headers });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.pending).toBe(0);
    expect(Object.keys(body.replicas).sort()).toEqual(["r0", "r1"]);
  });
});

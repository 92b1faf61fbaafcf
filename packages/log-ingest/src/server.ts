import "dotenv/config";
import { resolve } from "node:path";
import { Redis } from "ioredis";
import type pg from "pg";
import {
  createLogger,
  envInt,
  INGEST_ENV_REQUIREMENTS,
  validateEnvironment,
} from "@logfeed/shared/utils";
import { createDb, ensureSchema, type Database } from "@logfeed/shared/db";

import { buildApp } from "./app.js";
import { buildIngestion } from "./bootstrap.js";
import { loadTopology } from "./config.js";
import { RedisIntake } from "./services/redis-intake.js";
import { RetentionPurger } from "./services/retention.js";

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

const logger = createLogger("log-ingest");

// ---------------------------------------------------------------------------
// Environment configuration
// ---------------------------------------------------------------------------

const env = validateEnvironment(INGEST_ENV_REQUIREMENTS);

const PORT = envInt(env, "INGEST_PORT", 3009);
const HOST = env.values["INGEST_HOST"] ?? "0.0.0.0";
const TOPOLOGY_PATH = resolve(env.values["INGEST_TOPOLOGY_PATH"] ?? "config/topology.json");
const SUBMIT_TIMEOUT_MS = envInt(env, "SUBMIT_TIMEOUT_MS", 5000);
const RETENTION_DAYS = envInt(env, "LOG_RETENTION_DAYS", 30);
const INTERNAL_API_KEY = env.values["INTERNAL_API_KEY"] ?? "";
const REDIS_URL = env.values["REDIS_URL"];
const DATABASE_URL = env.values["DATABASE_URL"];

// ---------------------------------------------------------------------------
// Main startup
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const topology = await loadTopology(TOPOLOGY_PATH);
  logger.info({ path: TOPOLOGY_PATH, shards: topology.shards.length }, "Topology loaded");

  // -------------------------------------------------------------------------
  // Connect to PostgreSQL via Drizzle (optional)
  // -------------------------------------------------------------------------
  let db: Database | undefined;
  let pool: pg.Pool | undefined;

  if (DATABASE_URL) {
    logger.info("Connecting to PostgreSQL...");
    const connection = createDb(DATABASE_URL);
    try {
      const client = await connection.pool.connect();
      client.release();
      await ensureSchema(connection.pool);
      logger.info("PostgreSQL connected");
    } catch (err) {
      logger.error({ err }, "Failed to connect to PostgreSQL");
      throw err;
    }
    db = connection.db;
    pool = connection.pool;
  }

  // -------------------------------------------------------------------------
  // Connect to Redis (optional)
  // -------------------------------------------------------------------------
  let redis: Redis | undefined;

  if (REDIS_URL) {
    logger.info("Connecting to Redis...");
    redis = new Redis(REDIS_URL, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        const delay = Math.min(times * 200, 5000);
        return delay;
      },
      lazyConnect: true,
    });
    await redis.connect();
    logger.info("Redis connected");
  }

  // -------------------------------------------------------------------------
  // Build the pipeline and its HTTP surface
  // -------------------------------------------------------------------------
  const ingestion = buildIngestion(topology, { redis, db, defaultTimeoutMs: SUBMIT_TIMEOUT_MS });

  const fastify = buildApp(ingestion, {
    apiKey: INTERNAL_API_KEY,
    logger: {
      level: process.env["LOG_LEVEL"] ?? "info",
      timestamp: true,
    },
  });

  const intake = redis ? new RedisIntake(redis, ingestion.pipeline) : null;
  await intake?.start();

  const retention = new RetentionPurger(ingestion.storage, { retentionDays: RETENTION_DAYS });
  retention.start();

  // -------------------------------------------------------------------------
  // Start server
  // -------------------------------------------------------------------------
  await fastify.listen({ port: PORT, host: HOST });
  logger.info({ port: PORT, host: HOST }, "Log ingest server started");

  // -------------------------------------------------------------------------
  // Graceful shutdown
  // -------------------------------------------------------------------------
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down log ingest...");

    retention.stop();
    await intake?.stop();

    try {
      await fastify.close();
      logger.info("Fastify server closed");
    } catch (err) {
      logger.error({ err }, "Error closing Fastify");
    }

    // Let replica fan-out finish before the stores go away
    await ingestion.replication.drain();

    if (redis) {
      try {
        redis.disconnect();
        logger.info("Redis disconnected");
      } catch (err) {
        logger.error({ err }, "Error disconnecting Redis");
      }
    }

    if (pool) {
      try {
        await pool.end();
        logger.info("PostgreSQL pool closed");
      } catch (err) {
        logger.error({ err }, "Error closing PostgreSQL pool");
      }
    }

    logger.info("Log ingest shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.fatal({ err }, "Log ingest failed to start");
  process.exit(1);
});

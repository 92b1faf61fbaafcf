import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";

import type { Ingestion } from "./bootstrap.js";
import { ingestErrorHandler } from "./routes/error-handler.js";
import { registerHealthRoute } from "./routes/health.js";
import { registerLogRoutes } from "./routes/logs.js";
import { registerReplicationRoutes } from "./routes/replication.js";

export interface AppOptions {
  /** When set, every route except /health requires x-internal-api-key. */
  apiKey?: string;
  logger?: FastifyServerOptions["logger"];
}

/**
 * Build the HTTP surface over an ingestion topology. Nothing listens
 * until the caller does; tests drive it through inject().
 */
export function buildApp(ingestion: Ingestion, options: AppOptions = {}): FastifyInstance {
  const fastify = Fastify({ logger: options.logger ?? false });

  // Register CORS
  void fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
  });

  // -------------------------------------------------------------------------
  // Authentication middleware
  // -------------------------------------------------------------------------
  const apiKey = options.apiKey;
  fastify.addHook("onRequest", async (request, reply) => {
    if (request.url === "/health" || !apiKey) return;

    const providedKey = request.headers["x-internal-api-key"];
    if (providedKey !== apiKey) {
      return reply.code(401).send({
        error: "Unauthorized",
        message: "Invalid or missing x-internal-api-key header",
      });
    }
  });

  fastify.setErrorHandler(ingestErrorHandler);

  // -------------------------------------------------------------------------
  // Register routes
  // -------------------------------------------------------------------------
  registerHealthRoute(fastify);
  registerLogRoutes(fastify, ingestion.pipeline, ingestion.storage);
  registerReplicationRoutes(fastify, ingestion.replication);

  return fastify;
}

import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { createLogger } from "@logfeed/shared/utils";

import { isIngestError } from "../errors.js";

const logger = createLogger("ingest-error-handler");

/**
 * Fastify error handler for the ingest API.
 *
 * IngestErrors answer with their own status and code; anything else keeps
 * the status Fastify attached (body parsing, validation) or becomes a 500.
 * Server-side failures hide their message from the client.
 */
export function ingestErrorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  if (isIngestError(error)) {
    const statusCode = error.httpStatus;
    const context = { err: error, url: request.url, method: request.method, statusCode };
    if (statusCode >= 500) {
      logger.error(context, "Ingest request error");
    } else {
      logger.warn(context, "Ingest request rejected");
    }

    void reply.code(statusCode).send({
      error: error.code,
      message: statusCode >= 500 ? "Internal server error. Please try again later." : error.message,
    });
    return;
  }

  const statusCode = error.statusCode ?? 500;

  logger.error(
    { err: error, url: request.url, method: request.method, statusCode },
    "Request error",
  );

  void reply.code(statusCode).send({
    error: statusCode >= 500 ? "Internal server error" : "Bad request",
    message:
      statusCode >= 500
        ? "Internal server error. Please try again later."
        : error.message || "An error occurred processing the request.",
  });
}

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { PrimaryReplicaReplication } from "../services/replication/replication-strategy.js";

/**
 * Register GET /replication/lag: per-replica lag and the number of
 * fan-outs still in flight.
 */
export function registerReplicationRoutes(
  fastify: FastifyInstance,
  replication: Pick<PrimaryReplicaReplication, "lagSnapshot" | "pending">,
): void {
  fastify.get("/replication/lag", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      timestamp: new Date().toISOString(),
      pending: replication.pending,
      replicas: replication.lagSnapshot(),
    });
  });
}

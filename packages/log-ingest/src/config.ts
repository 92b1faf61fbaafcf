import { readFile } from "node:fs/promises";
import { z } from "zod";

import { ConfigurationError } from "./errors.js";
import type { FilterStageConfig } from "./services/filters/index.js";
import { LOG_LEVELS } from "./types.js";

// ---------------------------------------------------------------------------
// Filter stages
// ---------------------------------------------------------------------------

const levelSchema = z.preprocess(
  (value) => (typeof value === "string" ? value.toUpperCase() : value),
  z.enum(LOG_LEVELS),
);

const stageName = z.string().min(1).optional();

const filterStageSchema: z.ZodType<FilterStageConfig, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("level"), name: stageName, threshold: levelSchema }),
    z.object({
      type: z.literal("service"),
      name: stageName,
      mode: z.enum(["allow", "deny"]),
      services: z.array(z.string().min(1)),
    }),
    z.object({
      type: z.literal("rate-limit"),
      name: stageName,
      maxRecords: z.number().int().positive(),
      windowMs: z.number().int().positive(),
      strategy: z.enum(["fixed", "sliding"]).optional(),
      store: z.enum(["memory", "redis"]).optional(),
    }),
    z.object({
      type: z.literal("content"),
      name: stageName,
      mode: z.enum(["reject", "redact"]),
      patterns: z
        .array(z.object({ name: z.string().min(1), pattern: z.string().min(1), flags: z.string().optional() }))
        .optional(),
      sensitiveKeys: z.array(z.string().min(1)).optional(),
      includeDefaults: z.boolean().optional(),
      replacement: z.string().optional(),
    }),
    z.object({
      type: z.literal("composite"),
      name: stageName,
      mode: z.enum(["and", "or"]),
      children: z.array(filterStageSchema).min(1),
    }),
  ]),
);

/** The Redis store counts fixed windows only. */
function checkRateLimitStores(
  stages: readonly FilterStageConfig[],
  path: (string | number)[],
  ctx: z.RefinementCtx,
): void {
  stages.forEach((stage, index) => {
    if (stage.type === "rate-limit" && stage.store === "redis" && stage.strategy === "sliding") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [...path, index, "strategy"],
        message: 'The redis rate-limit store supports only the "fixed" strategy',
      });
    } else if (stage.type === "composite") {
      checkRateLimitStores(stage.children, [...path, index, "children"], ctx);
    }
  });
}

// ---------------------------------------------------------------------------
// Topology
// ---------------------------------------------------------------------------

const storeId = z.string().min(1);

export const topologySchema = z
  .object({
    machineId: z.number().int().min(0).max(9999),
    generator: z
      .object({
        sequenceCapacity: z.number().int().min(1).max(10_000).optional(),
        clockRegressionToleranceMs: z.number().int().nonnegative().optional(),
        onSequenceExhausted: z.enum(["wait", "error"]).optional(),
        maxWaitMs: z.number().int().nonnegative().optional(),
      })
      .optional(),
    filters: z.array(filterStageSchema).optional(),
    routing: z.object({
      policy: z.enum(["service", "time", "hybrid"]),
      bucketMs: z.number().int().positive().optional(),
      serviceShards: z.record(z.number().int().nonnegative()).optional(),
    }),
    shards: z
      .array(
        z.object({
          id: storeId,
          primary: storeId,
          replicas: z.array(storeId).optional(),
          capacity: z.number().int().positive().optional(),
        }),
      )
      .min(1),
    replication: z
      .object({
        maxAttempts: z.number().int().min(1).optional(),
        baseDelayMs: z.number().int().nonnegative().optional(),
        maxDelayMs: z.number().int().nonnegative().optional(),
      })
      .optional(),
  })
  .superRefine((topology, ctx) => {
    const shardIds = new Set<string>();
    const storeIds = new Set<string>();

    topology.shards.forEach((shard, index) => {
      if (shardIds.has(shard.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["shards", index, "id"], message: `Duplicate shard id "${shard.id}"` });
      }
      shardIds.add(shard.id);

      for (const store of [shard.primary, ...(shard.replicas ?? [])]) {
        if (storeIds.has(store)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["shards", index],
            message: `Store "${store}" appears more than once in the topology`,
          });
        }
        storeIds.add(store);
      }
    });

    checkRateLimitStores(topology.filters ?? [], ["filters"], ctx);

    for (const [service, partition] of Object.entries(topology.routing.serviceShards ?? {})) {
      if (partition >= topology.shards.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["routing", "serviceShards", service],
          message: `Partition ${partition} is out of range for ${topology.shards.length} shards`,
        });
      }
    }
  });

export type Topology = z.infer<typeof topologySchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Validate a parsed topology document. Throws ConfigurationError. */
export function parseTopology(input: unknown): Topology {
  const result = topologySchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid topology: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function loadTopology(filePath: string): Promise<Topology> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read topology file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(
      `Topology file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseTopology(document);
}

import { createLogger } from "@logfeed/shared/utils";

import { IngestErrorCode, toIngestError } from "../errors.js";
import type { LogRecord, Outcome, PipelineStats, SubmitOptions } from "../types.js";
import { untilAborted } from "../utils/abort.js";
import type { FilterChain } from "./filters/filter-chain.js";
import { parseId, type IdGenerator } from "./id-generator.js";
import { buildRecord, validateRawRecord } from "./record.js";
import type { ReplicationStrategy } from "./replication/replication-strategy.js";
import type { ShardRouter } from "./shard-router.js";

const logger = createLogger("ingestion-pipeline");

export interface IngestionPipelineDeps {
  generator: IdGenerator;
  chain: FilterChain;
  router: ShardRouter;
  replication: ReplicationStrategy;
  /** Applied when submit() is called without its own timeout. */
  defaultTimeoutMs?: number;
}

/**
 * Sequences one submission: id, admission, routing, commit. The deadline
 * covers every step up to the primary acknowledgement; replica fan-out runs
 * on past it.
 */
export class IngestionPipeline {
  private readonly generator: IdGenerator;
  private readonly chain: FilterChain;
  private readonly router: ShardRouter;
  private readonly replication: ReplicationStrategy;
  private readonly defaultTimeoutMs: number | undefined;

  private accepted = 0;
  private rejected = 0;
  private failed = 0;

  constructor(deps: IngestionPipelineDeps) {
    this.generator = deps.generator;
    this.chain = deps.chain;
    this.router = deps.router;
    this.replication = deps.replication;
    this.defaultTimeoutMs = deps.defaultTimeoutMs;
  }

  /** `raw` is a RawLogRecord as sent by a producer; it is validated here. */
  async submit(raw: unknown, options: SubmitOptions = {}): Promise<Outcome> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const timer = timeoutMs !== undefined ? setTimeout(() => controller.abort(), timeoutMs) : null;

    try {
      return await this.process(raw, controller.signal);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  /** Submit records one after another, returning an outcome per record. */
  async submitBatch(raws: readonly unknown[], options: SubmitOptions = {}): Promise<Outcome[]> {
    const outcomes: Outcome[] = [];
    for (const raw of raws) {
      outcomes.push(await this.submit(raw, options));
    }
    return outcomes;
  }

  stats(): PipelineStats {
    return {
      accepted: this.accepted,
      rejected: this.rejected,
      failed: this.failed,
      rejectionsByStage: this.chain.rejectionCounts(),
    };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async process(raw: unknown, signal: AbortSignal): Promise<Outcome> {
    let record: LogRecord;
    try {
      const validated = validateRawRecord(raw);
      const id = await this.generator.next(signal);
      record = buildRecord(validated, id, parseId(id)?.timestamp ?? Date.now());
    } catch (err) {
      return this.fail(err);
    }

    let admitted: LogRecord;
    try {
      const decision = await untilAborted(this.chain.evaluate(record), signal);
      if (!decision.admit) {
        this.rejected++;
        return { status: "rejected", id: record.id, reason: decision.reason, stage: decision.stage };
      }
      admitted = decision.record;
    } catch (err) {
      return this.fail(err, record.id);
    }

    try {
      const { key, replicaSet } = this.router.route(admitted);
      const receipt = await this.replication.commit(admitted, replicaSet, { signal });
      this.accepted++;
      logger.debug({ id: admitted.id, shard: key.id, service: admitted.service }, "Record accepted");
      return { status: "accepted", id: admitted.id, receipt };
    } catch (err) {
      return this.fail(err, admitted.id);
    }
  }

  private fail(err: unknown, id?: string): Outcome {
    this.failed++;
    const error = toIngestError(err);
    if (error.code === IngestErrorCode.INVALID_RECORD) {
      logger.warn({ id, reason: error.message }, "Invalid record");
    } else {
      logger.error({ err: error, id, code: error.code }, "Submission failed");
    }
    return id === undefined ? { status: "failed", error } : { status: "failed", id, error };
  }
}

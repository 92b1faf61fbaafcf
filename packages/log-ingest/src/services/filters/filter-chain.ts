import { createLogger } from "@logfeed/shared/utils";

import type { FilterDecision, FilterStage, LogRecord } from "../../types.js";

const logger = createLogger("filter-chain");

/**
 * Ordered admission stages evaluated by a single loop. The first rejection
 * decides the outcome and no later stage runs.
 */
export class FilterChain {
  private readonly rejections = new Map<string, number>();

  constructor(private readonly stages: readonly FilterStage[]) {}

  get size(): number {
    return this.stages.length;
  }

  stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  async evaluate(record: LogRecord): Promise<FilterDecision> {
    let current = record;

    for (const stage of this.stages) {
      const decision = await stage.evaluate(current);

      if (!decision.admit) {
        this.rejections.set(decision.stage, (this.rejections.get(decision.stage) ?? 0) + 1);
        logger.debug(
          { id: record.id, service: record.service, stage: decision.stage, reason: decision.reason },
          "Record rejected",
        );
        return decision;
      }

      current = decision.record;
    }

    return { admit: true, record: current };
  }

  /** Rejections so far, keyed by the rejecting stage name. */
  rejectionCounts(): Record<string, number> {
    return Object.fromEntries(this.rejections);
  }
}

import { ConfigurationError } from "../../errors.js";
import type { FilterDecision, FilterStage, LogRecord } from "../../types.js";
import { admit, reject } from "./decision.js";

export type CompositeMode = "and" | "or";

/**
 * Combines child stages into one. AND stops at the first rejecting child and
 * threads each child's output record into the next; OR admits on the first
 * admitting child.
 */
export class CompositeFilter implements FilterStage {
  readonly name: string;

  constructor(
    readonly mode: CompositeMode,
    private readonly children: readonly FilterStage[],
    name = `composite-${mode}`,
  ) {
    if (children.length === 0) {
      throw new ConfigurationError(`Composite filter "${name}" needs at least one child`);
    }
    this.name = name;
  }

  async evaluate(record: LogRecord): Promise<FilterDecision> {
    return this.mode === "and" ? this.evaluateAll(record) : this.evaluateAny(record);
  }

  private async evaluateAll(record: LogRecord): Promise<FilterDecision> {
    let current = record;
    for (const child of this.children) {
      const decision = await child.evaluate(current);
      if (!decision.admit) {
        return reject(`${this.name}/${decision.stage}`, decision.reason);
      }
      current = decision.record;
    }
    return admit(current);
  }

  private async evaluateAny(record: LogRecord): Promise<FilterDecision> {
    const reasons: string[] = [];
    for (const child of this.children) {
      const decision = await child.evaluate(record);
      if (decision.admit) return decision;
      reasons.push(decision.reason);
    }
    return reject(this.name, `no filter admitted: ${reasons.join("; ")}`);
  }
}

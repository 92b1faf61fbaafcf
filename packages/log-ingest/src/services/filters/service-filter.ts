import type { FilterDecision, FilterStage, LogRecord } from "../../types.js";
import { admit, reject } from "./decision.js";

export type ServiceFilterMode = "allow" | "deny";

/**
 * Allow mode admits only the listed services; deny mode admits everything
 * except them.
 */
export class ServiceFilter implements FilterStage {
  readonly name: string;
  private readonly services: ReadonlySet<string>;

  constructor(readonly mode: ServiceFilterMode, services: Iterable<string>, name = "service") {
    this.name = name;
    this.services = new Set(services);
  }

  async evaluate(record: LogRecord): Promise<FilterDecision> {
    const listed = this.services.has(record.service);

    if (this.mode === "allow" && !listed) {
      return reject(this.name, "service not allowed");
    }
    if (this.mode === "deny" && listed) {
      return reject(this.name, "service denied");
    }
    return admit(record);
  }
}

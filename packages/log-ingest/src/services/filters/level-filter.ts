import { levelRank, type FilterDecision, type FilterStage, type LogLevel, type LogRecord } from "../../types.js";
import { admit, reject } from "./decision.js";

/** Rejects records less severe than the threshold. */
export class LevelFilter implements FilterStage {
  readonly name: string;
  private readonly thresholdRank: number;

  constructor(readonly threshold: LogLevel, name = "level") {
    this.name = name;
    this.thresholdRank = levelRank(threshold);
  }

  async evaluate(record: LogRecord): Promise<FilterDecision> {
    return levelRank(record.level) < this.thresholdRank
      ? reject(this.name, "below threshold")
      : admit(record);
  }
}

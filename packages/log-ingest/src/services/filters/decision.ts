import type { FilterDecision, LogRecord } from "../../types.js";

export function admit(record: LogRecord): FilterDecision {
  return { admit: true, record };
}

export function reject(stage: string, reason: string): FilterDecision {
  return { admit: false, reason, stage };
}

import { describe, it, expect } from "vitest";

import { LevelFilter } from "./level-filter.js";
import { ServiceFilter } from "./service-filter.js";
import { freezeRecord } from "../record.js";
import type { LogRecord } from "../../types.js";

function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return freezeRecord({
    id: "0000000001000-0001-0000",
    timestamp: 1_000,
    level: "INFO",
    service: "checkout",
    message: "order placed",
    ...overrides,
  });
}

describe("LevelFilter", () => {
  const filter = new LevelFilter("WARN");

  it("rejects records below the threshold", async () => {
    expect(await filter.evaluate(makeRecord({ level: "INFO" }))).toEqual({
      admit: false,
      reason: "below threshold",
      stage: "level",
    });
  });

  it("admits records at or above the threshold", async () => {
    const error = makeRecord({ level: "ERROR" });
    const warn = makeRecord({ level: "WARN" });

    expect(await filter.evaluate(error)).toEqual({ admit: true, record: error });
    expect(await filter.evaluate(warn)).toEqual({ admit: true, record: warn });
  });

  it("uses a configured stage name", async () => {
    const named = new LevelFilter("FATAL", "fatal-only");
    const decision = await named.evaluate(makeRecord({ level: "ERROR" }));
    expect(decision).toMatchObject({ admit: false, stage: "fatal-only" });
  });
});

describe("ServiceFilter", () => {
  it("allow mode admits only listed services", async () => {
    const filter = new ServiceFilter("allow", ["checkout", "billing"]);

    expect((await filter.evaluate(makeRecord({ service: "billing" }))).admit).toBe(true);
    expect(await filter.evaluate(makeRecord({ service: "search" }))).toEqual({
      admit: false,
      reason: "service not allowed",
      stage: "service",
    });
  });

  it("deny mode rejects listed services", async () => {
    const filter = new ServiceFilter("deny", ["noisy-cron"]);

    expect(await filter.evaluate(makeRecord({ service: "noisy-cron" }))).toEqual({
      admit: false,
      reason: "service denied",
      stage: "service",
    });
    expect((await filter.evaluate(makeRecord({ service: "checkout" }))).admit).toBe(true);
  });
});

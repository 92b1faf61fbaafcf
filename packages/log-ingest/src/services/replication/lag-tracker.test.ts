import { describe, it, expect } from "vitest";

import { LagTracker } from "./lag-tracker.js";

describe("LagTracker", () => {
  it("summarizes samples per replica", () => {
    const tracker = new LagTracker();

    tracker.record("r1", 10);
    tracker.record("r1", 30);
    tracker.record("r1", 20);
    tracker.record("r2", 5);

    expect(tracker.get("r1")).toEqual({ lastMs: 20, avgMs: 20, maxMs: 30, samples: 3, failures: 0 });
    expect(tracker.get("r2")).toEqual({ lastMs: 5, avgMs: 5, maxMs: 5, samples: 1, failures: 0 });
  });

  it("counts failures without touching lag figures", () => {
    const tracker = new LagTracker();

    tracker.recordFailure("r1");
    tracker.recordFailure("r1");

    expect(tracker.get("r1")).toEqual({ lastMs: null, avgMs: null, maxMs: null, samples: 0, failures: 2 });
  });

  it("reports tracked replicas before their first sample", () => {
    const tracker = new LagTracker();
    tracker.track(["r1", "r2"]);

    expect(Object.keys(tracker.snapshot())).toEqual(["r1", "r2"]);
    expect(tracker.get("r3")).toBeNull();
  });
});

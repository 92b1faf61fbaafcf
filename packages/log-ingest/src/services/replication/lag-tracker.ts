import type { ReplicaLag } from "../../types.js";

interface LagWindow {
  lastMs: number | null;
  totalMs: number;
  maxMs: number | null;
  samples: number;
  failures: number;
}

/** Primary-commit to replica-ack lag, per replica. */
export class LagTracker {
  private readonly windows = new Map<string, LagWindow>();

  /** Register replicas up front so they are reported before their first write. */
  track(replicaIds: Iterable<string>): void {
    for (const id of replicaIds) this.window(id);
  }

  record(replicaId: string, lagMs: number): void {
    const window = this.window(replicaId);
    window.lastMs = lagMs;
    window.totalMs += lagMs;
    window.maxMs = window.maxMs === null ? lagMs : Math.max(window.maxMs, lagMs);
    window.samples += 1;
  }

  recordFailure(replicaId: string): void {
    this.window(replicaId).failures += 1;
  }

  get(replicaId: string): ReplicaLag | null {
    const window = this.windows.get(replicaId);
    return window ? summarize(window) : null;
  }

  snapshot(): Record<string, ReplicaLag> {
    const out: Record<string, ReplicaLag> = {};
    for (const [id, window] of this.windows) out[id] = summarize(window);
    return out;
  }

  private window(replicaId: string): LagWindow {
    let window = this.windows.get(replicaId);
    if (!window) {
      window = { lastMs: null, totalMs: 0, maxMs: null, samples: 0, failures: 0 };
      this.windows.set(replicaId, window);
    }
    return window;
  }
}

function summarize(window: LagWindow): ReplicaLag {
  return {
    lastMs: window.lastMs,
    avgMs: window.samples > 0 ? window.totalMs / window.samples : null,
    maxMs: window.maxMs,
    samples: window.samples,
    failures: window.failures,
  };
}

import { createLogger } from "@logfeed/shared/utils";

import type { StorageEngine } from "../types.js";

const logger = createLogger("retention-purger");

const DEFAULT_RETENTION_DAYS = 30;
const PURGE_INTERVAL_MS = 3_600_000;
const DAY_MS = 86_400_000;

export interface RetentionOptions {
  retentionDays?: number;
  intervalMs?: number;
  clock?: () => number;
}

/** Hourly deleteBefore() of everything older than the retention period. */
export class RetentionPurger {
  readonly retentionDays: number;
  private readonly intervalMs: number;
  private readonly clock: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly storage: Pick<StorageEngine, "deleteBefore">,
    options: RetentionOptions = {},
  ) {
    this.retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;
    this.intervalMs = options.intervalMs ?? PURGE_INTERVAL_MS;
    this.clock = options.clock ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.purge();
    }, this.intervalMs);
    logger.info({ retentionDays: this.retentionDays, intervalMs: this.intervalMs }, "Retention purge scheduled");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Run one purge now. Failures are logged and reported as zero. */
  async purge(): Promise<number> {
    const cutoff = this.clock() - this.retentionDays * DAY_MS;
    try {
      const purged = await this.storage.deleteBefore(cutoff);
      if (purged > 0) {
        logger.info({ retentionDays: this.retentionDays, purged }, "Auto-purge completed");
      }
      return purged;
    } catch (err) {
      logger.error({ err }, "Auto-purge failed");
      return 0;
    }
  }
}

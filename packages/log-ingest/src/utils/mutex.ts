/**
 * FIFO async mutex. Waiters are resumed in the order they called acquire().
 */
export class Mutex {
  private queue: (() => void)[] = [];
  private isLocked = false;

  acquire(): Promise<void> {
    return new Promise((resolve) => {
      const run = () => {
        this.isLocked = true;
        resolve();
      };

      if (!this.isLocked) {
        run();
      } else {
        this.queue.push(run);
      }
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.isLocked = false;
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get locked(): boolean {
    return this.isLocked;
  }
}

/** Timer-based sleep; used wherever a component yields to let a clock advance. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

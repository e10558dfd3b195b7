/**
 * Caps how many async tasks run at once; the rest wait in FIFO order.
 */
export class ConcurrencyLimiter {
  private running = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  get activeCount(): number {
    return this.running;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Wait for a slot and return its release function. Releasing twice is a no-op.
   */
  async acquire(): Promise<() => void> {
    if (this.running >= this.maxConcurrent) {
      // The releasing holder hands its slot over, so `running` is not bumped here
      await new Promise<void>((resolve) => this.queue.push(resolve));
    } else {
      this.running++;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.running--;
      }
    };
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  /**
   * Map every item through the task; results keep the input order.
   */
  map<T, R>(items: ReadonlyArray<T>, task: (item: T, index: number) => Promise<R>): Promise<R[]> {
    return Promise.all(items.map((item, index) => this.run(() => task(item, index))));
  }
}

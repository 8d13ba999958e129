/**
 * Serializes calls and keeps a minimum gap between the start of one call
 * and the start of the next.
 */
export class RateLimiter {
  private tail: Promise<void> = Promise.resolve();
  private lastStart = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = () => Date.now()
  ) {}

  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const wait = this.lastStart + this.minIntervalMs - this.now();
      if (wait > 0) {
        await new Promise<void>((resolve) => setTimeout(resolve, wait));
      }
      this.lastStart = this.now();
      return task();
    });

    // A failed task must not stall the queue
    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }
}

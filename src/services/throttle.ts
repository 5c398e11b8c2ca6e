export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => {
  setTimeout(resolve, ms);
});

/**
 * Spaces out calls so that consecutive starts are at least `minIntervalMs`
 * apart. Callers queue behind one another in arrival order.
 */
export class RequestThrottle {
  private lastStart = Number.NEGATIVE_INFINITY;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly deps: { now?: () => number; sleep?: Sleep } = {}
  ) {}

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  async wait(): Promise<void> {
    const turn = this.queue.then(async () => {
      const elapsed = this.now() - this.lastStart;
      if (elapsed < this.minIntervalMs) {
        await (this.deps.sleep ?? sleep)(this.minIntervalMs - elapsed);
      }
      this.lastStart = this.now();
    });
    this.queue = turn;
    return turn;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.wait();
    return task();
  }
}

/**
 * Counting semaphore used to cap simultaneous upload streams across accounts.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  get inUse(): number {
    return this.permits - this.available;
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // the permit passes straight to the next waiter
      next();
    } else {
      this.available++;
    }
  }
}

/**
 * Groups items into lanes by key and drains up to `maxLanes` lanes at once.
 * Items inside a lane run strictly one after another in input order; lanes
 * start in the order their first item appears. The first rejection stops new
 * items from being picked up and is rethrown once in-flight work settles.
 */
export async function runLanes<T, K>(
  items: readonly T[],
  keyOf: (item: T) => K,
  maxLanes: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  const lanes = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const lane = lanes.get(key);
    if (lane) lane.push(item);
    else lanes.set(key, [item]);
  }

  const queue = [...lanes.values()];
  let next = 0;
  const state: { failure?: { error: unknown } } = {};

  const drain = async () => {
    while (!state.failure && next < queue.length) {
      const lane = queue[next++];
      for (const item of lane) {
        if (state.failure) return;
        try {
          await worker(item);
        } catch (error) {
          state.failure ??= { error };
          return;
        }
      }
    }
  };

  const runners = Math.max(1, Math.min(maxLanes, queue.length));
  await Promise.all(Array.from({ length: runners }, drain));

  if (state.failure) throw state.failure.error;
}

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Run at most `concurrency` tasks at once; queued tasks start in submission order
 */
export function pLimit(concurrency: number): Limiter {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new TypeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const waiting: Array<() => void> = [];
  let running = 0;

  // A finishing task hands its slot straight to the next waiter
  const release = () => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      running--;
    }
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (running >= concurrency) {
      await new Promise<void>(resolve => {
        waiting.push(() => resolve());
      });
    } else {
      running++;
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const run = pLimit(limit);
  return Promise.all(items.map(item => run(() => fn(item))));
}

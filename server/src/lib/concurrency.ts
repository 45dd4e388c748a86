/** A finished task hands its slot straight to the next waiter, so `active` never exceeds `limit`. */
export function createConcurrencyLimiter(limit: number) {
  let active = 0;
  const queue: Array<() => void> = [];

  const release = () => {
    const next = queue.shift();
    if (next) next();
    else active -= 1;
  };

  return async function runLimited<T>(task: () => Promise<T>): Promise<T> {
    if (active >= limit) {
      await new Promise<void>((resolve) => queue.push(resolve));
    } else {
      active += 1;
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight. Results are
 * written by index, so the output order matches the input order regardless of
 * completion order. Rejections propagate after every task has settled.
 */
export async function mapInOrder<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const runLimited = createConcurrencyLimiter(Math.max(1, limit));
  const settled = await Promise.allSettled(
    items.map((item, index) => runLimited(() => fn(item, index))),
  );

  const results: R[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') throw outcome.reason;
    results.push(outcome.value);
  }
  return results;
}

/**
 * Number of workers for a pool: at least one, at most one per item.
 * A limit that is not a number gets a single worker.
 */
function poolSize(limit: number, itemCount: number): number {
  const requested = Number.isNaN(limit) ? 1 : Math.floor(limit);
  return Math.min(Math.max(requested, 1), itemCount);
}

/**
 * Run a handler over items with at most `limit` calls in flight.
 * Handlers should catch their own per-item errors; a rejection fails the pool.
 */
export async function runWithConcurrencyLimit<T>(
  items: readonly T[],
  limit: number,
  handler: (item: T, index: number) => Promise<void>
): Promise<void> {
  // Workers pull from one shared iterator, so each item is handled once
  const queue = items.entries();
  const drain = async (): Promise<void> => {
    for (const [index, item] of queue) {
      await handler(item, index);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < poolSize(limit, items.length); i++) {
    workers.push(drain());
  }
  await Promise.all(workers);
}

/**
 * Map items to results on a bounded pool, preserving input order.
 */
export async function mapWithConcurrencyLimit<T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  await runWithConcurrencyLimit(items, limit, async (item, index) => {
    results[index] = await mapper(item, index);
  });
  return results;
}

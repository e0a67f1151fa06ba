// Bounded-concurrency map that resolves results in input order.

/**
 * Run `task` over every item with at most `concurrency` tasks in flight.
 * Results are returned in input order regardless of completion order.
 * The first rejection rejects the whole call; tasks already started still run
 * to completion but no new ones are picked up.
 */
export async function mapOrdered<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await task(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

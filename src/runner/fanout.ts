/**
 * Bounded fan-out / fan-in over independent items.
 *
 * Results land in a pre-sized array at the item's index, so output order
 * always matches input order regardless of completion order.  The promise
 * settles only after every started task has settled.  A task that rejects
 * stops further items from starting, and the first error is rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const failures: unknown[] = [];

  async function worker(): Promise<void> {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => worker());
  await Promise.all(workers);
  if (failures.length > 0) throw failures[0];
  return results;
}

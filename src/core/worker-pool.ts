/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Results keep input order. The first rejection is rethrown once the
 * in-flight calls have settled; items not yet started are not run.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const width = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;
  const failures: unknown[] = [];

  async function lane(): Promise<void> {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (err) {
        failures.push(err);
      }
    }
  }

  await Promise.all(Array.from({ length: width }, () => lane()));
  if (failures.length > 0) throw failures[0];
  return results;
}

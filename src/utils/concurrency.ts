/**
 * Bounded-concurrency mapping
 */

/**
 * Map `items` through `fn` with at most `limit` calls in flight
 *
 * Results keep input order. Workers stop picking up new items once
 * `signal` aborts; items never started resolve to `undefined` in the
 * result and are not passed to `fn`.
 *
 * A rejection from `fn` rejects the whole call after in-flight work settles.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const workerCount = Math.max(1, Math.min(limit, items.length));
  let next = 0;
  const errors: unknown[] = [];

  const worker = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted && errors.length === 0) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        errors.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (errors.length > 0) {
    throw errors[0];
  }
  return results;
}

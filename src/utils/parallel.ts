/**
 * Bounded-concurrency map
 *
 * Results keep input order. Each item settles on its own: one rejection
 * does not abort the others.
 */

export type Settled<R> =
  | { ok: true; value: R }
  | { ok: false; error: unknown };

export async function parallelMapSettled<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<Settled<R>[]> {
  if (items.length === 0) return [];

  const results: Settled<R>[] = new Array(items.length);
  let nextIndex = 0;
  const actualConcurrency = Math.max(1, Math.floor(concurrency));

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const currentIndex = nextIndex++;
      try {
        const value = await fn(items[currentIndex], currentIndex);
        results[currentIndex] = { ok: true, value };
      } catch (error) {
        results[currentIndex] = { ok: false, error };
      }
    }
  }

  const workers = Array.from(
    { length: Math.min(actualConcurrency, items.length) },
    worker
  );
  await Promise.all(workers);
  return results;
}

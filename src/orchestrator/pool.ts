/**
 * Run fn over items with at most `concurrency` calls in flight. Results keep
 * the input order. A worker picks the next item only after its previous call
 * settles, so item N+1 never starts before one of the first N finishes.
 *
 * fn is expected to handle its own failures; a rejection aborts the pool.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const workerCount = Math.min(Math.max(1, Math.floor(concurrency)), items.length);
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    for (;;) {
      const index = nextIndex;
      nextIndex += 1;
      if (index >= items.length) return;
      results[index] = await fn(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

/**
 * Bounded worker pool.
 *
 * Up to `concurrency` workers pull items off a shared index until the list
 * is exhausted. The processor owns its own error handling: a rejection from
 * it rejects the whole pool.
 */

export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<void>,
): Promise<void> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      await processor(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
  await Promise.all(workers);
}

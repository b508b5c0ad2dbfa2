import os from "node:os";

export type PoolOptions = {
  concurrency: number;
};

/**
 * Runs `worker` over every item with at most `concurrency` calls in flight.
 * Results keep the input order. The first rejection rejects the pool, so
 * workers that must not abort the run return their failures as values.
 */
export async function runPool<T, R>(
  items: readonly T[],
  options: PoolOptions,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const concurrency = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  let next = 0;

  const runWorker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => runWorker()));
  return results;
}

export function resolveConcurrency(options: { multiprocessing: boolean; jobs?: number }): number {
  if (!options.multiprocessing) return 1;
  return options.jobs ?? os.availableParallelism();
}

/**
 * Run async work items with a fixed concurrency limit.
 *
 * Results land in the slot of their input index, so the returned array is in
 * input order no matter which item finishes first. Once the signal aborts no
 * new item is started; unstarted items are filled by `onCancelled`.
 */
export async function runWithConcurrency<TItem, TResult>(options: {
  items: readonly TItem[];
  concurrency: number;
  worker: (item: TItem, index: number) => Promise<TResult>;
  onCancelled: (item: TItem, index: number) => TResult;
  signal?: AbortSignal;
  onProgress?: (info: { completed: number; total: number; index: number; result: TResult }) => void;
}): Promise<TResult[]> {
  const total = options.items.length;
  const concurrency = Math.max(1, Math.floor(options.concurrency || 1));

  const results: TResult[] = new Array(total);
  let nextIndex = 0;
  let completed = 0;

  const runOne = async (): Promise<void> => {
    while (true) {
      if (options.signal?.aborted) return;

      const current = nextIndex;
      nextIndex += 1;
      if (current >= total) return;

      const result = await options.worker(options.items[current], current);
      results[current] = result;

      completed += 1;
      options.onProgress?.({ completed, total, index: current, result });
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, total) }, () => runOne());
  await Promise.all(workers);

  for (let i = nextIndex; i < total; i++) {
    results[i] = options.onCancelled(options.items[i], i);
  }
  return results;
}

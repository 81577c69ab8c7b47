export type PoolWorker<TItem, TResult> = (item: TItem, index: number) => Promise<TResult>;

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results land in the slot of their input index, so the returned array is in
 * input order whatever the completion order was. The first worker rejection
 * stops further items from starting and rejects the pool.
 */
export async function runPool<TItem, TResult>(
  items: readonly TItem[],
  concurrency: number,
  worker: PoolWorker<TItem, TResult>,
  onSettled?: (index: number, result: TResult) => void
): Promise<TResult[]> {
  const results = new Array<TResult>(items.length);
  let cursor = 0;
  let stopped = false;

  async function drain(): Promise<void> {
    while (!stopped && cursor < items.length) {
      const index = cursor++;
      try {
        const result = await worker(items[index], index);
        results[index] = result;
        onSettled?.(index, result);
      } catch (error) {
        stopped = true;
        throw error;
      }
    }
  }

  const size = Math.min(Math.max(1, Math.floor(concurrency)), items.length);
  const workers = Array.from({ length: size }, () => drain());
  await Promise.all(workers);
  return results;
}

/**
 * Release Radar: Bounded Concurrency
 */

export interface PoolResult<R> {
  results: R[];
  /** True when the signal aborted before every item was started */
  interrupted: boolean;
}

/**
 * Run `worker` over `items` with at most `limit` in flight.
 * Once `signal` aborts no new item is started; in-flight items finish.
 * Results keep the order of completion.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
  signal?: AbortSignal
): Promise<PoolResult<R>> {
  const results: R[] = [];
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const item = items[next++];
      results.push(await worker(item));
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));

  return { results, interrupted: next < items.length };
}

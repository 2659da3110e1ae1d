export type Settled<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown };

export interface ConcurrencyOptions {
  // Pause after each completed item
  delayMs?: number;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results line up with `items`; a failing item is reported, not thrown.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {},
): Promise<Settled<R>[]> => {
  const results: Settled<R>[] = new Array(items.length);
  const delayMs = options.delayMs ?? 0;
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
      if (delayMs > 0) await sleep(delayMs);
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, runLane));
  return results;
};

export type SettledResult<R> = R | { error: unknown };

export interface MapWithConcurrencyOptions<T, R> {
  onSettled?: (result: SettledResult<R>, index: number, item: T) => void;
  /** Checked before each item is picked up; returning true drains the pool. */
  shouldStop?: () => boolean;
  /** Awaited before each item is picked up, e.g. to honour a shared pause. */
  beforeEach?: () => Promise<void>;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Results keep
 * input order; a throwing worker yields `{ error }` in its slot instead of
 * rejecting the whole batch. Items not started because of `shouldStop` stay
 * `undefined`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  options: MapWithConcurrencyOptions<T, R> = {},
): Promise<Array<SettledResult<R> | undefined>> {
  const list = Array.isArray(items) ? items : [];
  if (list.length === 0) return [];
  const { onSettled, shouldStop, beforeEach } = options;
  const maxConcurrency = Math.max(1, Math.min(list.length, Math.floor(Number(concurrency)) || 1));
  const results = new Array<SettledResult<R> | undefined>(list.length).fill(undefined);
  let cursor = 0;

  const stopRequested = (): boolean => {
    if (typeof shouldStop !== 'function') return false;
    try {
      return shouldStop();
    } catch (err: unknown) {
      console.warn(`[pool] stop check failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  };

  async function runOneWorker(): Promise<void> {
    while (cursor < list.length) {
      if (stopRequested()) {
        cursor = list.length;
        break;
      }
      if (beforeEach) {
        await beforeEach();
        if (stopRequested()) {
          cursor = list.length;
          break;
        }
      }
      if (cursor >= list.length) break;
      const currentIndex = cursor;
      cursor += 1;
      let settled: SettledResult<R>;
      try {
        settled = await worker(list[currentIndex], currentIndex);
      } catch (err: unknown) {
        settled = { error: err };
      }
      results[currentIndex] = settled;
      if (typeof onSettled === 'function') {
        try {
          onSettled(settled, currentIndex, list[currentIndex]);
        } catch (err: unknown) {
          console.warn(`[pool] onSettled callback failed: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    }
  }

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  await Promise.all(workers);
  return results;
}

/**
 * Pick a pool size that keeps the broker's per-second budget busy without
 * queueing far more requests than the token bucket can release.
 */
export function resolveFetchConcurrency(configured: number, maxRequestsPerSecond: number): number {
  const cap = Math.max(1, Math.floor(Number(configured) || 1));
  const rps = Math.max(1, Math.floor(Number(maxRequestsPerSecond) || 1));
  return Math.max(1, Math.min(cap, rps * 2));
}

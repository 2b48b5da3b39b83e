import { isAbortError } from './errors.js';

export type Settled<R> = R | { error: unknown };

/**
 * Bounded worker pool. Runs `worker` over `items` with at most `concurrency`
 * calls in flight and returns results in input order. A worker that throws
 * yields `{ error }` in its slot instead of rejecting the whole batch.
 *
 * `shouldStop` is polled before each item; once it returns true no new items
 * are started, and the call resolves after in-flight items settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (result: Settled<R>, index: number, item: T) => void,
  shouldStop?: () => boolean,
): Promise<Array<Settled<R>>> {
  const list = Array.isArray(items) ? items : [];
  if (list.length === 0) return [];
  const maxConcurrency = Math.max(1, Math.min(list.length, Math.floor(Number(concurrency)) || 1));
  const results = new Array<Settled<R>>(list.length);
  let cursor = 0;
  let cancelled = false;

  const checkStop = (): boolean => {
    if (cancelled) return true;
    if (typeof shouldStop !== 'function') return false;
    try {
      if (shouldStop()) {
        cancelled = true;
        cursor = list.length;
      }
    } catch (err: unknown) {
      console.warn(`[pool] stop check failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    return cancelled;
  };

  async function runOneWorker(): Promise<void> {
    while (cursor < list.length) {
      if (checkStop()) break;
      const currentIndex = cursor;
      cursor += 1;
      try {
        results[currentIndex] = await worker(list[currentIndex], currentIndex);
      } catch (err: unknown) {
        results[currentIndex] = { error: err };
        if (isAbortError(err) && checkStop()) {
          notify(currentIndex);
          break;
        }
      }
      notify(currentIndex);
    }
  }

  function notify(index: number): void {
    if (typeof onSettled !== 'function') return;
    try {
      onSettled(results[index], index, list[index]);
    } catch (err: unknown) {
      console.warn(`[pool] onSettled callback failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  // Every worker finishes its current item before returning, so callers can
  // read shared counters without racing in-flight work.
  await Promise.all(workers);
  return results;
}

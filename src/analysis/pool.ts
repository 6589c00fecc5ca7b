/**
 * Bounded worker pool over an indexed work list.
 */

export interface PoolResult {
  /** True when the signal stopped dispatch before every item was handed out. */
  cancelled: boolean;
}

/**
 * Run `task` for indexes 0..count-1 with at most `concurrency` tasks in flight.
 *
 * Workers pull the next index from a shared cursor. Once `signal` is aborted
 * no new index is dispatched; tasks already running are awaited.
 */
export async function runPool(
  count: number,
  concurrency: number,
  task: (index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<PoolResult> {
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < count && !signal?.aborted) {
      const index = cursor++;
      await task(index);
    }
  };

  const size = Math.max(1, Math.min(concurrency, count));
  await Promise.all(Array.from({ length: size }, () => worker()));

  return { cancelled: cursor < count && signal?.aborted === true };
}

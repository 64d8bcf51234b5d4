export type PoolSettlement<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: unknown };

export interface PoolOptions<T, R> {
  concurrency: number;
  signal?: AbortSignal | undefined;
  onSettled?: ((settlement: PoolSettlement<T, R>, completed: number, total: number) => void) | undefined;
}

export interface PoolOutcome<T, R> {
  settlements: PoolSettlement<T, R>[];
  interrupted: boolean;
}

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 *
 * Workers pull the next index from a shared cursor, so every item is started
 * at most once. A rejected task is recorded as a failed settlement and never
 * stops its siblings. Once `signal` aborts no further item is started;
 * tasks already running are awaited and their settlements kept.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T) => Promise<R>,
  options: PoolOptions<T, R>
): Promise<PoolOutcome<T, R>> {
  const { signal, onSettled } = options;
  const width = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  let cursor = 0;
  let completed = 0;

  const worker = async (): Promise<PoolSettlement<T, R>[]> => {
    const settled: PoolSettlement<T, R>[] = [];

    while (cursor < items.length && !signal?.aborted) {
      const item = items[cursor++]!;
      let settlement: PoolSettlement<T, R>;
      try {
        settlement = { item, ok: true, value: await task(item) };
      } catch (error) {
        settlement = { item, ok: false, error };
      }
      settled.push(settlement);
      completed++;
      onSettled?.(settlement, completed, items.length);
    }

    return settled;
  };

  const perWorker = items.length === 0
    ? []
    : await Promise.all(Array.from({ length: width }, () => worker()));

  const settlements = perWorker.flat();

  return {
    settlements,
    interrupted: settlements.length < items.length,
  };
}

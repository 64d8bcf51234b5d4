import { describe, expect, it } from 'vitest';
import { runPool } from '../../src/utils/worker-pool.js';

const items = Array.from({ length: 12 }, (_, i) => i + 1);

describe('runPool', () => {
  it('settles every item exactly once for any width', async () => {
    for (let width = 1; width <= items.length + 2; width++) {
      const outcome = await runPool(items, async (n) => n * 2, { concurrency: width });
      const seen = outcome.settlements.map((s) => s.item).sort((a, b) => a - b);

      expect(seen).toEqual(items);
      expect(outcome.interrupted).toBe(false);
    }
  });

  it('never runs more tasks than the width at once', async () => {
    let active = 0;
    let peak = 0;

    await runPool(
      items,
      async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 2));
        active--;
      },
      { concurrency: 3 }
    );

    expect(peak).toBe(3);
  });

  it('records a failing task without stopping the others', async () => {
    const outcome = await runPool(
      [1, 2, 3],
      async (n) => {
        if (n === 2) throw new Error('boom');
        return n;
      },
      { concurrency: 2 }
    );

    const failed = outcome.settlements.filter((s) => !s.ok).map((s) => s.item);
    const succeeded = outcome.settlements.filter((s) => s.ok).map((s) => s.item).sort();

    expect(failed).toEqual([2]);
    expect(succeeded).toEqual([1, 3]);
  });

  it('starts nothing new once the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];

    const outcome = await runPool(
      items,
      async (n) => {
        started.push(n);
        if (n === 3) controller.abort();
        return n;
      },
      { concurrency: 1, signal: controller.signal }
    );

    expect(started).toEqual([1, 2, 3]);
    expect(outcome.settlements).toHaveLength(3);
    expect(outcome.interrupted).toBe(true);
  });

  it('reports progress for each settlement', async () => {
    const progress: Array<[number, number]> = [];

    await runPool([5, 6], async (n) => n, {
      concurrency: 1,
      onSettled: (_settlement, completed, total) => progress.push([completed, total]),
    });

    expect(progress).toEqual([[1, 2], [2, 2]]);
  });

  it('returns an empty outcome for no items', async () => {
    const outcome = await runPool([], async () => 1, { concurrency: 4 });
    expect(outcome).toEqual({ settlements: [], interrupted: false });
  });
});

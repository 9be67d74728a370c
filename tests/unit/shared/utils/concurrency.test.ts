import { describe, it, expect } from 'vitest';
import { runInBatches } from '@shared/utils/concurrency';

describe('runInBatches', () => {
  it('should return results in input order', async () => {
    const delays = [30, 0, 10, 5, 20];

    const outcome = await runInBatches(delays, 3, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return `item-${index}`;
    });

    expect(outcome).toEqual({
      results: ['item-0', 'item-1', 'item-2', 'item-3', 'item-4'],
      skipped: [],
    });
  });

  it('should never run more than the limit at once', async () => {
    let running = 0;
    let peak = 0;

    await runInBatches([1, 2, 3, 4, 5, 6, 7], 2, async () => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 1));
      running -= 1;
    });

    expect(peak).toBe(2);
  });

  it('should run sequentially with a limit below one', async () => {
    const order: string[] = [];

    await runInBatches(['a', 'b'], 0, async (item) => {
      order.push(`start-${item}`);
      await Promise.resolve();
      order.push(`end-${item}`);
    });

    expect(order).toEqual(['start-a', 'end-a', 'start-b', 'end-b']);
  });

  it('should skip every item when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    const outcome = await runInBatches(
      ['a', 'b', 'c'],
      2,
      async () => {
        calls += 1;
      },
      controller.signal
    );

    expect(calls).toBe(0);
    expect(outcome.skipped).toEqual(['a', 'b', 'c']);
  });

  it('should finish the running batch and skip the rest after abort', async () => {
    const controller = new AbortController();

    const outcome = await runInBatches(
      ['a', 'b', 'c', 'd', 'e'],
      2,
      async (item) => {
        if (item === 'a') {
          controller.abort();
        }
        return item.toUpperCase();
      },
      controller.signal
    );

    expect(outcome).toEqual({ results: ['A', 'B'], skipped: ['c', 'd', 'e'] });
  });
});

import { describe, expect, it } from 'vitest';
import { mapWithConcurrency } from './concurrency.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('keeps input order whatever the completion order', async () => {
    const results = await mapWithConcurrency([30, 5, 15, 0], 2, async (ms, idx) => {
      await delay(ms);
      return `${idx}:${ms}`;
    });
    expect(results).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(5);
      active -= 1;
    });
    expect(peak).toBe(3);
  });

  it('waits for running calls and stops starting new ones after a failure', async () => {
    const started: number[] = [];
    const finished: number[] = [];
    const run = mapWithConcurrency([0, 1, 2, 3], 2, async (item) => {
      started.push(item);
      if (item === 0) throw new Error('boom');
      await delay(10);
      finished.push(item);
      return item;
    });
    await expect(run).rejects.toThrow('boom');
    expect(started).toEqual([0, 1]);
    expect(finished).toEqual([1]);
  });

  it('returns an empty list for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});

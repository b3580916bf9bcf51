import { describe, it, expect } from 'vitest';
import { processInBatches } from '@/utils/batch-processor';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('processInBatches', () => {
  it('should process all items', async () => {
    const results = await processInBatches([1, 2, 3, 4, 5], 2, async (item) => item * 2);

    expect(results).toEqual([2, 4, 6, 8, 10]);
  });

  it('should keep input order whatever order the work finishes in', async () => {
    const results = await processInBatches([30, 5, 15, 0], 4, async (ms, index) => {
      await sleep(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('should never run more than the given number of operations at once', async () => {
    let running = 0;
    let peak = 0;

    await processInBatches(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(2);
      running--;
    });

    expect(peak).toBe(3);
  });

  it('should run sequentially with a concurrency of one or less', async () => {
    const order: string[] = [];

    await processInBatches(['a', 'b', 'c'], 0, async (item) => {
      order.push(`start ${item}`);
      await sleep(1);
      order.push(`end ${item}`);
    });

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('should handle an empty list', async () => {
    await expect(processInBatches([], 5, async (item: number) => item)).resolves.toEqual([]);
  });

  it('should reject with the first error and stop taking new items', async () => {
    const started: number[] = [];

    await expect(
      processInBatches([1, 2, 3, 4], 1, async (item) => {
        started.push(item);
        if (item === 2) {
          throw new Error('item 2 failed');
        }
        return item;
      })
    ).rejects.toThrow('item 2 failed');
    expect(started).toEqual([1, 2]);
  });
});

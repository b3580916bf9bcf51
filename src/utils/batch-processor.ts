/**
 * Batch Processing Utilities
 * Bounded-concurrency processing that keeps results in input order
 */

import { ValidationError } from '@/errors/sitemap-errors';

/** @throws ValidationError unless `concurrency` is a whole number of at least 1 */
export function assertConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError(String(concurrency), `Concurrency must be a whole number of at least 1, got ${concurrency}.`);
  }
}

/**
 * Process items with at most `concurrency` operations in flight.
 * Uses a worker pool that picks up the next item as soon as one completes;
 * `results[i]` always belongs to `items[i]`, whatever order the work finishes in.
 * @param items - Items to process
 * @param concurrency - Maximum number of concurrent operations (at least 1)
 * @param processor - Async function to process each item
 * @returns Results in input order
 * @throws The first error raised by `processor`, once every worker has stopped
 */
export async function processInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const errors: unknown[] = [];
  let currentIndex = 0;

  const bound = Number.isNaN(concurrency) ? 1 : Math.max(1, Math.floor(concurrency));
  const workerCount = Math.min(bound, items.length);

  const workers = Array.from({ length: workerCount }, async () => {
    while (currentIndex < items.length && errors.length === 0) {
      const index = currentIndex++;
      try {
        results[index] = await processor(items[index], index);
      } catch (error) {
        errors.push(error);
      }
    }
  });

  await Promise.all(workers);

  if (errors.length > 0) {
    throw errors[0];
  }

  return results;
}

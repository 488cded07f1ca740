/**
 * Parallel Processing
 *
 * Bounded fan-out over a list of async jobs with fan-in in input order.
 */

import * as os from "os";

export type Settled<R> =
  | { success: true; value: R }
  | { success: false; error: unknown };

/**
 * Process items in parallel with controlled concurrency.
 * Returns results in the same order as input items; a rejected item is
 * recorded, never rethrown, so one failure does not stop its siblings.
 *
 * @param items - Items to process
 * @param processor - Async function to process each item
 * @param concurrency - Maximum number of concurrent operations
 * @returns Array of results (or errors) in input order
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<Array<Settled<R>>> {
  const results: Array<Settled<R>> = new Array(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      const item = items[index];
      try {
        const value = await processor(item, index);
        results[index] = { success: true, value };
      } catch (error) {
        results[index] = { success: false, error };
      }
    }
  }

  // Start workers up to concurrency limit
  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => worker()
  );

  await Promise.all(workers);
  return results;
}

/**
 * Concurrency for I/O-bound work (file reads, sniffing).
 * Reads mostly wait on the disk, so this runs well past the core count.
 */
export function getIoConcurrency(): number {
  const cpuCount = os.cpus().length;
  return Math.max(32, Math.min(16, Math.floor(cpuCount * 0.75)) * 4);
}

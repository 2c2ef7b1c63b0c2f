/**
 * Options for {@link ConcurrentPool.run}
 */
export interface ConcurrentPoolOptions<T, R> {
  /**
   * Fired after each item completes, in completion order
   */
  onItemComplete?: (result: R, index: number) => void;

  /**
   * Once the signal is aborted no new item is started; every item not yet
   * started gets the result of `skip` instead.
   */
  cancellation?: {
    signal: AbortSignal;
    skip: (item: T, index: number) => R;
  };
}

/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Keeps up to N workers busy; when a worker finishes it immediately picks up
 * the next available item. Used to refine several transcript files at once
 * while each file's own chunks stay sequential.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * @param concurrency - Maximum number of concurrent workers, at least 1
   * @returns Results in the same order as the input items
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    options: ConcurrentPoolOptions<T, R> = {},
  ): Promise<R[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `Concurrency must be a positive integer, got ${concurrency}`,
      );
    }

    const results: R[] = new Array(items.length);
    const { onItemComplete, cancellation } = options;
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        const item = items[index];

        if (cancellation?.signal.aborted) {
          results[index] = cancellation.skip(item, index);
          continue;
        }

        results[index] = await processFn(item, index);
        onItemComplete?.(results[index], index);
      }
    }

    const workers = Array.from(
      { length: Math.min(concurrency, items.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return results;
  }
}

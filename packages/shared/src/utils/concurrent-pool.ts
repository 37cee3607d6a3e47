/**
 * Outcome of one item processed by {@link ConcurrentPool.runSettled}
 */
export type PoolOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Keeps up to N workers pulling from a shared queue; when a worker finishes
 * an item it immediately takes the next one. Results always come back in
 * input order, whatever order the items finish in.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently. The first rejection rejects the whole run
   * and no further items are started.
   *
   * @param items - Array of items to process
   * @param concurrency - Maximum number of concurrent workers
   * @param processFn - Async function to process each item
   * @param onItemComplete - Optional callback fired after each item completes
   * @returns Array of results in the same order as the input items
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
  ): Promise<R[]> {
    const outcomes = await ConcurrentPool.drain(
      items,
      concurrency,
      async (item, index) => {
        const result = await processFn(item, index);
        onItemComplete?.(result, index);
        return result;
      },
      true,
    );

    const results: R[] = [];
    for (const outcome of outcomes) {
      if (outcome?.status === 'rejected') {
        throw outcome.reason;
      }
      if (outcome) {
        results.push(outcome.value);
      }
    }
    return results;
  }

  /**
   * Process items concurrently, capturing each item's failure instead of
   * aborting the remaining items.
   *
   * @returns One outcome per item, in input order
   */
  static async runSettled<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
  ): Promise<PoolOutcome<R>[]> {
    const outcomes = await ConcurrentPool.drain(
      items,
      concurrency,
      processFn,
      false,
    );
    return outcomes.filter(
      (outcome): outcome is PoolOutcome<R> => outcome !== undefined,
    );
  }

  private static async drain<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    stopOnFailure: boolean,
  ): Promise<Array<PoolOutcome<R> | undefined>> {
    const outcomes: Array<PoolOutcome<R> | undefined> = Array.from(
      { length: items.length },
      () => undefined,
    );
    let nextIndex = 0;
    let failed = false;

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !(stopOnFailure && failed)) {
        const index = nextIndex++;
        try {
          const value = await processFn(items[index], index);
          outcomes[index] = { status: 'fulfilled', value };
        } catch (reason) {
          failed = true;
          outcomes[index] = { status: 'rejected', reason };
        }
      }
    }

    const workers = Array.from(
      { length: Math.min(Math.max(1, concurrency), items.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return outcomes;
  }
}

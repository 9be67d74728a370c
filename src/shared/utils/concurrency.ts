/**
 * Bounded batch execution for independent remote calls.
 */

export interface BatchOutcome<T, R> {
  /** Results of dispatched items, in input order. */
  results: R[];
  /** Items never dispatched because the signal was aborted. */
  skipped: T[];
}

/**
 * Run a worker over items, at most `limit` at a time.
 *
 * Items are processed in consecutive batches of `limit`; a batch runs in
 * parallel and the next one starts once it has settled. The signal is checked
 * before each batch: after abort, in-flight workers finish but nothing new is
 * dispatched. A limit of 1 is plain sequential execution.
 *
 * Workers are expected to report failures in their result rather than reject.
 */
export async function runInBatches<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<BatchOutcome<T, R>> {
  const batchSize = Math.max(1, Math.floor(limit));
  const results: R[] = [];

  for (let start = 0; start < items.length; start += batchSize) {
    if (signal?.aborted) {
      return { results, skipped: items.slice(start) };
    }

    const batch = items.slice(start, start + batchSize);
    const batchResults = await Promise.all(
      batch.map((item, offset) => worker(item, start + offset))
    );
    results.push(...batchResults);
  }

  return { results, skipped: [] };
}

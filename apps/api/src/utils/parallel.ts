/**
 * Parallel Processing Utilities
 *
 * Bounded fan-out for outbound broadcasts: every item gets its own settled
 * result, so one slow or failing item never blocks or discards the others.
 */

export type Settled<R> =
  | { ok: true; value: R }
  | { ok: false; error: unknown };

/**
 * Process items with controlled concurrency
 *
 * Results come back in input order regardless of completion order.
 *
 * @param items - Array of items to process
 * @param concurrency - Maximum concurrent operations
 * @param processor - Async function to process each item
 */
export async function processWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>,
  options: {
    onProgress?: (completed: number, total: number) => void;
  } = {}
): Promise<Settled<R>[]> {
  const { onProgress } = options;
  const results: Settled<R>[] = new Array(items.length);
  let completed = 0;
  let currentIndex = 0;

  const workerCount = Math.max(1, Math.min(concurrency, items.length));

  const workers = Array.from({ length: workerCount }, async () => {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];

      try {
        results[index] = { ok: true, value: await processor(item, index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }

      completed++;
      onProgress?.(completed, items.length);
    }
  });

  await Promise.all(workers);
  return results;
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run an abortable operation with a deadline. The signal handed to `fn` is
 * aborted when the deadline passes, and the returned promise rejects with
 * TimeoutError even if `fn` ignores the signal.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race reports the timeout, not the abort
      reject(new TimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Bounded task pool with a join barrier, plus a per-task time budget
 */

/**
 * Run `task` over every item with at most `concurrency` in flight.
 * Results keep item order regardless of completion order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const limit = Math.max(1, Math.min(concurrency, items.length));
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: limit }, () => drain()));
  return results;
}

export type BudgetedResult<T> =
  | { timedOut: false; value: T }
  | { timedOut: true };

/**
 * Race `work` against a timer. On expiry the signal handed to `work` aborts
 * and the result reports a timeout; a late rejection from `work` is ignored.
 */
export async function runWithBudget<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<BudgetedResult<T>> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<BudgetedResult<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ timedOut: true });
    }, timeoutMs);
  });

  const completed = Promise.resolve()
    .then(() => work(controller.signal))
    .then((value): BudgetedResult<T> => ({ timedOut: false, value }));

  try {
    return await Promise.race([completed, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Bounded pool of async workers over a shared queue
 */

export interface WorkerPoolOptions {
  /** Upper bound on concurrent workers */
  concurrency: number;
  /** Checked before each dequeue; dispatch stops once it returns false */
  shouldContinue?: () => boolean;
}

export interface WorkerPoolStats {
  /** Workers started: min(concurrency, items) */
  workers: number;
  /** Items handed to a worker */
  dispatched: number;
}

/**
 * Runs `work` over `items` with at most `concurrency` loops pulling from a
 * shared cursor. Resolves once every loop has settled.
 *
 * A throwing `work` stops further dispatch; items already running finish
 * and the first error is rethrown.
 *
 * @example
 * ```typescript
 * await runWorkerPool([0, 1, 2, 3], async (index) => {
 *   await transferChunk(index);
 * }, { concurrency: 2 });
 * ```
 */
export async function runWorkerPool<T>(
  items: readonly T[],
  work: (item: T, workerId: number) => Promise<void>,
  options: WorkerPoolOptions
): Promise<WorkerPoolStats> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const shouldContinue = options.shouldContinue ?? ((): boolean => true);
  const workerCount = Math.min(concurrency, items.length);

  let cursor = 0;
  let failed = false;
  let firstError: unknown;

  const loop = async (workerId: number): Promise<void> => {
    while (!failed && cursor < items.length && shouldContinue()) {
      const item = items[cursor++];
      try {
        await work(item, workerId);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
    }
  };

  const loops: Promise<void>[] = [];
  for (let id = 0; id < workerCount; id++) {
    loops.push(loop(id));
  }
  await Promise.all(loops);

  if (failed) {
    throw firstError;
  }

  return { workers: workerCount, dispatched: cursor };
}

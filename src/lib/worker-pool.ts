/**
 * Bounded worker pool
 *
 * N workers pull task indices from a shared cursor until the queue is empty.
 * Results come back in original task order regardless of completion order.
 */

import { toError } from './errors.js';

const DEFAULT_CONCURRENCY = 4;

type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>;

export interface WorkerPoolOptions {
  concurrency?: number;
  /** Called after each task settles */
  onProgress?: (info: { index: number; completed: number; total: number }) => void;
}

export type PoolResult<R> = { ok: true; value: R } | { ok: false; error: Error };

export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions = {}
): Promise<PoolResult<R>[]> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const results = new Array<PoolResult<R>>(tasks.length);

  let nextIndex = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      const task = tasks[index];

      try {
        results[index] = { ok: true, value: await processor(task, index) };
      } catch (error) {
        results[index] = { ok: false, error: toError(error) };
      }

      completed++;
      options.onProgress?.({ index, completed, total: tasks.length });
    }
  }

  const workerCount = Math.min(Math.max(1, concurrency), tasks.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}

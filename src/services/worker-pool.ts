/**
 * Worker Pool - bounded fan-out with a join barrier
 *
 * Runs one task per item with at most `concurrency` tasks in flight. The
 * returned promise settles once every task has settled or the signal aborts,
 * whichever comes first. Outcomes come back in item order; tasks still in
 * flight at abort time are reported as ABANDONED and their later results are
 * ignored.
 */

import { raceWithSignal } from '../utils/async';

export type TaskOutcome<R> =
  | { status: 'FULFILLED'; value: R }
  | { status: 'REJECTED'; reason: unknown }
  | { status: 'ABANDONED' };

export interface WorkerPoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T, index: number, signal?: AbortSignal) => Promise<R>,
  options: WorkerPoolOptions
): Promise<TaskOutcome<R>[]> {
  const { signal } = options;
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const outcomes: TaskOutcome<R>[] = items.map(() => ({ status: 'ABANDONED' }));

  let next = 0;
  let closed = false;

  const worker = async (): Promise<void> => {
    while (!closed && next < items.length) {
      if (signal?.aborted) {
        return;
      }
      const index = next++;
      let outcome: TaskOutcome<R>;
      try {
        outcome = { status: 'FULFILLED', value: await task(items[index], index, signal) };
      } catch (reason) {
        outcome = { status: 'REJECTED', reason };
      }
      if (!closed) {
        outcomes[index] = outcome;
      }
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
  const barrier = Promise.all(workers).then(() => undefined);

  if (signal) {
    await raceWithSignal(barrier, signal);
  } else {
    await barrier;
  }
  closed = true;

  return outcomes.slice();
}

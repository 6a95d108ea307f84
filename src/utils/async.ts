/**
 * Promise helpers for timeouts and cancellation
 */

export type RaceOutcome<T> = { completed: true; value: T } | { completed: false };

/**
 * Wait `ms` milliseconds. Resolves early when the signal aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with the promise's value, or with `{ completed: false }` as soon as
 * the signal aborts. A rejection of the promise propagates unless the signal
 * won the race; the abandoned promise's later rejection is absorbed by the race.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<RaceOutcome<T>> {
  if (signal.aborted) {
    return Promise.resolve({ completed: false });
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<RaceOutcome<T>>(resolve => {
    onAbort = () => resolve({ completed: false });
    signal.addEventListener('abort', onAbort, { once: true });
  });

  const completed = promise.then((value): RaceOutcome<T> => ({ completed: true, value }));

  return Promise.race([completed, aborted]).finally(() => {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  });
}

/**
 * AbortController that aborts itself after `ms`, or when a parent signal aborts
 */
export function timeoutController(ms: number, parent?: AbortSignal): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`Timed out after ${ms}ms`)), ms);
  timer.unref?.();

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    controller,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}

/**
 * Bounded fan-out over a list of items.
 *
 * `concurrency` lanes pull the next unclaimed item as soon as their previous
 * item settles, so at most `concurrency` workers are admitted at once. Every
 * item gets its own AbortController and timer: when the timer fires the
 * signal is aborted, the lane is released with `onTimeout(item)`, and whatever
 * the worker eventually produces is discarded. A stalled item therefore holds
 * exactly one lane for at most `timeoutMs`.
 *
 * Worker failures never reject the pool; they are turned into results by
 * `onError`.
 */

export interface PoolOptions<T, R> {
  concurrency: number;
  timeoutMs: number;
  onTimeout: (item: T) => R;
  onError: (item: T, error: unknown) => R;
}

export type PoolWorker<T, R> = (item: T, signal: AbortSignal) => Promise<R>;

/** Abort reason handed to a worker whose time slot ran out. */
export class TaskTimeoutError extends Error {
  readonly name = "TaskTimeoutError" as const;
  constructor(readonly timeoutMs: number) {
    super(`Task exceeded ${timeoutMs}ms`);
  }
}

export async function runPool<T, R>(
  items: readonly T[],
  worker: PoolWorker<T, R>,
  options: PoolOptions<T, R>,
): Promise<R[]> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
  }

  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await runWithTimeout(items[index], worker, options);
    }
  };

  const laneCount = Math.min(options.concurrency, items.length);
  await Promise.all(Array.from({ length: laneCount }, () => lane()));
  return results;
}

function runWithTimeout<T, R>(item: T, worker: PoolWorker<T, R>, options: PoolOptions<T, R>): Promise<R> {
  const controller = new AbortController();

  return new Promise<R>((resolve) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      controller.abort(new TaskTimeoutError(options.timeoutMs));
      resolve(options.onTimeout(item));
    }, options.timeoutMs);

    let pending: Promise<R>;
    try {
      pending = worker(item, controller.signal);
    } catch (err) {
      pending = Promise.reject(err);
    }

    pending.then(
      (value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(options.onError(item, err));
      },
    );
  });
}

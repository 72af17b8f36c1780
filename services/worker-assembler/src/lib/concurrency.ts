/**
 * Bounded Concurrency
 *
 * Runs an async mapper over a list with at most `limit` calls in flight.
 * Results come back in input order. Every call settles before this returns,
 * so one rejected item never leaves others running unobserved.
 */

export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

export function pLimit(concurrency: number): <T>(fn: () => Promise<T>) => Promise<T> {
  if (!(Number.isInteger(concurrency) && concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be an integer from 1 and up');
  }

  const queue: Array<() => void> = [];
  let activeCount = 0;

  const next = (): void => {
    activeCount--;
    const start = queue.shift();
    if (start) start();
  };

  return <T>(fn: () => Promise<T>): Promise<T> => {
    const execute = async (): Promise<T> => {
      activeCount++;
      try {
        return await fn();
      } finally {
        next();
      }
    };

    if (activeCount < concurrency) {
      return execute();
    }
    return new Promise<T>((resolve, reject) => {
      queue.push(() => {
        execute().then(resolve, reject);
      });
    });
  };
}

export async function mapSettled<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<Array<Settled<R>>> {
  const run = pLimit(limit);
  return Promise.all(
    items.map((item, index) =>
      run(() => fn(item, index)).then(
        (value): Settled<R> => ({ ok: true, value }),
        (error: unknown): Settled<R> => ({ ok: false, error })
      )
    )
  );
}

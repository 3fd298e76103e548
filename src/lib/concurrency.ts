import { UnitTimeoutError } from "./errors";

export async function runWithConcurrency<T, R>(
  items: T[],
  limit: number,
  handler: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (limit < 1) throw new Error("concurrency limit must be >= 1");
  const results: R[] = new Array(items.length);
  let nextIndex = 0;
  let running = 0;

  return new Promise((resolve, reject) => {
    const launchNext = () => {
      if (nextIndex >= items.length && running === 0) {
        resolve(results);
        return;
      }
      while (running < limit && nextIndex < items.length) {
        const current = nextIndex++;
        running += 1;
        handler(items[current], current)
          .then((result) => {
            results[current] = result;
            running -= 1;
            launchNext();
          })
          .catch((err) => {
            reject(err);
          });
      }
    };
    launchNext();
  });
}

/**
 * Races `work` against a timer. On timeout the controller is aborted so the
 * work can stop at its next checkpoint, and the returned promise rejects with
 * UnitTimeoutError.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new UnitTimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

import { ApiCallError, classifyApiError, isRetryableApiError } from "./errors";

export type RetryOptions = {
  retries: number;
  delaysMs: number[];
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; error: unknown; delayMs: number }) => void;
  signal?: AbortSignal;
};

export type RetryPolicy = {
  maxRetries: number;
  backoffFactor: number;
};

export function sleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function retryAsync<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { retries, delaysMs, shouldRetry, onRetry, signal } = options;
  let attempt = 0;
  while (true) {
    signal?.throwIfAborted();
    try {
      return await fn();
    } catch (err) {
      attempt += 1;
      const canRetry = attempt <= retries && !signal?.aborted && shouldRetry(err);
      if (!canRetry) throw err;
      const delayMs = delaysMs[Math.min(attempt - 1, delaysMs.length - 1)] ?? 0;
      if (onRetry) onRetry({ attempt, error: err, delayMs });
      if (delayMs > 0) await sleep(delayMs, signal);
    }
  }
}

/** Delay before retry n (1-based) is `backoffFactor ** n` seconds. */
export function exponentialDelays(retries: number, backoffFactor: number): number[] {
  const delays: number[] = [];
  for (let n = 1; n <= retries; n += 1) {
    delays.push(Math.round(Math.pow(backoffFactor, n) * 1000));
  }
  return delays;
}

/**
 * Runs an API call under the policy. Only retryable error kinds are retried; the
 * final failure is rethrown as ApiCallError tagged with its kind. An aborted
 * `signal` ends the loop with its reason, including during a backoff sleep.
 */
export async function callWithRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy & { delaysMs?: number[] },
  onRetry?: RetryOptions["onRetry"],
  signal?: AbortSignal
): Promise<T> {
  let attempts = 0;
  try {
    return await retryAsync(
      () => {
        attempts += 1;
        return fn();
      },
      {
        retries: policy.maxRetries,
        delaysMs: policy.delaysMs ?? exponentialDelays(policy.maxRetries, policy.backoffFactor),
        shouldRetry: isRetryableApiError,
        onRetry,
        signal,
      }
    );
  } catch (err) {
    throw new ApiCallError(classifyApiError(err), attempts, err);
  }
}

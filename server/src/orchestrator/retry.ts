import { isRetryableModelError } from '../errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface RetryNotice {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const backoffDelayMs = (attempt: number, baseDelayMs: number): number => {
  return baseDelayMs * 2 ** Math.max(0, attempt - 1);
};

export const sleep: Sleep = (ms, signal) => {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DOMException('Aborted', 'AbortError'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new DOMException('Aborted', 'AbortError'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * Retries `fn` while it fails with a retryable model error. `attempt` is
 * 1-based; the delay before attempt n+1 is base * 2^(n-1).
 */
export const retryModelCall = async <T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryPolicy & {
    signal?: AbortSignal;
    sleep?: Sleep;
    onRetry?: (notice: RetryNotice) => void;
  }
): Promise<T> => {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryableModelError(error) || options.signal?.aborted) {
        throw error;
      }

      const delayMs = backoffDelayMs(attempt, options.baseDelayMs);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs, options.signal);
    }
  }
};

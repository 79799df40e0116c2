export interface RetryAsyncOptions {
  maxAttempts: number;
  baseDelayMs: number;
  backoff?: 'fixed' | 'exponential';
  signal?: AbortSignal;
  shouldRetry?: (error: unknown) => boolean;
  onFailure?: (error: unknown, attempt: number) => void | Promise<void>;
}

export async function retryAsync<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryAsyncOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  const baseDelayMs = Math.max(0, options.baseDelayMs);

  let attempt = 0;
  while (true) {
    attempt += 1;
    options.signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      if (options.onFailure) {
        await options.onFailure(error, attempt);
      }

      const allowed = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!allowed || attempt >= maxAttempts || options.signal?.aborted) {
        throw error;
      }

      const backoff =
        options.backoff === 'fixed' ? baseDelayMs : baseDelayMs * 2 ** (attempt - 1);
      await delay(backoff, options.signal);
    }
  }
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }

  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  jitterMs?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => Promise<void> | void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Exponential backoff: baseDelay * 2^(attempt-1) plus jitter, capped at
 * maxDelayMs. The last error is rethrown once attempts run out or
 * shouldRetry declines.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error, attempt) : true;
      if (!retryable || attempt >= maxAttempts) {
        throw error;
      }

      const jitter = options.jitterMs ? Math.random() * options.jitterMs : 0;
      const exponential = options.baseDelayMs * Math.pow(2, attempt - 1) + jitter;
      const delay = options.maxDelayMs !== undefined ? Math.min(exponential, options.maxDelayMs) : exponential;

      await options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}

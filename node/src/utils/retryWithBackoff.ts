import { logger } from '@/services/logger';
import { TimeoutError, errorMessage } from '@/utils/errors';

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  /** Errors for which this returns false are rethrown immediately. */
  isRetryable?: (error: unknown) => boolean;
  label?: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry function with exponential backoff and jitter
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelay = 100,
    maxDelay = 5000,
    jitter = true,
    exponentialBase = 2,
    isRetryable = () => true,
    label = 'operation',
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryable(error)) {
        throw error;
      }

      const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt);
      // random 0-25% of delay
      const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
      const delay = Math.min(exponentialDelay + jitterAmount, maxDelay);

      logger.warn('retry:attempt', {
        label,
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delay),
        error: errorMessage(error),
      });
      await sleep(delay);
    }
  }
}

/** Races the call against a timer that is cleared once the call settles. */
export async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export interface ResilienceOptions extends RetryOptions {
  timeoutMs: number;
}

/** Each attempt gets its own timeout; attempts are retried per the backoff policy. */
export function callWithResilience<T>(fn: () => Promise<T>, options: ResilienceOptions): Promise<T> {
  const { timeoutMs, ...retry } = options;
  const label = retry.label ?? 'operation';
  return retryWithBackoff(() => withTimeout(fn, timeoutMs, label), retry);
}

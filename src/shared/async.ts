/**
 * Async utilities for retry, timeout, and sleep operations
 */

import { TimeoutError } from '../errors';
import type { Result } from '../domain/types';

export interface RetryOptions {
  /** Additional attempts after the first one */
  retries?: number;
  delayMs?: number;
  backoff?: number;
  maxDelayMs?: number;
  onRetry?: (attempt: number, error: string) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Re-run a Result-returning operation until it succeeds or the retries run out.
 * Attempts are strictly sequential; the last failure is returned as is.
 */
export async function retryResult<T>(
  fn: (attempt: number) => Promise<Result<T>>,
  { retries = 2, delayMs = 1000, backoff = 2, maxDelayMs = 30_000, onRetry }: RetryOptions = {},
): Promise<Result<T>> {
  const maxAttempts = retries + 1;
  let attempt = 1;

  for (;;) {
    const result = await fn(attempt);
    if (result.ok || attempt >= maxAttempts) {
      return result;
    }

    onRetry?.(attempt, result.error);
    const wait = Math.min(delayMs * Math.pow(backoff, attempt - 1), maxDelayMs);
    if (wait > 0) {
      await sleep(wait);
    }
    attempt++;
  }
}

export interface TimeoutOptions {
  timeoutMs: number;
  operation?: string;
  /** Called once when the deadline passes, before the promise rejects */
  onTimeout?: () => void;
}

/**
 * Bound a promise by a deadline. On expiry the returned promise rejects with a
 * {@link TimeoutError}; the timer is always cleared.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  { timeoutMs, operation = 'operation', onTimeout }: TimeoutOptions,
): Promise<T> {
  if (timeoutMs <= 0) {
    return fn();
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, timeoutMs, operation));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

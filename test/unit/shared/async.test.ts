/**
 * Async utilities
 */

import { describe, test, expect, jest } from '@jest/globals';
import { retryResult, withTimeout } from '../../../src/shared/async';
import { TimeoutError } from '../../../src/errors';
import type { Result } from '../../../src/domain/types';

describe('retryResult', () => {
  test('returns the first success', async () => {
    const fn = jest.fn<(attempt: number) => Promise<Result<string>>>().mockResolvedValue({ ok: true, value: 'done' });

    expect(await retryResult(fn, { delayMs: 0 })).toEqual({ ok: true, value: 'done' });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('makes one attempt more than the retry count and returns the last failure', async () => {
    const fn = jest
      .fn<(attempt: number) => Promise<Result<string>>>()
      .mockImplementation(async (attempt) => ({ ok: false, error: `attempt ${attempt}` }));
    const onRetry = jest.fn();

    const result = await retryResult(fn, { retries: 2, delayMs: 0, onRetry });

    expect(result).toEqual({ ok: false, error: 'attempt 3' });
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(onRetry).toHaveBeenCalledWith(1, 'attempt 1');
    expect(onRetry).toHaveBeenCalledWith(2, 'attempt 2');
  });

  test('does not retry with zero retries', async () => {
    const fn = jest.fn<(attempt: number) => Promise<Result<string>>>().mockResolvedValue({ ok: false, error: 'no' });

    await retryResult(fn, { retries: 0, delayMs: 0 });

    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  test('resolves with the value when in time', async () => {
    await expect(withTimeout(async () => 42, { timeoutMs: 1000 })).resolves.toBe(42);
  });

  test('rejects with a TimeoutError and calls onTimeout', async () => {
    const onTimeout = jest.fn();
    const never = (): Promise<number> => new Promise<number>(() => undefined);

    const pending = withTimeout(never, { timeoutMs: 10, operation: 'Build of web', onTimeout });

    await expect(pending).rejects.toThrow(TimeoutError);
    await expect(pending).rejects.toThrow('Build of web timed out after 10ms');
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  test('does not bound the call when the timeout is zero', async () => {
    await expect(withTimeout(async () => 'ok', { timeoutMs: 0 })).resolves.toBe('ok');
  });
});

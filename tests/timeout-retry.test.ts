// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi } from 'vitest';
import { withTimeout } from '../src/utils/timeout.js';
import { withRetry, isRetryableError } from '../src/providers/retry.js';
import { TimeoutError } from '../src/errors.js';

const delay = <T>(ms: number, value: T) => new Promise<T>((resolve) => setTimeout(() => resolve(value), ms));

describe('withTimeout', () => {
  it('resolves when the work finishes first', async () => {
    await expect(withTimeout(delay(5, 'done'), 100, 'Work')).resolves.toBe('done');
  });

  it('rejects with TimeoutError when the deadline passes', async () => {
    const result = withTimeout(delay(100, 'late'), 10, 'Search');

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('Search timed out after 10ms');
  });

  it('passes rejections through', async () => {
    await expect(withTimeout(Promise.reject(new Error('broken')), 100, 'Work')).rejects.toThrow('broken');
  });

  it('applies no deadline for non-positive values', async () => {
    await expect(withTimeout(delay(5, 'ok'), 0, 'Work')).resolves.toBe('ok');
  });
});

describe('isRetryableError', () => {
  it('retries rate limits and server errors', () => {
    expect(isRetryableError(new Error('429 Too Many Requests'))).toBe(true);
    expect(isRetryableError(new Error('503 Service Unavailable'))).toBe(true);
    expect(isRetryableError(new Error('fetch failed'))).toBe(true);
  });

  it('does not retry client errors or timeouts', () => {
    expect(isRetryableError(new Error('400 invalid request'))).toBe(false);
    expect(isRetryableError(new TimeoutError('Model call', 10))).toBe(false);
  });

  it('reads the status code SDK errors carry', () => {
    const overloaded = Object.assign(new Error('Overloaded'), { status: 529 });
    const badRequest = Object.assign(new Error('Invalid model'), { status: 400 });

    expect(isRetryableError(overloaded)).toBe(true);
    expect(isRetryableError(badRequest)).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries retryable errors with backoff', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('overloaded'))
      .mockRejectedValueOnce(new Error('overloaded'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    const result = await withRetry(fn, { initialDelayMs: 1, jitter: false, onRetry });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([attempt, , delayMs]) => [attempt, delayMs])).toEqual([[1, 1], [2, 2]]);
  });

  it('gives up after maxRetries', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('502 bad gateway'));

    await expect(withRetry(fn, { maxRetries: 2, initialDelayMs: 1, jitter: false })).rejects.toThrow('502');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops at once on non-retryable errors', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('invalid api key'));

    await expect(withRetry(fn, { initialDelayMs: 1 })).rejects.toThrow('invalid api key');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('makes no further attempt after the signal aborts', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('overloaded'));
    const control = new AbortController();
    const started = Date.now();

    const result = withRetry(fn, { maxRetries: 3, initialDelayMs: 1000, jitter: false, signal: control.signal });
    setTimeout(() => control.abort(), 10);

    await expect(result).rejects.toThrow('overloaded');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('does not retry when already aborted', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('overloaded'));
    const control = new AbortController();
    control.abort();

    await expect(withRetry(fn, { initialDelayMs: 1, signal: control.signal })).rejects.toThrow('overloaded');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps non-Error rejections', async () => {
    const fn = vi.fn().mockRejectedValue('plain string');

    await expect(withRetry(fn, { maxRetries: 0 })).rejects.toThrow('plain string');
  });
});

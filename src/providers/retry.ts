// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Retry policy for model calls.
 *
 * Transient provider failures (rate limits, overload, 5xx, dropped
 * connections) are retried with doubling delays until the attempts run out
 * or the caller aborts. Anything else surfaces at once so the query loop can
 * report the model as unavailable.
 */

import { TimeoutError } from '../errors.js';
import { AGENT_CONFIG } from '../constants.js';

export interface RetryOptions {
  /** Retries after the first attempt (default: AGENT_CONFIG.MODEL_MAX_RETRIES) */
  maxRetries?: number;
  /** Delay before the first retry; doubles for each later one */
  initialDelayMs?: number;
  /** Add up to 25% random delay (default: true) */
  jitter?: boolean;
  isRetryable?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Once aborted, pending waits end and no further attempt starts */
  signal?: AbortSignal;
}

const MAX_DELAY_MS = 30000;

/** HTTP statuses the model APIs use for transient failures */
const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504, 529]);

const RETRYABLE_MESSAGES = [
  'rate limit',
  'too many requests',
  'quota exceeded',
  'overloaded',
  'econnrefused',
  'econnreset',
  'etimedout',
  'socket hang up',
  'fetch failed',
  'network',
  'server error',
  'internal error',
  'model is loading',
];

/**
 * HTTP status of a provider error: the SDK's `status` field, or a status
 * code quoted in the message.
 */
function statusOf(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  const match = /\b([45]\d\d)\b/.exec(error.message);
  return match ? Number(match[1]) : undefined;
}

/**
 * Whether a failed model call is worth another attempt.
 */
export function isRetryableError(error: Error): boolean {
  // A deadline already covers the whole call
  if (error instanceof TimeoutError) return false;

  const status = statusOf(error);
  if (status !== undefined && RETRYABLE_STATUS.has(status)) return true;

  const message = error.message.toLowerCase();
  return RETRYABLE_MESSAGES.some((pattern) => message.includes(pattern));
}

function backoffDelay(attempt: number, initialDelayMs: number, jitter: boolean): number {
  const delay = Math.min(initialDelayMs * 2 ** attempt, MAX_DELAY_MS);
  return Math.round(jitter ? delay * (1 + 0.25 * Math.random()) : delay);
}

/**
 * Wait `ms`, or less when the signal aborts first.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run a model call, retrying transient failures.
 * @throws The last error once retries are exhausted, the error is not
 * retryable, or the signal has aborted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = AGENT_CONFIG.MODEL_MAX_RETRIES,
    initialDelayMs = AGENT_CONFIG.MODEL_RETRY_DELAY_MS,
    jitter = true,
    isRetryable = isRetryableError,
    onRetry,
    signal,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (attempt >= maxRetries || signal?.aborted || !isRetryable(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, initialDelayMs, jitter);
      onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs, signal);

      if (signal?.aborted) throw error;
    }
  }
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Retry utility with exponential backoff for remote embedding and generation calls,
 * plus per-request timeouts that compose with a caller's AbortSignal.
 */

import { DecklensError, createAbortError, isAbortError, throwIfAborted } from '../errors.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Add random jitter to delays (default: true) */
  jitter?: boolean;
  /** Function to determine if an error is retryable (default: rate limits, timeouts, network errors) */
  isRetryable?: (error: Error) => boolean;
  /** Callback when a retry occurs */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Abort waiting between attempts */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry' | 'isRetryable' | 'signal'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

/**
 * Default check for retryable errors.
 * Pipeline errors carry their own retryable flag; other errors are retried
 * on rate limits, timeouts, network errors, and server errors.
 */
export function isRetryableError(error: Error): boolean {
  if (isAbortError(error)) return false;
  if (error instanceof DecklensError) return error.retryable;

  const message = error.message.toLowerCase();

  // Rate limit errors
  if (message.includes('rate limit') ||
      message.includes('too many requests') ||
      message.includes('429') ||
      message.includes('quota exceeded')) {
    return true;
  }

  // Timeouts
  if (message.includes('timed out') ||
      message.includes('timeout') ||
      message.includes('etimedout')) {
    return true;
  }

  // Network errors
  if (message.includes('network') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('socket') ||
      message.includes('fetch failed') ||
      message.includes('connection error')) {
    return true;
  }

  // Server errors (5xx)
  if (message.includes('500') ||
      message.includes('502') ||
      message.includes('503') ||
      message.includes('504') ||
      message.includes('server error') ||
      message.includes('internal error')) {
    return true;
  }

  // Ollama-specific errors
  if (message.includes('model is loading') ||
      message.includes('try again')) {
    return true;
  }

  return false;
}

/**
 * Calculate delay with exponential backoff and optional jitter.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitter: boolean
): number {
  let delay = initialDelayMs * Math.pow(backoffMultiplier, attempt);

  delay = Math.min(delay, maxDelayMs);

  // Add jitter (0-25% random variation)
  if (jitter) {
    const jitterAmount = delay * 0.25 * Math.random();
    delay += jitterAmount;
  }

  return Math.round(delay);
}

/**
 * Sleep for a given number of milliseconds, waking early with an AbortError.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError(signal.reason));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(createAbortError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic and exponential backoff.
 *
 * @param fn - The async function to execute; receives the zero-based attempt number
 * @returns The result of the function
 * @throws The last error if all retries fail, or an AbortError when aborted
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = DEFAULT_OPTIONS.maxRetries,
    initialDelayMs = DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs = DEFAULT_OPTIONS.maxDelayMs,
    backoffMultiplier = DEFAULT_OPTIONS.backoffMultiplier,
    jitter = DEFAULT_OPTIONS.jitter,
    isRetryable = isRetryableError,
    onRetry,
    signal,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (signal?.aborted) {
        throw createAbortError(signal.reason);
      }

      if (attempt >= maxRetries || !isRetryable(lastError)) {
        throw lastError;
      }

      const delayMs = calculateDelay(
        attempt,
        initialDelayMs,
        maxDelayMs,
        backoffMultiplier,
        jitter
      );

      if (onRetry) {
        onRetry(attempt + 1, lastError, delayMs);
      }

      await sleep(delayMs, signal);
    }
  }

  throw lastError || new Error('Retry failed');
}

/**
 * Run fn with a signal that aborts after timeoutMs or when the parent signal aborts.
 * A timeout surfaces as a retryable "timed out" error; a parent abort as an AbortError.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  throwIfAborted(parent);

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await fn(controller.signal);
  } catch (error) {
    if (parent?.aborted) {
      throw createAbortError(parent.reason);
    }
    if (timedOut) {
      throw new Error(`Request timed out after ${timeoutMs}ms`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Retry Logic with Exponential Backoff
 *
 * Handles the transient failures common with the profile control service.
 * Every wait goes through an injectable SleepFn and honours an AbortSignal.
 */

import { CancelledError, isControlApiError } from '../types/errors.js';
import { logger } from './logger.js';

const log = logger.retry;

/**
 * Cancellable wait. Implementations must reject with CancelledError when the
 * signal aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timer-backed sleep that rejects with CancelledError when the signal aborts.
 */
export const sleep: SleepFn = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export interface MergedAbortSignal {
  signal: AbortSignal;
  /** Detach from both sources once the merged signal is no longer needed. */
  dispose(): void;
}

/**
 * Merge two abort signals into one.
 */
export function mergeAbortSignals(signal1: AbortSignal, signal2: AbortSignal): MergedAbortSignal {
  const controller = new AbortController();

  const abort = () => controller.abort();
  const dispose = () => {
    signal1.removeEventListener('abort', abort);
    signal2.removeEventListener('abort', abort);
  };

  if (signal1.aborted || signal2.aborted) {
    controller.abort();
  } else {
    signal1.addEventListener('abort', abort, { once: true });
    signal2.addEventListener('abort', abort, { once: true });
  }

  return { signal: controller.signal, dispose };
}

/**
 * delay = min(initialDelayMs * multiplier^retryIndex, maxDelayMs)
 */
export function exponentialDelay(
  retryIndex: number,
  initialDelayMs: number,
  maxDelayMs: number = Number.POSITIVE_INFINITY,
  multiplier: number = 2
): number {
  return Math.min(initialDelayMs * multiplier ** retryIndex, maxDelayMs);
}

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /** @default 1000 */
  initialDelayMs?: number;

  /**
   * Caps the exponential backoff.
   * @default 30000
   */
  maxDelayMs?: number;

  /** @default 2 */
  backoffMultiplier?: number;

  /**
   * Return true to retry, false to throw immediately.
   * Cancellation is never retried.
   * @default retries errors flagged `retryable`
   */
  retryOn?: (error: Error) => boolean;

  onRetry?: (attempt: number, error: Error, delayMs: number) => void;

  signal?: AbortSignal;

  sleep?: SleepFn;
}

const DEFAULT_OPTIONS = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryOn: (error: Error) => isControlApiError(error) && error.retryable,
  onRetry: () => {},
  sleep,
} satisfies Omit<Required<RetryOptions>, 'signal'>;

/**
 * Execute an async function with automatic retry on failure.
 *
 * The function receives the 1-based attempt number.
 *
 * @returns Result of the function if successful
 * @throws Last error if all attempts fail, CancelledError on abort
 *
 * @example
 * ```typescript
 * const stopped = await withRetry(
 *   (attempt) => tryStop(handle, attempt),
 *   { maxAttempts: 3, initialDelayMs: 2000, retryOn: () => true }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error = new Error('withRetry called with maxAttempts < 1');

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    throwIfAborted(opts.signal);
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (
        lastError instanceof CancelledError ||
        attempt === opts.maxAttempts ||
        !opts.retryOn(lastError)
      ) {
        throw lastError;
      }

      const delay = exponentialDelay(
        attempt - 1,
        opts.initialDelayMs,
        opts.maxDelayMs,
        opts.backoffMultiplier
      );
      opts.onRetry(attempt, lastError, delay);

      log.warn('Retry attempt failed', {
        attempt,
        maxAttempts: opts.maxAttempts,
        error: lastError.message,
        retryDelayMs: delay,
      });

      await opts.sleep(delay, opts.signal);
    }
  }

  throw lastError;
}

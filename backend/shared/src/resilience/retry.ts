/**
 * Retry Utility with Exponential Backoff
 *
 * Runs a fallible async operation up to maxRetries + 1 times, waiting
 * min(initialDelay * multiplier^n, maxDelay) between attempts (n is 0-indexed),
 * optionally spread by ±15% jitter. Waits are cancellable through an AbortSignal.
 */

import { RetryExhaustedError, abortReason, isAbortError } from './errors';

export interface RetryOptions {
  /** Maximum number of retry attempts (total attempts = maxRetries + 1) */
  maxRetries?: number;
  /** Initial delay in ms between retries */
  initialDelay?: number;
  /** Maximum delay in ms between retries */
  maxDelay?: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier?: number;
  /** Add random jitter to prevent thundering herd */
  jitter?: boolean;
  /** Custom function to determine if error is retryable */
  isRetryable?: (error: unknown, attempt: number) => boolean;
  /** Aborts the loop before an attempt or during a wait */
  signal?: AbortSignal;
  /** Callback on each retry attempt */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** Called once before RetryExhaustedError is thrown */
  onExhausted?: (error: unknown, attempts: number) => void;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

interface ResolvedRetryOptions {
  maxRetries: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  jitter: boolean;
  isRetryable: (error: unknown, attempt: number) => boolean;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  onExhausted?: (error: unknown, attempts: number) => void;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxRetries: 3,
  initialDelay: 100,
  maxDelay: 10000, // 10 seconds
  backoffMultiplier: 2,
  jitter: true,
} as const;

export const JITTER_RATIO = 0.15;

function resolveOptions(options: RetryOptions): ResolvedRetryOptions {
  return {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
    initialDelay: options.initialDelay ?? DEFAULT_RETRY_OPTIONS.initialDelay,
    maxDelay: options.maxDelay ?? DEFAULT_RETRY_OPTIONS.maxDelay,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_RETRY_OPTIONS.backoffMultiplier,
    jitter: options.jitter ?? DEFAULT_RETRY_OPTIONS.jitter,
    isRetryable: options.isRetryable ?? (() => true),
    signal: options.signal,
    onRetry: options.onRetry,
    onExhausted: options.onExhausted,
  };
}

/**
 * Calculate delay for a given retry attempt with exponential backoff
 *
 * @param attempt - 0-indexed; attempt 0 is the wait before the first retry
 */
export function calculateDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number,
  backoffMultiplier: number,
  jitter: boolean
): number {
  // Exponential backoff
  let delay = initialDelay * Math.pow(backoffMultiplier, attempt);

  // Cap at max delay
  delay = Math.min(delay, maxDelay);

  // Add jitter (±15% of delay)
  if (jitter) {
    delay = delay * (1 - JITTER_RATIO + Math.random() * JITTER_RATIO * 2);
  }

  return Math.floor(delay);
}

/**
 * Sleep for a specified duration, rejecting with the signal's reason on abort
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic and report how many attempts it took
 *
 * Cancellation errors are never retried. A non-retryable error is rethrown
 * as-is; exhausting every attempt throws RetryExhaustedError.
 */
export async function executeWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const opts = resolveOptions(options);
  const totalAttempts = opts.maxRetries + 1;

  let lastError: unknown;

  for (let attempt = 0; attempt < totalAttempts; attempt++) {
    if (opts.signal?.aborted) {
      throw abortReason(opts.signal);
    }

    try {
      const value = await fn(attempt + 1);
      return { value, attempts: attempt + 1 };
    } catch (error) {
      lastError = error;

      if (isAbortError(error) || !opts.isRetryable(error, attempt + 1)) {
        throw error;
      }

      // Last attempt: nothing left to wait for
      if (attempt === totalAttempts - 1) {
        break;
      }

      const delay = calculateDelay(
        attempt,
        opts.initialDelay,
        opts.maxDelay,
        opts.backoffMultiplier,
        opts.jitter
      );

      if (opts.onRetry) {
        opts.onRetry(error, attempt + 1, delay);
      }

      await sleep(delay, opts.signal);
    }
  }

  if (opts.onExhausted) {
    opts.onExhausted(lastError, totalAttempts);
  }
  throw new RetryExhaustedError(totalAttempts, lastError);
}

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const result = await executeWithRetry(fn, options);
  return result.value;
}

export type RetryPresetName = 'fast' | 'standard' | 'aggressive' | 'refund' | 'none';

/**
 * Pre-configured retry options for different scenarios
 */
export const RetryPresets: Record<RetryPresetName, RetryOptions> = {
  /** Fast retries for low-latency operations */
  fast: {
    maxRetries: 2,
    initialDelay: 50,
    maxDelay: 1000,
    backoffMultiplier: 2,
    jitter: true,
  },

  /** Standard retries for most operations */
  standard: {
    maxRetries: 3,
    initialDelay: 100,
    maxDelay: 10000,
    backoffMultiplier: 2,
    jitter: true,
  },

  /** Charges: five attempts, a transient provider hiccup should not reach the user */
  aggressive: {
    maxRetries: 4,
    initialDelay: 200,
    maxDelay: 10000,
    backoffMultiplier: 2,
    jitter: true,
  },

  /** Refunds: three attempts */
  refund: {
    maxRetries: 2,
    initialDelay: 500,
    maxDelay: 10000,
    backoffMultiplier: 2,
    jitter: true,
  },

  /** No retries - just execute once */
  none: {
    maxRetries: 0,
  },
};

/**
 * Resilience Module
 *
 * Retry with exponential backoff and per-dependency circuit breakers.
 *
 * Usage:
 * ```typescript
 * import { CircuitBreakerRegistry, withRetry, RetryPresets } from '@paymesh/shared';
 *
 * const breakers = new CircuitBreakerRegistry({ maxFailures: 5 });
 * const charge = await withRetry(
 *   () => breakers.forOperation('stripe', 'charge').execute(() => provider.charge(req), signal),
 *   { ...RetryPresets.aggressive, signal }
 * );
 * ```
 */

// Errors
export {
  CircuitOpenError,
  TimeoutError,
  AbortError,
  RetryExhaustedError,
  isAbortError,
  abortReason,
} from './errors';

// Circuit breaker
export { CircuitBreaker, CircuitBreakerRegistry, CircuitState } from './circuit-breaker';
export type { CircuitBreakerOptions, CircuitBreakerStats, StateChangeListener } from './circuit-breaker';

// Retry utilities
export type { RetryOptions, RetryResult, RetryPresetName } from './retry';
export {
  withRetry,
  executeWithRetry,
  calculateDelay,
  sleep,
  RetryPresets,
  DEFAULT_RETRY_OPTIONS,
  JITTER_RATIO,
} from './retry';

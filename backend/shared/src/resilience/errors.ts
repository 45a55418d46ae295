/**
 * Resilience Errors
 *
 * Error classes raised by the retry engine and the circuit breaker.
 */

/**
 * Error thrown when the circuit is open and the call was never attempted
 */
export class CircuitOpenError extends Error {
  readonly code = 'CIRCUIT_OPEN';

  constructor(public readonly circuitName: string, public readonly retryAfterMs: number = 0) {
    super(`Circuit breaker ${circuitName} is OPEN. Retry after ${retryAfterMs}ms`);
    this.name = 'CircuitOpenError';
    Object.setPrototypeOf(this, CircuitOpenError.prototype);
  }
}

/**
 * Error thrown when the caller stopped waiting for a guarded operation
 */
export class TimeoutError extends Error {
  readonly code = 'TIMEOUT';

  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error used when a signal is aborted without a reason
 */
export class AbortError extends Error {
  readonly code = 'ABORTED';

  constructor(message: string = 'The operation was aborted') {
    super(message);
    this.name = 'AbortError';
    Object.setPrototypeOf(this, AbortError.prototype);
  }
}

/**
 * Error thrown when every retry attempt failed
 */
export class RetryExhaustedError extends Error {
  readonly code = 'RETRY_EXHAUSTED';

  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(`operation failed after ${attempts} attempts: ${describeError(lastError)}`);
    this.name = 'RetryExhaustedError';
    Object.setPrototypeOf(this, RetryExhaustedError.prototype);
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Cancellation and deadline errors, including the DOMExceptions raised by
 * AbortController and AbortSignal.timeout()
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof AbortError || error instanceof TimeoutError) {
    return true;
  }
  if (typeof error === 'object' && error !== null && 'name' in error) {
    return error.name === 'AbortError' || error.name === 'TimeoutError';
  }
  return false;
}

/**
 * The error an aborted signal should surface
 */
export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new AbortError();
}

/**
 * Circuit Breaker Implementation
 *
 * Stops calling a failing dependency for a cooldown period.
 *
 * States:
 * - CLOSED: Normal operation, requests pass through, failures counted
 * - OPEN: maxFailures reached, requests are rejected without a call
 * - HALF_OPEN: Cooldown elapsed, probe requests test whether the dependency recovered
 *
 * The OPEN -> HALF_OPEN move is evaluated lazily when a request arrives;
 * there is no background timer.
 */

import { EventEmitter } from 'events';
import { CircuitOpenError, TimeoutError } from './errors';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export type StateChangeListener = (name: string, from: CircuitState, to: CircuitState) => void;

export interface CircuitBreakerOptions {
  /** Name for logging/metrics */
  name?: string;
  /** Number of failures before opening circuit */
  maxFailures?: number;
  /** Time in ms since the last failure before a probe is let through */
  timeout?: number;
  /** Consecutive half-open successes needed to close the circuit */
  halfOpenMax?: number;
  /** Custom function to determine if an error counts as a failure */
  isFailure?: (error: unknown) => boolean;
  /** Notified on every state transition */
  onStateChange?: StateChangeListener;
}

interface ResolvedCircuitBreakerOptions {
  name: string;
  maxFailures: number;
  timeout: number;
  halfOpenMax: number;
  isFailure: (error: unknown) => boolean;
  onStateChange?: StateChangeListener;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number;
  nextAttemptTime: number | null;
}

export class CircuitBreaker extends EventEmitter {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount: number = 0;
  private successCount: number = 0;
  private lastFailureTime: number = 0;

  private readonly options: ResolvedCircuitBreakerOptions;

  constructor(options: CircuitBreakerOptions = {}) {
    super();

    this.options = {
      name: options.name ?? 'circuit-breaker',
      maxFailures: positiveOr(options.maxFailures, 5),
      timeout: positiveOr(options.timeout, 30000), // 30 seconds
      halfOpenMax: positiveOr(options.halfOpenMax, 3),
      isFailure: options.isFailure ?? (() => true),
      onStateChange: options.onStateChange,
    };
  }

  get name(): string {
    return this.options.name;
  }

  /**
   * Get the current state of the circuit breaker
   */
  getState(): CircuitState {
    return this.state;
  }

  /**
   * Check if the circuit is allowing requests, moving OPEN to HALF_OPEN
   * once the cooldown has elapsed
   */
  allowRequest(): boolean {
    if (this.state !== CircuitState.OPEN) {
      return true;
    }

    if (Date.now() - this.lastFailureTime >= this.options.timeout) {
      this.transitionTo(CircuitState.HALF_OPEN);
      return true;
    }
    return false;
  }

  /**
   * Execute a function with circuit breaker protection
   *
   * If the signal aborts first, a failure is recorded and a TimeoutError is
   * thrown. The underlying call is abandoned, not cancelled; its eventual
   * outcome is ignored.
   */
  async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!this.allowRequest()) {
      const retryAfter = Math.max(0, this.lastFailureTime + this.options.timeout - Date.now());
      const error = new CircuitOpenError(this.options.name, retryAfter);
      this.emit('rejected', { state: this.state, error });
      throw error;
    }

    const startTime = Date.now();

    try {
      const result = await this.raceSignal(fn, signal);

      this.recordSuccess();
      this.emit('success', {
        state: this.state,
        duration: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      if (error instanceof TimeoutError || this.options.isFailure(error)) {
        this.recordFailure();
        this.emit('failure', {
          state: this.state,
          error,
          duration: Date.now() - startTime,
        });
      }
      throw error;
    }
  }

  private raceSignal<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const abandoned = (): TimeoutError =>
      new TimeoutError(`Circuit breaker ${this.options.name}: caller stopped waiting for the operation`);

    if (signal?.aborted) {
      return Promise.reject(abandoned());
    }

    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const onAbort = (): void => {
        if (settled) return;
        settled = true;
        reject(abandoned());
      };
      const finish = (): boolean => {
        if (settled) return false;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        return true;
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      let pending: Promise<T>;
      try {
        pending = fn();
      } catch (error) {
        if (finish()) reject(error);
        return;
      }

      pending.then(
        (value) => {
          if (finish()) resolve(value);
        },
        (error: unknown) => {
          if (finish()) reject(error);
        }
      );
    });
  }

  /**
   * Record a successful operation
   */
  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;

      if (this.successCount >= this.options.halfOpenMax) {
        this.transitionTo(CircuitState.CLOSED);
      }
      return;
    }

    // A single success forgives earlier failures
    if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
    }
  }

  /**
   * Record a failed operation
   */
  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN) {
      // Any failure in half-open state reopens the circuit
      this.transitionTo(CircuitState.OPEN);
    } else if (this.state === CircuitState.CLOSED && this.failureCount >= this.options.maxFailures) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  /**
   * Transition to a new state
   */
  private transitionTo(newState: CircuitState): void {
    const previousState = this.state;
    if (previousState === newState) {
      return;
    }
    this.state = newState;

    switch (newState) {
      case CircuitState.OPEN:
      case CircuitState.HALF_OPEN:
        this.successCount = 0;
        break;

      case CircuitState.CLOSED:
        this.failureCount = 0;
        this.successCount = 0;
        break;
    }

    this.emit('stateChange', { from: previousState, to: newState });
    if (this.options.onStateChange) {
      this.options.onStateChange(this.options.name, previousState, newState);
    }
  }

  /**
   * Force the circuit to open (for manual intervention)
   */
  forceOpen(): void {
    this.lastFailureTime = Date.now();
    this.transitionTo(CircuitState.OPEN);
  }

  /**
   * Force the circuit to close (for manual intervention)
   */
  forceClose(): void {
    this.transitionTo(CircuitState.CLOSED);
  }

  /**
   * Reset the circuit breaker to initial state
   */
  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = 0;
    this.emit('reset', {});
  }

  /**
   * Get statistics about the circuit breaker
   */
  getStats(): CircuitBreakerStats {
    return {
      name: this.options.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime,
      nextAttemptTime: this.state === CircuitState.OPEN ? this.lastFailureTime + this.options.timeout : null,
    };
  }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}

/**
 * Lazily creates one breaker per key (e.g. "stripe:charge") from shared defaults
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly defaults: Omit<CircuitBreakerOptions, 'name'> = {}) {}

  get(name: string): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker({ ...this.defaults, name });
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  forOperation(provider: string, operation: string): CircuitBreaker {
    return this.get(`${provider}:${operation}`);
  }

  getAllStats(): CircuitBreakerStats[] {
    return Array.from(this.breakers.values()).map((breaker) => breaker.getStats());
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }
}

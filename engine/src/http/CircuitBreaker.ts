/**
 * Circuit Breaker
 *
 * Failure-count gate with two states. There is no half-open trial request: once the
 * reset timeout has elapsed, `isOpen()` closes the breaker as a side effect
 * and the next request's outcome updates it again. Open means "wait", not
 * "reject"; the client sleeps through the reset timeout and carries on.
 *
 * In memory only, never persisted.
 *
 * @module http
 */

import type { CircuitBreakerConfig } from '../types/core-types.js';

export type CircuitState = 'closed' | 'open';

export interface CircuitBreakerOptions {
  /** Clock, in epoch milliseconds */
  now?: () => number;
  /** Uniform [0, 1) source used for jitter */
  random?: () => number;
}

export class CircuitBreaker {
  private failureCount = 0;
  private lastFailureTime: number | undefined;
  private currentState: CircuitState = 'closed';
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(
    private readonly config: CircuitBreakerConfig,
    options: CircuitBreakerOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  get state(): CircuitState {
    return this.currentState;
  }

  get failures(): number {
    return this.failureCount;
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    if (this.failureCount >= this.config.threshold) {
      this.currentState = 'open';
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;
    this.lastFailureTime = undefined;
    this.currentState = 'closed';
  }

  /**
   * Whether requests should wait. Resets the breaker once
   * `reset + uniform(0, jitter)` seconds have passed since the last failure.
   */
  isOpen(): boolean {
    if (this.currentState === 'closed') {
      return false;
    }

    const elapsed = this.now() - (this.lastFailureTime ?? 0);
    if (elapsed >= this.getResetTimeout()) {
      this.recordSuccess();
      return false;
    }
    return true;
  }

  /**
   * Reset timeout with a fresh jitter draw, in milliseconds
   */
  getResetTimeout(): number {
    return (this.config.reset + this.random() * this.config.jitter) * 1000;
  }
}

/**
 * Backoff Strategy
 *
 * Calculates delays between retry attempts: `backoffFactor * 2^attempt`
 * seconds for a zero-based attempt number, capped at `maxDelay`.
 *
 * @module automation
 */

import type { RetryConfig } from '../types/core-types.js';

export interface BackoffConfig {
  /** Delay for attempt 0, in milliseconds */
  baseDelayMs: number;

  /** Maximum delay cap in milliseconds */
  maxDelayMs: number;

  /** Growth per attempt (default: 2) */
  multiplier?: number;
}

export class BackoffStrategy {
  private readonly config: Required<BackoffConfig>;

  constructor(config: BackoffConfig) {
    this.config = {
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs,
      multiplier: config.multiplier ?? 2,
    };

    this.validateConfig();
  }

  static fromRetryConfig(retry: RetryConfig): BackoffStrategy {
    return new BackoffStrategy({
      baseDelayMs: retry.backoffFactor * 1000,
      maxDelayMs: retry.maxDelay * 1000,
    });
  }

  /**
   * @param attempt - Attempt number (0-indexed)
   * @returns Delay in milliseconds
   */
  calculateDelay(attempt: number): number {
    if (attempt < 0) {
      throw new Error(`Attempt number must be >= 0, got: ${attempt}`);
    }

    const delayMs = this.config.baseDelayMs * Math.pow(this.config.multiplier, attempt);
    return Math.round(Math.min(delayMs, this.config.maxDelayMs));
  }

  private validateConfig(): void {
    if (this.config.baseDelayMs < 0) {
      throw new Error(`Base delay must be >= 0, got: ${this.config.baseDelayMs}`);
    }

    if (this.config.maxDelayMs < 0) {
      throw new Error(`Max delay must be >= 0, got: ${this.config.maxDelayMs}`);
    }

    if (this.config.multiplier <= 0) {
      throw new Error(`Multiplier must be > 0, got: ${this.config.multiplier}`);
    }
  }
}

/** `Sun, 06 Nov 1994 08:49:37 GMT` */
const IMF_FIXDATE =
  /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), \d{2} (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) \d{4} \d{2}:\d{2}:\d{2} GMT$/;

/**
 * Parse a Retry-After header value: delta seconds or an IMF-fixdate.
 * Dates in the past clamp to 0.
 *
 * @returns Delay in milliseconds, or undefined when the value is neither form
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;

  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }
  if (!IMF_FIXDATE.test(trimmed)) return undefined;

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

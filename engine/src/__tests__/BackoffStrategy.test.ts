import { describe, it, expect } from 'vitest';
import { BackoffStrategy, parseRetryAfter } from '../automation/BackoffStrategy.js';
import { BackoffTimer } from '../automation/runtime/BackoffTimer.js';
import { DEFAULT_RETRY_CONFIG } from '../types/core-types.js';

describe('BackoffStrategy', () => {
  it('doubles the delay per attempt from backoffFactor seconds', () => {
    const strategy = BackoffStrategy.fromRetryConfig({ ...DEFAULT_RETRY_CONFIG, backoffFactor: 0.5 });
    expect([0, 1, 2, 3].map((attempt) => strategy.calculateDelay(attempt))).toEqual([500, 1000, 2000, 4000]);
  });

  it('caps delays at maxDelay', () => {
    const strategy = BackoffStrategy.fromRetryConfig({ ...DEFAULT_RETRY_CONFIG, backoffFactor: 1, maxDelay: 5 });
    expect([0, 1, 2, 3, 4].map((attempt) => strategy.calculateDelay(attempt))).toEqual([1000, 2000, 4000, 5000, 5000]);
  });

  it('rejects negative attempts and invalid configs', () => {
    const strategy = new BackoffStrategy({ baseDelayMs: 100, maxDelayMs: 1000 });
    expect(() => strategy.calculateDelay(-1)).toThrow('Attempt number must be >= 0, got: -1');
    expect(() => new BackoffStrategy({ baseDelayMs: -1, maxDelayMs: 10 })).toThrow('Base delay must be >= 0');
    expect(() => new BackoffStrategy({ baseDelayMs: 1, maxDelayMs: 10, multiplier: 0 })).toThrow(
      'Multiplier must be > 0'
    );
  });
});

describe('parseRetryAfter', () => {
  const now = Date.parse('2026-03-01T12:00:00Z');

  it('reads delta seconds', () => {
    expect(parseRetryAfter('5', now)).toBe(5000);
    expect(parseRetryAfter(' 0 ', now)).toBe(0);
  });

  it('reads an HTTP-date relative to now', () => {
    expect(parseRetryAfter('Sun, 01 Mar 2026 12:00:30 GMT', now)).toBe(30000);
  });

  it('clamps dates in the past to zero', () => {
    expect(parseRetryAfter('Sun, 01 Mar 2026 11:59:00 GMT', now)).toBe(0);
  });

  it('returns undefined for missing or unreadable values', () => {
    expect(parseRetryAfter(undefined, now)).toBeUndefined();
    expect(parseRetryAfter('', now)).toBeUndefined();
    expect(parseRetryAfter('later', now)).toBeUndefined();
  });

  it('accepts only whole seconds and IMF-fixdates', () => {
    expect(parseRetryAfter('1.5', now)).toBeUndefined();
    expect(parseRetryAfter('-5', now)).toBeUndefined();
    expect(parseRetryAfter('2026-03-01T12:00:30Z', now)).toBeUndefined();
    expect(parseRetryAfter('March 1, 2026', now)).toBeUndefined();
  });
});

describe('BackoffTimer', () => {
  it('formats delays for logs', () => {
    expect(BackoffTimer.formatDelay(500)).toBe('500ms');
    expect(BackoffTimer.formatDelay(1500)).toBe('1.5s');
    expect(BackoffTimer.formatDelay(2000)).toBe('2s');
    expect(BackoffTimer.formatDelay(125_000)).toBe('2m 5s');
    expect(BackoffTimer.formatDelay(180_000)).toBe('3m');
  });
});

import { describe, it, expect } from 'vitest';
import { CircuitBreaker } from '../http/CircuitBreaker.js';

function makeBreaker(start = 0, random = 0.5) {
  let now = start;
  const breaker = new CircuitBreaker(
    { threshold: 3, reset: 10, jitter: 2 },
    { now: () => now, random: () => random }
  );
  return {
    breaker,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('CircuitBreaker', () => {
  it('starts closed', () => {
    const { breaker } = makeBreaker();
    expect(breaker.state).toBe('closed');
    expect(breaker.isOpen()).toBe(false);
  });

  it('opens once consecutive failures reach the threshold', () => {
    const { breaker } = makeBreaker();
    breaker.recordFailure();
    breaker.recordFailure();
    expect(breaker.isOpen()).toBe(false);

    breaker.recordFailure();
    expect(breaker.state).toBe('open');
    expect(breaker.isOpen()).toBe(true);
  });

  it('resets the failure count on success', () => {
    const { breaker } = makeBreaker();
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();

    expect(breaker.failures).toBe(1);
    expect(breaker.state).toBe('closed');
  });

  it('adds scaled jitter to the reset timeout', () => {
    expect(makeBreaker(0, 0).breaker.getResetTimeout()).toBe(10000);
    expect(makeBreaker(0, 0.5).breaker.getResetTimeout()).toBe(11000);
  });

  it('closes itself once the reset timeout has elapsed', () => {
    const { breaker, advance } = makeBreaker(1000);
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();

    advance(10999);
    expect(breaker.isOpen()).toBe(true);

    advance(1);
    expect(breaker.isOpen()).toBe(false);
    expect(breaker.state).toBe('closed');
    expect(breaker.failures).toBe(0);
  });

  it('measures the timeout from the most recent failure', () => {
    const { breaker, advance } = makeBreaker();
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();
    advance(8000);
    breaker.recordFailure();
    advance(8000);

    expect(breaker.isOpen()).toBe(true);
  });
});

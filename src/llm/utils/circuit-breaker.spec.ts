// src/llm/utils/circuit-breaker.spec.ts

import { CircuitBreaker, CircuitBreakerState } from './circuit-breaker';

describe('CircuitBreaker', () => {
  let now: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    now = 0;
    breaker = new CircuitBreaker('test', {
      failureThreshold: 3,
      resetTimeoutMs: 1000,
      halfOpenMaxCalls: 2,
      now: () => now,
    });
  });

  it('should open after the failure threshold', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    expect(breaker.isOpen()).toBe(false);

    breaker.recordFailure();
    expect(breaker.isOpen()).toBe(true);
    expect(breaker.getState()).toBe(CircuitBreakerState.OPEN);
  });

  it('should reset the failure count on success while closed', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();

    expect(breaker.getFailureCount()).toBe(1);
    expect(breaker.getState()).toBe(CircuitBreakerState.CLOSED);
  });

  it('should move to half-open once the reset timeout has passed', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();

    now = 999;
    expect(breaker.isOpen()).toBe(true);

    now = 1000;
    expect(breaker.isOpen()).toBe(false);
    expect(breaker.getState()).toBe(CircuitBreakerState.HALF_OPEN);
  });

  it('should close after enough successful probes', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();
    now = 1000;
    breaker.isOpen();

    breaker.recordSuccess();
    expect(breaker.getState()).toBe(CircuitBreakerState.HALF_OPEN);
    breaker.recordSuccess();
    expect(breaker.getState()).toBe(CircuitBreakerState.CLOSED);
    expect(breaker.getFailureCount()).toBe(0);
  });

  it('should reopen when a probe fails', () => {
    breaker.recordFailure();
    breaker.recordFailure();
    breaker.recordFailure();
    now = 1000;
    breaker.isOpen();

    breaker.recordFailure();
    expect(breaker.getState()).toBe(CircuitBreakerState.OPEN);

    now = 1500;
    expect(breaker.isOpen()).toBe(true);
  });
});

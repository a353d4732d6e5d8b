// src/llm/utils/circuit-breaker.ts
/**
 * Circuit breaker
 *
 * Stops calling an upstream API after consecutive failures so a dead endpoint
 * is not hammered with retries.
 *
 * States:
 * - CLOSED: normal, calls allowed
 * - OPEN: tripped, calls rejected (the caller degrades)
 * - HALF_OPEN: a few probe calls allowed after the reset timeout
 */

export enum CircuitBreakerState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerOptions {
  /** Consecutive failures before tripping, default 5 */
  failureThreshold?: number;
  /** Time in OPEN before probing again, default 60000 */
  resetTimeoutMs?: number;
  /** Successful probes needed to close again, default 2 */
  halfOpenMaxCalls?: number;
  /** Clock, replaceable in tests */
  now?: () => number;
}

export class CircuitBreaker {
  private state: CircuitBreakerState = CircuitBreakerState.CLOSED;
  private failureCount = 0;
  private lastFailureTime: number | null = null;
  private halfOpenSuccessCount = 0;

  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly halfOpenMaxCalls: number;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    options: CircuitBreakerOptions = {}
  ) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 60000;
    this.halfOpenMaxCalls = options.halfOpenMaxCalls ?? 2;
    this.now = options.now ?? Date.now;
  }

  /**
   * Whether calls are currently rejected
   *
   * An OPEN breaker whose reset timeout has passed moves to HALF_OPEN here.
   */
  isOpen(): boolean {
    if (this.state === CircuitBreakerState.OPEN) {
      if (this.lastFailureTime !== null && this.now() - this.lastFailureTime >= this.resetTimeoutMs) {
        this.state = CircuitBreakerState.HALF_OPEN;
        this.halfOpenSuccessCount = 0;
        return false;
      }
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    if (this.state === CircuitBreakerState.HALF_OPEN) {
      this.halfOpenSuccessCount++;
      if (this.halfOpenSuccessCount >= this.halfOpenMaxCalls) {
        this.reset();
      }
    } else if (this.state === CircuitBreakerState.CLOSED) {
      this.failureCount = 0;
    }
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === CircuitBreakerState.HALF_OPEN) {
      // a failed probe trips the breaker again immediately
      this.state = CircuitBreakerState.OPEN;
      this.halfOpenSuccessCount = 0;
    } else if (this.state === CircuitBreakerState.CLOSED && this.failureCount >= this.failureThreshold) {
      this.state = CircuitBreakerState.OPEN;
    }
  }

  getState(): CircuitBreakerState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  reset(): void {
    this.state = CircuitBreakerState.CLOSED;
    this.failureCount = 0;
    this.lastFailureTime = null;
    this.halfOpenSuccessCount = 0;
  }
}

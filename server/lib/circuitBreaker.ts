/**
 * Circuit breaker in front of the broker market-data endpoints.
 *
 *   CLOSED    → requests pass through
 *   OPEN      → broker assumed down, requests rejected without a network call
 *   HALF_OPEN → cooldown elapsed, the next request is let through as a probe
 *
 * Only errors accepted by `isInfraError` count towards the threshold; rate
 * limits and 401s are answers from a healthy upstream.
 */

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Consecutive failures before opening the circuit. Default 5. */
  failureThreshold?: number;
  /** Milliseconds to stay OPEN before probing. Default 30 000. */
  cooldownMs?: number;
  isInfraError?: (err: unknown) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  now?: () => number;
}

export interface CircuitBreakerInfo {
  state: CircuitState;
  consecutiveFailures: number;
  cooldownRemainingMs: number;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private consecutiveFailures = 0;
  private lastFailureMs = 0;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly isInfraError: (err: unknown) => boolean;
  private readonly onStateChange: ((from: CircuitState, to: CircuitState) => void) | null;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = Math.max(1, options.failureThreshold ?? 5);
    this.cooldownMs = Math.max(0, options.cooldownMs ?? 30_000);
    this.isInfraError = options.isInfraError ?? (() => true);
    this.onStateChange = options.onStateChange ?? null;
    this.now = options.now ?? Date.now;
  }

  getState(): CircuitState {
    this.evaluateState();
    return this.state;
  }

  getInfo(): CircuitBreakerInfo {
    this.evaluateState();
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      cooldownRemainingMs: this.state === 'OPEN' ? Math.round(this.cooldownRemainingMs()) : 0,
    };
  }

  async call<T>(fn: () => Promise<T>): Promise<T> {
    this.evaluateState();

    if (this.state === 'OPEN') {
      throw new CircuitOpenError(this.cooldownRemainingMs());
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onError(err);
      throw err;
    }
  }

  reset(): void {
    const prev = this.state;
    this.state = 'CLOSED';
    this.consecutiveFailures = 0;
    this.lastFailureMs = 0;
    if (prev !== 'CLOSED') this.onStateChange?.(prev, 'CLOSED');
  }

  private evaluateState(): void {
    if (this.state === 'OPEN' && this.now() - this.lastFailureMs >= this.cooldownMs) {
      this.state = 'HALF_OPEN';
      this.onStateChange?.('OPEN', 'HALF_OPEN');
    }
  }

  private onSuccess(): void {
    const prev = this.state;
    this.consecutiveFailures = 0;
    this.state = 'CLOSED';
    if (prev !== 'CLOSED') this.onStateChange?.(prev, 'CLOSED');
  }

  private onError(err: unknown): void {
    if (!this.isInfraError(err)) return;

    this.consecutiveFailures++;
    this.lastFailureMs = this.now();

    // A failed probe reopens immediately.
    if (this.state === 'HALF_OPEN' || this.consecutiveFailures >= this.failureThreshold) {
      if (this.state !== 'OPEN') {
        const prev = this.state;
        this.state = 'OPEN';
        this.onStateChange?.(prev, 'OPEN');
      }
    }
  }

  private cooldownRemainingMs(): number {
    return Math.max(0, this.cooldownMs - (this.now() - this.lastFailureMs));
  }
}

export class CircuitOpenError extends Error {
  readonly cooldownRemainingMs: number;
  readonly httpStatus = 503;

  constructor(cooldownRemainingMs: number) {
    super(`Circuit breaker is OPEN — broker requests blocked for ${Math.ceil(cooldownRemainingMs / 1000)}s`);
    this.name = 'CircuitOpenError';
    this.cooldownRemainingMs = cooldownRemainingMs;
  }
}

/**
 * Circuit Breaker: stops calling a failing dependency until a cool-down elapses.
 */

// ── Types ──

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** Cool-down in ms before a trial call is let through */
  resetTimeoutMs: number;
  /** Trial calls allowed while half open */
  halfOpenMaxAttempts: number;
}

export const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30_000,
  halfOpenMaxAttempts: 1,
};

export type StateChangeCallback = (from: CircuitState, to: CircuitState) => void;

/** Error thrown when the circuit is open. */
export class CircuitOpenError extends Error {
  constructor(readonly breaker: string) {
    super(`Circuit '${breaker}' is open`);
    this.name = 'CircuitOpenError';
  }
}

// ── Circuit Breaker ──

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failures = 0;
  private trialsInFlight = 0;
  private openedAt = 0;
  private listeners: StateChangeCallback[] = [];
  private config: CircuitBreakerConfig;

  constructor(
    readonly name: string,
    config: Partial<CircuitBreakerConfig> = {},
  ) {
    this.config = { ...DEFAULT_BREAKER_CONFIG, ...config };
  }

  /** Run `fn` through the breaker; rejects with CircuitOpenError while open. */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const current = this.getState();
    if (current === 'open') {
      throw new CircuitOpenError(this.name);
    }
    if (current === 'half_open') {
      if (this.trialsInFlight >= this.config.halfOpenMaxAttempts) {
        throw new CircuitOpenError(this.name);
      }
      this.trialsInFlight++;
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    } finally {
      if (current === 'half_open') this.trialsInFlight--;
    }
  }

  getState(): CircuitState {
    if (this.state === 'open' && Date.now() - this.openedAt >= this.config.resetTimeoutMs) {
      this.transition('half_open');
    }
    return this.state;
  }

  onStateChange(callback: StateChangeCallback): void {
    this.listeners.push(callback);
  }

  getFailureCount(): number {
    return this.failures;
  }

  forceReset(): void {
    this.failures = 0;
    this.trialsInFlight = 0;
    this.transition('closed');
  }

  private onSuccess(): void {
    this.failures = 0;
    if (this.state === 'half_open') this.transition('closed');
  }

  private onFailure(): void {
    this.failures++;
    if (this.state === 'half_open' || this.failures >= this.config.failureThreshold) {
      this.openedAt = Date.now();
      this.transition('open');
    }
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    for (const cb of this.listeners) cb(from, to);
  }
}

import { CircuitBreakerOpenError } from '../errors/errors';

export interface CircuitBreakerConfig {
  threshold: number; // Consecutive failures before opening
  timeout: number; // Time in ms to wait before letting one probe through
  name: string;
}

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half_open',
}

export interface CircuitBreakerMetrics {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  totalCalls: number;
  totalFailures: number;
  lastFailureTime: number;
}

/**
 * Guards backend round trips. Once `threshold` calls in a row have failed,
 * further calls are rejected without touching the broker until `timeout` ms
 * have passed; the next call then probes it (half-open).
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private totalCalls = 0;
  private totalFailures = 0;
  private lastFailureTime = 0;
  private readonly threshold: number;
  private readonly timeout: number;
  private readonly name: string;

  constructor(config: CircuitBreakerConfig) {
    this.threshold = config.threshold;
    this.timeout = config.timeout;
    this.name = config.name;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() - this.lastFailureTime >= this.timeout) {
        this.state = CircuitState.HALF_OPEN;
      } else {
        throw new CircuitBreakerOpenError(this.name);
      }
    }

    this.totalCalls++;
    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onSuccess(): void {
    this.consecutiveFailures = 0;
    this.state = CircuitState.CLOSED;
  }

  private onFailure(): void {
    this.consecutiveFailures++;
    this.totalFailures++;
    this.lastFailureTime = Date.now();

    // A failed probe reopens immediately
    if (
      this.state === CircuitState.HALF_OPEN ||
      this.consecutiveFailures >= this.threshold
    ) {
      this.state = CircuitState.OPEN;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      totalCalls: this.totalCalls,
      totalFailures: this.totalFailures,
      lastFailureTime: this.lastFailureTime,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.consecutiveFailures = 0;
    this.totalCalls = 0;
    this.totalFailures = 0;
    this.lastFailureTime = 0;
  }
}

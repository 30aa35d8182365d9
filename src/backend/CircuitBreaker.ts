import { EventEmitter } from 'events';
import { Logger, createLogger } from '../common/logger';

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half_open'
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  successThreshold?: number;
  timeout?: number;
  resetTimeout?: number;
  name?: string;
  logger?: Logger;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  totalCalls: number;
  lastFailureTime?: number;
  stateChangedAt: number;
}

/**
 * Guards backend calls: bounds each call with a timeout and stops calling a
 * backend that keeps failing until `resetTimeout` has passed.
 */
export class CircuitBreaker extends EventEmitter {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private successes = 0;
  private totalCalls = 0;
  private lastFailureTime?: number;
  private stateChangedAt: number = Date.now();
  private resetTimer?: NodeJS.Timeout;

  private readonly options: Required<Omit<CircuitBreakerOptions, 'logger'>>;
  private readonly logger: Logger;

  constructor(options: CircuitBreakerOptions = {}) {
    super();

    this.options = {
      failureThreshold: options.failureThreshold || 5,
      successThreshold: options.successThreshold || 1,
      timeout: options.timeout || 5000,
      resetTimeout: options.resetTimeout || 30000,
      name: options.name || 'circuit-breaker'
    };
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Execute a function with circuit breaker protection
   */
  async execute<R>(fn: () => Promise<R>): Promise<R> {
    if (this.state === CircuitState.OPEN) {
      const error = new Error(`Circuit breaker '${this.options.name}' is OPEN`);
      this.emit('call-rejected', { reason: 'circuit-open', error });
      throw error;
    }

    this.totalCalls++;

    try {
      const result = await this.executeWithTimeout(fn);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure(error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  private executeWithTimeout<R>(fn: () => Promise<R>): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Circuit breaker '${this.options.name}' call timeout after ${this.options.timeout}ms`));
      }, this.options.timeout);

      fn()
        .then(result => {
          clearTimeout(timer);
          resolve(result);
        })
        .catch(error => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }

  private onSuccess(): void {
    this.successes++;

    if (this.state === CircuitState.HALF_OPEN) {
      if (this.successes >= this.options.successThreshold) {
        this.transitionTo(CircuitState.CLOSED);
        this.resetCounters();
      }
    } else {
      this.failures = 0;
    }
  }

  private onFailure(error: Error): void {
    this.failures++;
    this.lastFailureTime = Date.now();

    if (this.state === CircuitState.HALF_OPEN || this.failures >= this.options.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
      this.scheduleReset();
    }

    this.emit('failure', { error, state: this.state, failureCount: this.failures });
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) return;

    const previousState = this.state;
    this.state = newState;
    this.stateChangedAt = Date.now();

    this.logger.backend(`Circuit '${this.options.name}': ${previousState} -> ${newState}`);
    this.emit('state-change', { previousState, newState, timestamp: this.stateChangedAt });
  }

  /**
   * Schedule the move from OPEN to HALF_OPEN
   */
  private scheduleReset(): void {
    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
    }

    this.resetTimer = setTimeout(() => {
      if (this.state === CircuitState.OPEN) {
        this.transitionTo(CircuitState.HALF_OPEN);
        this.resetCounters();
      }
    }, this.options.resetTimeout);

    this.resetTimer.unref();
  }

  private resetCounters(): void {
    this.failures = 0;
    this.successes = 0;
    this.lastFailureTime = undefined;
  }

  /**
   * Force circuit to CLOSED state
   */
  reset(): void {
    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
      this.resetTimer = undefined;
    }

    this.transitionTo(CircuitState.CLOSED);
    this.resetCounters();
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      totalCalls: this.totalCalls,
      lastFailureTime: this.lastFailureTime,
      stateChangedAt: this.stateChangedAt
    };
  }
}

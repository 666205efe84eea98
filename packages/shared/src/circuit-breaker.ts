/**
 * Lightweight circuit breaker for the completion provider.
 * States: closed (normal) -> open (fast-fail) -> half-open (testing)
 *
 * It never retries: a call made while open fails immediately.
 */
import { logger } from './logger.js';
import { CompletionError } from './errors.js';

const log = logger.child({ module: 'circuit-breaker' });

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  /** Name for logging */
  name: string;
  /** Number of consecutive failures before opening (default: 5) */
  failureThreshold?: number;
  /** Time in ms before trying half-open (default: 30000) */
  resetTimeoutMs?: number;
  /** Successes in half-open before closing (default: 1) */
  halfOpenSuccessThreshold?: number;
  /** Callback when state changes */
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
  /** Clock, replaceable in tests */
  now?: () => number;
}

export class CircuitBreakerOpenError extends CompletionError {
  constructor(name: string) {
    super(`circuit breaker '${name}' is open`);
    this.name = 'CircuitBreakerOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;
  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly halfOpenSuccessThreshold: number;
  private readonly onStateChange?: (from: CircuitState, to: CircuitState) => void;
  private readonly now: () => number;

  constructor(opts: CircuitBreakerOptions) {
    this.name = opts.name;
    this.failureThreshold = opts.failureThreshold ?? 5;
    this.resetTimeoutMs = opts.resetTimeoutMs ?? 30_000;
    this.halfOpenSuccessThreshold = opts.halfOpenSuccessThreshold ?? 1;
    this.onStateChange = opts.onStateChange;
    this.now = opts.now ?? Date.now;
  }

  get currentState(): CircuitState {
    return this.state;
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    log.info({ name: this.name, from, to }, 'circuit breaker state change');
    this.onStateChange?.(from, to);
  }

  private admit(): void {
    if (this.state !== 'open') return;
    if (this.now() - this.lastFailureTime >= this.resetTimeoutMs) {
      this.transition('half-open');
      this.successCount = 0;
      return;
    }
    throw new CircuitBreakerOpenError(this.name);
  }

  /**
   * Guard a streamed call. Items pass through as soon as they arrive; the
   * call counts as a success once the source is exhausted and as a failure
   * if it throws. A consumer that stops early records neither.
   */
  async *stream<T>(source: () => AsyncIterable<T>): AsyncGenerator<T> {
    this.admit();
    try {
      for await (const item of source()) {
        yield item;
      }
    } catch (error) {
      this.onFailure();
      throw error;
    }
    this.onSuccess();
  }

  private onSuccess(): void {
    if (this.state === 'half-open') {
      this.successCount++;
      if (this.successCount >= this.halfOpenSuccessThreshold) {
        this.failureCount = 0;
        this.transition('closed');
      }
    } else {
      this.failureCount = 0;
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    if (this.state === 'half-open') {
      this.transition('open');
    } else if (this.failureCount >= this.failureThreshold) {
      this.transition('open');
    }
  }
}

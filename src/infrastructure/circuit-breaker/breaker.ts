// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER — Implementation
// ═══════════════════════════════════════════════════════════════════════════════
//
// One breaker per remote stance backend. Failures are counted in a sliding
// time window; once the threshold is reached calls fail fast until the reset
// timeout elapses and a trial call succeeds.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type CircuitState,
  type CircuitBreakerConfig,
  type CircuitMetrics,
  CircuitOpenError,
  CircuitTimeoutError,
  DEFAULT_CIRCUIT_CONFIG,
} from './types.js';
import { getLogger } from '../../logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FAILURE WINDOW
// ─────────────────────────────────────────────────────────────────────────────────

export class SlidingWindow {
  private readonly timestamps: number[] = [];

  constructor(private readonly windowMs: number) {}

  record(timestamp: number = Date.now()): void {
    this.cleanup(timestamp);
    this.timestamps.push(timestamp);
  }

  count(now: number = Date.now()): number {
    this.cleanup(now);
    return this.timestamps.length;
  }

  clear(): void {
    this.timestamps.length = 0;
  }

  private cleanup(now: number): void {
    const cutoff = now - this.windowMs;
    let oldest = this.timestamps[0];
    while (oldest !== undefined && oldest < cutoff) {
      this.timestamps.shift();
      oldest = this.timestamps[0];
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CIRCUIT BREAKER
// ─────────────────────────────────────────────────────────────────────────────────

export class CircuitBreaker {
  readonly name: string;

  private readonly config: CircuitBreakerConfig;
  private readonly logger = getLogger({ component: 'circuit-breaker' });
  private readonly failureWindow: SlidingWindow;

  private state: CircuitState = 'CLOSED';
  private openedAt = 0;
  private successCount = 0;
  private halfOpenInFlight = 0;

  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private rejectedRequests = 0;
  private lastFailureTime?: number;

  constructor(config: Partial<CircuitBreakerConfig> & { name: string }) {
    this.config = { ...DEFAULT_CIRCUIT_CONFIG, ...config };
    this.name = this.config.name;
    this.failureWindow = new SlidingWindow(this.config.failureWindowMs);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────────────────

  getState(): CircuitState {
    if (this.state === 'OPEN' && Date.now() - this.openedAt >= this.config.resetTimeoutMs) {
      this.transitionTo('HALF_OPEN', 'Reset timeout elapsed');
    }
    return this.state;
  }

  isAllowed(): boolean {
    switch (this.getState()) {
      case 'CLOSED':
        return true;
      case 'OPEN':
        return false;
      case 'HALF_OPEN':
        return this.halfOpenInFlight < this.config.halfOpenRequests;
    }
  }

  private transitionTo(next: CircuitState, reason: string): void {
    const previous = this.state;
    if (previous === next) return;

    this.state = next;
    if (next === 'HALF_OPEN') {
      this.successCount = 0;
      this.halfOpenInFlight = 0;
    } else if (next === 'CLOSED') {
      this.failureWindow.clear();
    } else {
      this.openedAt = Date.now();
    }

    this.logger.warn('Circuit state changed', { circuit: this.name, from: previous, to: next, reason });
    this.config.onStateChange?.({ name: this.name, from: previous, to: next, timestamp: Date.now(), reason });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Execution
  // ─────────────────────────────────────────────────────────────────────────────

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const state = this.getState();
    this.totalRequests++;

    if (!this.isAllowed()) {
      this.rejectedRequests++;
      const retryAfterMs = state === 'OPEN'
        ? Math.max(0, this.config.resetTimeoutMs - (Date.now() - this.openedAt))
        : 0;
      throw new CircuitOpenError(this.name, retryAfterMs);
    }

    if (state === 'HALF_OPEN') this.halfOpenInFlight++;

    try {
      const result = this.config.requestTimeoutMs > 0
        ? await this.withTimeout(fn, this.config.requestTimeoutMs)
        : await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      const counts = this.config.isFailure ? this.config.isFailure(error) : true;
      if (counts) {
        this.recordFailure();
      }
      throw error;
    } finally {
      if (state === 'HALF_OPEN') this.halfOpenInFlight--;
    }
  }

  private withTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(new CircuitTimeoutError(this.name, timeoutMs)), timeoutMs);
      fn().then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Recording
  // ─────────────────────────────────────────────────────────────────────────────

  recordSuccess(): void {
    this.successfulRequests++;
    if (this.state === 'HALF_OPEN') {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.transitionTo('CLOSED', `Success threshold reached (${this.successCount}/${this.config.successThreshold})`);
      }
    }
  }

  recordFailure(): void {
    this.failedRequests++;
    this.lastFailureTime = Date.now();
    this.failureWindow.record();

    if (this.state === 'HALF_OPEN') {
      this.transitionTo('OPEN', 'Failure during recovery test');
      return;
    }

    const failures = this.failureWindow.count();
    if (this.state === 'CLOSED' && failures >= this.config.failureThreshold) {
      this.transitionTo('OPEN', `Failure threshold reached (${failures}/${this.config.failureThreshold})`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Control
  // ─────────────────────────────────────────────────────────────────────────────

  forceOpen(): void {
    this.transitionTo('OPEN', 'Forced open');
  }

  reset(): void {
    this.state = 'CLOSED';
    this.openedAt = 0;
    this.successCount = 0;
    this.halfOpenInFlight = 0;
    this.failureWindow.clear();
    this.totalRequests = 0;
    this.successfulRequests = 0;
    this.failedRequests = 0;
    this.rejectedRequests = 0;
    this.lastFailureTime = undefined;
  }

  getMetrics(): CircuitMetrics {
    return {
      name: this.name,
      state: this.getState(),
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      rejectedRequests: this.rejectedRequests,
      currentFailures: this.failureWindow.count(),
      lastFailureTime: this.lastFailureTime,
    };
  }
}

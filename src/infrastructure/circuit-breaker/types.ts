// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER TYPES — States, Configuration, Errors
// ═══════════════════════════════════════════════════════════════════════════════
//
// State machine: CLOSED → OPEN → HALF_OPEN → CLOSED
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// STATES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * CLOSED: calls pass through
 * OPEN: calls fail fast
 * HALF_OPEN: a limited number of trial calls decide whether to close again
 */
export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface CircuitBreakerConfig {
  readonly name: string;

  /** Failures inside the window before opening */
  readonly failureThreshold: number;

  /** Consecutive HALF_OPEN successes before closing */
  readonly successThreshold: number;

  /** OPEN → HALF_OPEN delay */
  readonly resetTimeoutMs: number;

  readonly failureWindowMs: number;

  /** Concurrent trial calls allowed in HALF_OPEN */
  readonly halfOpenRequests: number;

  /** Per-call timeout (0 = none) */
  readonly requestTimeoutMs: number;

  /** Errors for which this returns false do not count against the circuit */
  readonly isFailure?: (error: unknown) => boolean;

  readonly onStateChange?: (event: StateChangeEvent) => void;
}

export const DEFAULT_CIRCUIT_CONFIG: Omit<CircuitBreakerConfig, 'name'> = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeoutMs: 30000,
  failureWindowMs: 60000,
  halfOpenRequests: 1,
  requestTimeoutMs: 0,
};

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS & METRICS
// ─────────────────────────────────────────────────────────────────────────────────

export interface StateChangeEvent {
  readonly name: string;
  readonly from: CircuitState;
  readonly to: CircuitState;
  readonly timestamp: number;
  readonly reason: string;
}

export interface CircuitMetrics {
  readonly name: string;
  readonly state: CircuitState;
  readonly totalRequests: number;
  readonly successfulRequests: number;
  readonly failedRequests: number;
  readonly rejectedRequests: number;
  readonly currentFailures: number;
  readonly lastFailureTime?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export class CircuitOpenError extends Error {
  readonly name = 'CircuitOpenError';
  readonly circuitName: string;
  readonly retryAfterMs: number;

  constructor(circuitName: string, retryAfterMs: number) {
    super(`Circuit breaker '${circuitName}' is open. Retry after ${retryAfterMs}ms`);
    this.circuitName = circuitName;
    this.retryAfterMs = retryAfterMs;
  }
}

export class CircuitTimeoutError extends Error {
  readonly name = 'CircuitTimeoutError';
  readonly circuitName: string;
  readonly timeoutMs: number;

  constructor(circuitName: string, timeoutMs: number) {
    super(`Circuit breaker '${circuitName}' request timed out after ${timeoutMs}ms`);
    this.circuitName = circuitName;
    this.timeoutMs = timeoutMs;
  }
}

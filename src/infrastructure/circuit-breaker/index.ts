// ═══════════════════════════════════════════════════════════════════════════════
// CIRCUIT BREAKER MODULE INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type CircuitState,
  type CircuitBreakerConfig,
  type StateChangeEvent,
  type CircuitMetrics,
  DEFAULT_CIRCUIT_CONFIG,
  CircuitOpenError,
  CircuitTimeoutError,
} from './types.js';

export { CircuitBreaker, SlidingWindow } from './breaker.js';

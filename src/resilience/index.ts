/**
 * Resilience
 *
 * Retry logic and circuit breaking around session calls.
 */

export { RetryExecutor } from './retry.js';
export { CircuitBreaker, CircuitState } from './circuit-breaker.js';

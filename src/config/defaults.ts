/**
 * Default configuration values for the engine.
 * @module config/defaults
 */

import type { RetryConfig, CircuitBreakerConfig, EngineConfig } from './config.js';

/**
 * Default AWS region.
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Endpoint used when DYNAMODB_LOCAL is set.
 */
export const DEFAULT_LOCAL_ENDPOINT = 'http://localhost:8000';

/**
 * Creates default retry configuration.
 *
 * @returns Default retry configuration with:
 * - maxAttempts: 10
 * - baseDelayMs: 50 (exponential backoff starting point)
 * - maxDelayMs: 20000 (20 seconds maximum delay)
 * - jitterFactor: 0.5 (add up to 50% jitter)
 */
export function createDefaultRetryConfig(): RetryConfig {
  return {
    maxAttempts: 10,
    baseDelayMs: 50,
    maxDelayMs: 20000,
    jitterFactor: 0.5,
  };
}

/**
 * Creates default circuit breaker configuration.
 *
 * @returns Default circuit breaker configuration with:
 * - failureThreshold: 5 (open circuit after 5 failures)
 * - successThreshold: 2 (close circuit after 2 successes)
 * - openDurationMs: 30000 (keep circuit open for 30 seconds)
 */
export function createDefaultCircuitBreakerConfig(): CircuitBreakerConfig {
  return {
    failureThreshold: 5,
    successThreshold: 2,
    openDurationMs: 30000,
  };
}

/**
 * Configuration with every optional field filled in, except credentials and endpoint.
 */
export type ResolvedEngineConfig = Required<Omit<EngineConfig, 'credentials' | 'endpoint'>> &
  Pick<EngineConfig, 'credentials' | 'endpoint'>;

/**
 * Fills in defaults for every field the caller left out.
 */
export function resolveConfig(config: EngineConfig = {}): ResolvedEngineConfig {
  return {
    region: config.region ?? DEFAULT_REGION,
    endpoint: config.endpoint,
    credentials: config.credentials,
    retryConfig: config.retryConfig ?? createDefaultRetryConfig(),
    circuitBreakerConfig: config.circuitBreakerConfig ?? createDefaultCircuitBreakerConfig(),
    tablePrefix: config.tablePrefix ?? '',
    consistent: config.consistent ?? false,
    atomic: config.atomic ?? false,
    logLevel: config.logLevel ?? 'info',
  };
}

/**
 * Configuration validation for the engine.
 * @module config/validation
 */

import type { EngineConfig, CredentialsConfig, RetryConfig, CircuitBreakerConfig } from './config.js';
import { isStaticCredentials, isProfileCredentials } from './config.js';
import { ConfigurationError } from '../error/categories.js';
import { isLogLevel } from '../observability/logging.js';

/**
 * Validates engine configuration.
 *
 * @param config - Configuration to validate
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: EngineConfig): void {
  if (config.region !== undefined) {
    validateRegion(config.region);
  }

  if (config.endpoint !== undefined) {
    validateEndpoint(config.endpoint);
  }

  if (config.credentials !== undefined) {
    validateCredentials(config.credentials);
  }

  if (config.retryConfig !== undefined) {
    validateRetryConfig(config.retryConfig);
  }

  if (config.circuitBreakerConfig !== undefined) {
    validateCircuitBreakerConfig(config.circuitBreakerConfig);
  }

  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    throw new ConfigurationError(`Unknown log level: ${String(config.logLevel)}`);
  }
}

/**
 * Validates AWS region format.
 */
function validateRegion(region: string): void {
  if (region.trim().length === 0) {
    throw new ConfigurationError('Region must be a non-empty string');
  }

  // Basic validation for AWS region format (e.g., us-east-1, eu-west-2)
  const regionPattern = /^[a-z]{2}(-gov)?-[a-z]+-\d+$/;
  if (!regionPattern.test(region)) {
    throw new ConfigurationError(
      `Invalid region format: ${region}. Expected format like 'us-east-1' or 'eu-west-2'`
    );
  }
}

/**
 * Validates endpoint URL.
 */
function validateEndpoint(endpoint: string): void {
  if (endpoint.trim().length === 0) {
    throw new ConfigurationError('Endpoint must be a non-empty string');
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new ConfigurationError(`Invalid endpoint URL: ${endpoint}`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError('Endpoint URL must use http: or https: protocol');
  }
}

/**
 * Validates credentials configuration.
 */
function validateCredentials(credentials: CredentialsConfig): void {
  if (isStaticCredentials(credentials)) {
    if (credentials.accessKeyId.trim().length === 0) {
      throw new ConfigurationError('Static credentials require non-empty accessKeyId');
    }
    if (credentials.secretAccessKey.trim().length === 0) {
      throw new ConfigurationError('Static credentials require non-empty secretAccessKey');
    }
  } else if (isProfileCredentials(credentials)) {
    if (credentials.profileName.trim().length === 0) {
      throw new ConfigurationError('Profile credentials require non-empty profileName');
    }
  }
  // Environment credentials don't need validation
}

/**
 * Validates retry configuration.
 */
function validateRetryConfig(config: RetryConfig): void {
  if (config.maxAttempts <= 0) {
    throw new ConfigurationError('Retry maxAttempts must be positive');
  }
  if (config.maxAttempts > 100) {
    throw new ConfigurationError('Retry maxAttempts must not exceed 100');
  }
  if (config.baseDelayMs <= 0) {
    throw new ConfigurationError('Retry baseDelayMs must be positive');
  }
  if (config.maxDelayMs <= 0) {
    throw new ConfigurationError('Retry maxDelayMs must be positive');
  }
  if (config.baseDelayMs > config.maxDelayMs) {
    throw new ConfigurationError('Retry baseDelayMs must not exceed maxDelayMs');
  }
  if (config.jitterFactor !== undefined && (config.jitterFactor < 0 || config.jitterFactor > 1)) {
    throw new ConfigurationError('Retry jitterFactor must be between 0 and 1');
  }
}

/**
 * Validates circuit breaker configuration.
 */
function validateCircuitBreakerConfig(config: CircuitBreakerConfig): void {
  if (config.failureThreshold <= 0) {
    throw new ConfigurationError('Circuit breaker failureThreshold must be positive');
  }
  if (config.successThreshold <= 0) {
    throw new ConfigurationError('Circuit breaker successThreshold must be positive');
  }
  if (config.openDurationMs <= 0) {
    throw new ConfigurationError('Circuit breaker openDurationMs must be positive');
  }
  if (config.openDurationMs > 3600000) {
    // Max 1 hour
    throw new ConfigurationError('Circuit breaker openDurationMs must not exceed 3600000 (1 hour)');
  }
}

/**
 * Type guard to check if an error is a ConfigurationError.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

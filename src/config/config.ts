/**
 * Configuration types and interfaces for the engine.
 * @module config
 */

import type { LogLevel } from '../observability/logging.js';

/**
 * Credentials configuration with support for multiple authentication methods.
 */
export type CredentialsConfig =
  | { type: 'static'; accessKeyId: string; secretAccessKey: string; sessionToken?: string }
  | { type: 'profile'; profileName: string }
  | { type: 'environment' };

/**
 * Retry configuration for failed requests.
 */
export interface RetryConfig {
  /** Maximum number of attempts, including the first. */
  maxAttempts: number;
  /** Base delay in milliseconds before first retry. */
  baseDelayMs: number;
  /** Maximum delay in milliseconds between retries. */
  maxDelayMs: number;
  /** Jitter factor (0-1) to add randomness to delays. */
  jitterFactor?: number;
}

/**
 * Circuit breaker configuration for fault tolerance.
 */
export interface CircuitBreakerConfig {
  /** Number of failures before opening the circuit. */
  failureThreshold: number;
  /** Number of successes to close the circuit. */
  successThreshold: number;
  /** Duration in milliseconds to keep the circuit open. */
  openDurationMs: number;
}

/**
 * Main configuration interface for the engine.
 */
export interface EngineConfig {
  /**
   * AWS region where the tables live.
   * @example 'us-east-1', 'eu-west-1'
   */
  region?: string;

  /**
   * Custom endpoint URL (useful for local DynamoDB or testing).
   * @example 'http://localhost:8000' for DynamoDB Local
   */
  endpoint?: string;

  /**
   * Credentials configuration for authentication.
   * Falls back to the SDK's default provider chain when omitted.
   */
  credentials?: CredentialsConfig;

  /**
   * Retry configuration for handling transient failures.
   */
  retryConfig?: RetryConfig;

  /**
   * Circuit breaker configuration for fault tolerance.
   */
  circuitBreakerConfig?: CircuitBreakerConfig;

  /**
   * Prepended to every model's table name.
   * @default ''
   */
  tablePrefix?: string;

  /**
   * Default for consistent reads on load, query and scan.
   * @default false
   */
  consistent?: boolean;

  /**
   * Default for optimistic concurrency on save and delete.
   * @default false
   */
  atomic?: boolean;

  /**
   * Minimum level for the default console logger.
   * @default 'info'
   */
  logLevel?: LogLevel;
}

/**
 * Helper to check if credentials are static.
 */
export function isStaticCredentials(
  credentials: CredentialsConfig
): credentials is Extract<CredentialsConfig, { type: 'static' }> {
  return credentials.type === 'static';
}

/**
 * Helper to check if credentials use a profile.
 */
export function isProfileCredentials(
  credentials: CredentialsConfig
): credentials is Extract<CredentialsConfig, { type: 'profile' }> {
  return credentials.type === 'profile';
}

/**
 * Fluent builder for creating EngineConfig objects.
 *
 * @example
 * ```typescript
 * const config = new EngineConfigBuilder()
 *   .withRegion('eu-west-1')
 *   .withTablePrefix('staging-')
 *   .withAtomic(true)
 *   .build();
 * ```
 */
export class EngineConfigBuilder {
  private config: EngineConfig = {};

  /**
   * Sets the AWS region.
   */
  withRegion(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Sets the custom endpoint URL.
   */
  withEndpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  /**
   * Sets static credentials.
   */
  withStaticCredentials(
    accessKeyId: string,
    secretAccessKey: string,
    sessionToken?: string
  ): this {
    this.config.credentials = {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken,
    };
    return this;
  }

  /**
   * Sets profile-based credentials.
   */
  withProfileCredentials(profileName: string): this {
    this.config.credentials = {
      type: 'profile',
      profileName,
    };
    return this;
  }

  /**
   * Sets environment-based credentials.
   */
  withEnvironmentCredentials(): this {
    this.config.credentials = { type: 'environment' };
    return this;
  }

  /**
   * Sets the retry configuration.
   */
  withRetryConfig(config: RetryConfig): this {
    this.config.retryConfig = config;
    return this;
  }

  /**
   * Sets the circuit breaker configuration.
   */
  withCircuitBreakerConfig(config: CircuitBreakerConfig): this {
    this.config.circuitBreakerConfig = config;
    return this;
  }

  withTablePrefix(prefix: string): this {
    this.config.tablePrefix = prefix;
    return this;
  }

  withConsistentReads(consistent: boolean): this {
    this.config.consistent = consistent;
    return this;
  }

  withAtomic(atomic: boolean): this {
    this.config.atomic = atomic;
    return this;
  }

  withLogLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds the configuration.
   */
  build(): EngineConfig {
    return { ...this.config };
  }

  /**
   * Creates a builder from an existing config.
   */
  static from(config: EngineConfig): EngineConfigBuilder {
    const builder = new EngineConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}

/**
 * Configuration
 *
 * Engine configuration, defaults, environment loading and validation.
 */

export type { EngineConfig, CredentialsConfig, RetryConfig, CircuitBreakerConfig } from './config.js';
export { EngineConfigBuilder, isStaticCredentials, isProfileCredentials } from './config.js';
export type { ResolvedEngineConfig } from './defaults.js';
export {
  DEFAULT_REGION,
  DEFAULT_LOCAL_ENDPOINT,
  createDefaultRetryConfig,
  createDefaultCircuitBreakerConfig,
  resolveConfig,
} from './defaults.js';
export { loadConfigFromEnv } from './environment.js';
export { validateConfig, isConfigurationError } from './validation.js';

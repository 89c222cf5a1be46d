/**
 * Environment variable loading for engine configuration.
 * @module config/environment
 */

import type { EngineConfig, CredentialsConfig } from './config.js';
import { DEFAULT_LOCAL_ENDPOINT, DEFAULT_REGION } from './defaults.js';
import { isLogLevel } from '../observability/logging.js';
import { ConfigurationError } from '../error/categories.js';

/**
 * Loads engine configuration from environment variables.
 *
 * Supported environment variables:
 * - AWS_REGION / AWS_DEFAULT_REGION: AWS region (e.g., 'us-east-1', 'eu-west-1')
 * - AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY / AWS_SESSION_TOKEN: static credentials
 * - AWS_PROFILE: AWS profile name for profile-based credentials
 * - DYNAMODB_ENDPOINT: Custom endpoint (e.g., 'http://localhost:8000')
 * - DYNAMODB_LOCAL: Set to 'true' to use the local DynamoDB endpoint
 * - DYNAMAP_TABLE_PREFIX: Prefix for every table name
 * - DYNAMAP_LOG_LEVEL: error | warn | info | debug | trace
 * - DYNAMAP_CONSISTENT: 'true' to default to consistent reads
 * - DYNAMAP_ATOMIC: 'true' to default to atomic saves and deletes
 *
 * @param env - Environment to read, `process.env` by default
 * @returns Engine configuration populated from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const config: EngineConfig = {};

  config.region = env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_REGION;
  config.credentials = loadCredentialsFromEnv(env);

  const endpoint = env.DYNAMODB_ENDPOINT;
  if (endpoint) {
    config.endpoint = endpoint;
  } else if (env.DYNAMODB_LOCAL === 'true') {
    config.endpoint = DEFAULT_LOCAL_ENDPOINT;
  }

  if (env.DYNAMAP_TABLE_PREFIX !== undefined) {
    config.tablePrefix = env.DYNAMAP_TABLE_PREFIX;
  }

  const logLevel = env.DYNAMAP_LOG_LEVEL;
  if (logLevel) {
    const normalized = logLevel.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigurationError(`Invalid DYNAMAP_LOG_LEVEL: ${logLevel}`);
    }
    config.logLevel = normalized;
  }

  if (env.DYNAMAP_CONSISTENT !== undefined) {
    config.consistent = parseBoolean(env.DYNAMAP_CONSISTENT);
  }
  if (env.DYNAMAP_ATOMIC !== undefined) {
    config.atomic = parseBoolean(env.DYNAMAP_ATOMIC);
  }

  return config;
}

/**
 * Loads credentials configuration from environment variables.
 *
 * Priority order:
 * 1. Static credentials (if AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are set)
 * 2. Profile (if AWS_PROFILE is set)
 * 3. Environment (default fallback for AWS SDK credential chain)
 */
function loadCredentialsFromEnv(env: NodeJS.ProcessEnv): CredentialsConfig {
  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

  if (accessKeyId && secretAccessKey) {
    return {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken: env.AWS_SESSION_TOKEN,
    };
  }

  const profile = env.AWS_PROFILE;
  if (profile) {
    return {
      type: 'profile',
      profileName: profile,
    };
  }

  return {
    type: 'environment',
  };
}

function parseBoolean(value: string): boolean {
  return value.toLowerCase() === 'true' || value === '1';
}

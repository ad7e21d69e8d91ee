/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access and provides clear error messages
 * for misconfiguration.
 */

import {
  logConfigSchema,
  clientConfigSchema,
  probeConfigSchema,
  resolutionConfigSchema,
  ConfigValidationError,
  type AppConfig,
  type LogConfig,
  type ClientConfig,
  type ProbeConfig,
  type ResolutionConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToClientConfig(env: Env) {
  return {
    localBaseUrl: env.PROFILE_API_LOCAL_URL,
    cloudBaseUrl: env.PROFILE_API_CLOUD_URL,
    apiToken: env.PROFILE_API_TOKEN,
    tokenHeader: env.PROFILE_API_TOKEN_HEADER,
    requestTimeoutMs: env.PROFILE_API_TIMEOUT_MS,
    maxRetries: env.PROFILE_API_MAX_RETRIES,
  };
}

function mapEnvToProbeConfig(env: Env) {
  return {
    host: env.CDP_PROBE_HOST,
    connectTimeoutMs: env.CDP_CONNECT_TIMEOUT_MS,
    httpTimeoutMs: env.CDP_HTTP_TIMEOUT_MS,
  };
}

function mapEnvToResolutionConfig(env: Env) {
  return {
    allowPortScan: env.PROFILE_ALLOW_PORT_SCAN,
    manualPort: env.PROFILE_DEBUG_PORT,
  };
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

/**
 * Parse and validate logging configuration from environment.
 */
export function parseLogConfig(env: Env = process.env): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Parse and validate control API client configuration from environment.
 */
export function parseClientConfig(env: Env = process.env): ClientConfig {
  const result = clientConfigSchema.safeParse(mapEnvToClientConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('client', result.error);
  }
  return result.data;
}

export function parseProbeConfig(env: Env = process.env): ProbeConfig {
  const result = probeConfigSchema.safeParse(mapEnvToProbeConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('probe', result.error);
  }
  return result.data;
}

export function parseResolutionConfig(env: Env = process.env): ResolutionConfig {
  const result = resolutionConfigSchema.safeParse(mapEnvToResolutionConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('resolution', result.error);
  }
  return result.data;
}

/**
 * Parse every section. The first invalid section throws.
 */
export function parseAppConfig(env: Env = process.env): AppConfig {
  return {
    log: parseLogConfig(env),
    client: parseClientConfig(env),
    probe: parseProbeConfig(env),
    resolution: parseResolutionConfig(env),
  };
}

// ============================================
// CONFIG CACHING
// ============================================

let cachedAppConfig: AppConfig | null = null;

/**
 * Get cached configuration (parses once on first call).
 */
export function getAppConfig(): AppConfig {
  if (!cachedAppConfig) {
    cachedAppConfig = parseAppConfig();
  }
  return cachedAppConfig;
}

/**
 * Clear cached configuration (for testing).
 */
export function clearConfigCache(): void {
  cachedAppConfig = null;
}

/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';
import { TIMEOUTS } from './timeouts.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options?: {
  min?: number;
  max?: number;
  default?: number;
}) {
  const { min, max } = options ?? {};
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  if (options?.default !== undefined) {
    return schema.default(options.default);
  }
  return schema;
}

/**
 * Schema for a valid http(s) URL string. A trailing slash is dropped so paths
 * can be appended directly.
 */
export const httpUrlSchema = z
  .string()
  .url()
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    { message: 'Must be an http:// or https:// URL' }
  )
  .transform((url) => url.replace(/\/+$/, ''));

/**
 * Treats empty strings from the environment as unset.
 */
function emptyAsUndefined(value: unknown): unknown {
  return value === '' ? undefined : value;
}

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// CONTROL API CLIENT CONFIGURATION
// ============================================

export const DEFAULT_LOCAL_BASE_URL = 'http://127.0.0.1:58888';
export const DEFAULT_CLOUD_BASE_URL = 'https://app.octobrowser.net';
export const DEFAULT_TOKEN_HEADER = 'X-Octo-Api-Token';

export const clientConfigSchema = z.object({
  localBaseUrl: httpUrlSchema.default(DEFAULT_LOCAL_BASE_URL),
  cloudBaseUrl: httpUrlSchema.default(DEFAULT_CLOUD_BASE_URL),
  apiToken: z.preprocess(emptyAsUndefined, z.string().optional()),
  tokenHeader: z.string().min(1).default(DEFAULT_TOKEN_HEADER),
  requestTimeoutMs: integerStringSchema({ min: 100, max: 600000, default: TIMEOUTS.REQUEST }),
  maxRetries: integerStringSchema({ min: 0, max: 10, default: 3 }),
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;

// ============================================
// CDP PROBE CONFIGURATION
// ============================================

export const probeConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  connectTimeoutMs: integerStringSchema({ min: 50, max: 60000, default: TIMEOUTS.PROBE_CONNECT }),
  httpTimeoutMs: integerStringSchema({ min: 100, max: 60000, default: TIMEOUTS.PROBE_HTTP }),
});

export type ProbeConfig = z.infer<typeof probeConfigSchema>;

// ============================================
// ENDPOINT RESOLUTION CONFIGURATION
// ============================================

export const resolutionConfigSchema = z.object({
  allowPortScan: booleanStringSchema,
  manualPort: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(1).max(65535).optional()
  ),
});

export type ResolutionConfig = z.infer<typeof resolutionConfigSchema>;

// ============================================
// COMPLETE CONFIGURATION
// ============================================

export const appConfigSchema = z.object({
  log: logConfigSchema,
  client: clientConfigSchema,
  probe: probeConfigSchema,
  resolution: resolutionConfigSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}

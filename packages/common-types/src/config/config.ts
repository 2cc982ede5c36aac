import { z } from 'zod';
import {
  MEMORY_STORE_DEFAULTS,
  REACHABILITY,
  SERVICE_DEFAULTS,
  TIMEOUTS,
  WPCOM_API,
} from '../constants/index.js';

/** Type for optional string schema that accepts undefined or transforms empty string to undefined */
type OptionalStringSchema = z.ZodType<string | undefined, z.ZodTypeDef, unknown>;

/**
 * Helper for optional string fields that must be non-empty if provided
 * Rejects empty strings, but allows undefined
 */
const optionalNonEmptyString = (): OptionalStringSchema =>
  z
    .string()
    .min(1)
    .optional()
    .or(z.literal('').transform(() => undefined));

/**
 * Helper for optional URLs; an empty string counts as unset
 */
const optionalUrl = (): OptionalStringSchema =>
  z
    .string()
    .url()
    .optional()
    .or(z.literal('').transform(() => undefined));

/**
 * Helper for positive integer settings read from the environment
 */
const positiveInt = (fallback: number): z.ZodType<number, z.ZodTypeDef, unknown> =>
  z
    .string()
    .regex(/^\d+$/, 'Must be a whole number')
    .transform(Number)
    .refine(val => val > 0, 'Must be greater than zero')
    .default(String(fallback));

/**
 * Environment variable validation schema
 * Validates all configuration at startup
 */
export const envSchema = z.object({
  // WordPress.com API
  WPCOM_API_BASE_URL: z.string().url().default(WPCOM_API.BASE_URL),
  WPCOM_API_TOKEN: optionalNonEmptyString(), // OAuth bearer token, omitted for public sites

  // Suggestion store
  SUGGESTION_STORE: z.enum(['redis', 'memory']).default('redis'),
  SUGGESTION_CACHE_MAX_SITES: positiveInt(MEMORY_STORE_DEFAULTS.MAX_SITES), // memory store only
  SUGGESTION_FETCH_TIMEOUT_MS: positiveInt(TIMEOUTS.SUGGESTION_FETCH),

  // Reachability
  REACHABILITY_FAILURE_THRESHOLD: positiveInt(REACHABILITY.FAILURE_THRESHOLD),
  REACHABILITY_RECOVERY_MS: positiveInt(REACHABILITY.RECOVERY_TIMEOUT),

  // Redis Configuration
  REDIS_URL: optionalUrl(), // Takes precedence over host/port when set
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: positiveInt(SERVICE_DEFAULTS.REDIS_PORT),
  REDIS_PASSWORD: optionalNonEmptyString(),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates and returns environment configuration
 * Throws detailed error if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');

  throw new Error(
    `Environment validation failed:\n${issues}\n\n` +
      'Please check your .env file and ensure all required variables are set.'
  );
}

/**
 * Cached config instance
 * Can be reset for testing via resetConfig()
 */
let _config: EnvConfig | undefined;

/**
 * Get validated environment configuration
 * Caches the result, but can be reset via resetConfig()
 */
export function getConfig(): EnvConfig {
  _config ??= validateEnv();
  return _config;
}

/**
 * Reset the cached config (primarily for testing)
 *
 * IMPORTANT: Call this in afterEach() to prevent test pollution
 */
export function resetConfig(): void {
  _config = undefined;
}

/**
 * Create config with custom values (for testing)
 * Uses safe test defaults instead of reading from process.env
 */
export function createTestConfig(overrides: Partial<EnvConfig> = {}): EnvConfig {
  const testDefaults: EnvConfig = {
    // WordPress.com API
    WPCOM_API_BASE_URL: WPCOM_API.BASE_URL,
    WPCOM_API_TOKEN: undefined,

    // Suggestion store
    SUGGESTION_STORE: 'memory',
    SUGGESTION_CACHE_MAX_SITES: MEMORY_STORE_DEFAULTS.MAX_SITES,
    SUGGESTION_FETCH_TIMEOUT_MS: TIMEOUTS.SUGGESTION_FETCH,

    // Reachability
    REACHABILITY_FAILURE_THRESHOLD: REACHABILITY.FAILURE_THRESHOLD,
    REACHABILITY_RECOVERY_MS: REACHABILITY.RECOVERY_TIMEOUT,

    // Redis
    REDIS_URL: undefined,
    REDIS_HOST: 'localhost',
    REDIS_PORT: SERVICE_DEFAULTS.REDIS_PORT,
    REDIS_PASSWORD: undefined,

    // Environment
    NODE_ENV: 'test',

    // Logging
    LOG_LEVEL: 'error', // Quiet logs in tests
  };

  return { ...testDefaults, ...overrides };
}

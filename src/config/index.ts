/**
 * Configuration Module
 *
 * Loads and validates environment variables for the prediction market
 * unifier. Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';
import type { LogLevel } from '../logging/logger.js';
import { DEFAULT_DATA_DIR } from '../storage/paths.js';

// ============================================================================
// Schema
// ============================================================================

/**
 * Treat empty strings as unset so `KEY=` in .env falls back to the default.
 */
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const envSchema = z.object({
  // API Keys (optional: local matching and sample mode run without them)
  OPENAI_API_KEY: z.string().optional(),

  // Models
  LLM_MODEL: optionalEnv(z.string().default('gpt-4o-mini')),
  EMBEDDING_MODEL: optionalEnv(z.string().default('text-embedding-3-small')),

  // Matching and collection
  MATCH_THRESHOLD: optionalEnv(z.coerce.number().finite().default(0.78)),
  FETCH_LIMIT: optionalEnv(z.coerce.number().int().positive().default(150)),
  FETCH_TIMEOUT_MS: optionalEnv(z.coerce.number().int().positive().default(30_000)),

  // Proxy for site fetches
  HTTPS_PROXY: optionalEnv(z.string().optional()),
  HTTP_PROXY: optionalEnv(z.string().optional()),

  // Data directory
  PM_DATA_DIR: optionalEnv(z.string().default(DEFAULT_DATA_DIR)),

  // Runtime options
  LOG_LEVEL: optionalEnv(z.enum(LOG_LEVELS).default('info')),
  NODE_ENV: optionalEnv(z.enum(['development', 'test', 'production']).default('development')),
});

// ============================================================================
// Types
// ============================================================================

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;

  apiKeys: {
    openai: string | undefined;
  };

  models: {
    llm: string;
    embedding: string;
  };

  /** Title similarity threshold; used as given, never clamped */
  matchThreshold: number;
  fetchLimit: number;
  fetchTimeoutMs: number;
  /** HTTPS_PROXY, else HTTP_PROXY */
  proxyUrl: string | undefined;
  dataDir: string;
  logLevel: LogLevel;
}

export type ApiKeyName = keyof AppConfig['apiKeys'];

/**
 * Raised when environment variables fail validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Build configuration from an environment map.
 *
 * @throws ConfigError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ MATCH_THRESHOLD: '0.85' });
 * config.matchThreshold; // 0.85
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid environment variables: ${issues.join('; ')}`, issues);
  }

  const parsed = parseResult.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    isProduction: parsed.NODE_ENV === 'production',
    isDevelopment: parsed.NODE_ENV === 'development',
    isTest: parsed.NODE_ENV === 'test',
    apiKeys: {
      openai: parsed.OPENAI_API_KEY,
    },
    models: {
      llm: parsed.LLM_MODEL,
      embedding: parsed.EMBEDDING_MODEL,
    },
    matchThreshold: parsed.MATCH_THRESHOLD,
    fetchLimit: parsed.FETCH_LIMIT,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    proxyUrl: parsed.HTTPS_PROXY ?? parsed.HTTP_PROXY,
    dataDir: parsed.PM_DATA_DIR,
    logLevel: parsed.LOG_LEVEL,
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Process configuration, loaded once from process.env.
 *
 * @throws ConfigError on invalid environment variables
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Forget the cached configuration (useful for testing).
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Check if a specific API is configured
 */
export function hasApiKey(api: ApiKeyName, config: AppConfig = getConfig()): boolean {
  return !!config.apiKeys[api];
}

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(api: ApiKeyName, config: AppConfig = getConfig()): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new Error(
      `Missing required API key: ${api.toUpperCase()}_API_KEY. ` +
        `Please set it in your .env file.`
    );
  }
  return key;
}

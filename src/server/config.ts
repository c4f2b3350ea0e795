/**
 * Server Configuration & Environment Validation
 *
 * Validates all environment variables on startup and provides
 * typed configuration access throughout the application.
 */

import { z } from 'zod';
import { logger } from './logger';

// =============================================================================
// Environment Schema
// =============================================================================

const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  BASE_URL: z.string().url().optional(),

  // Database (required in production)
  DATABASE_URL: z.string().url().optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  DB_POOL_MIN: z.coerce.number().int().nonnegative().default(2),
  DB_IDLE_TIMEOUT: z.coerce.number().int().positive().default(30000),
  DB_CONNECT_TIMEOUT: z.coerce.number().int().positive().default(5000),

  // Repository storage
  REPOS_DIR: z.string().default('./repos'),
  GIT_BIN: z.string().default('git'),

  // CORS
  CORS_ORIGINS: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

// =============================================================================
// Configuration Singleton
// =============================================================================

let config: EnvConfig | null = null;

/**
 * Validate and load environment configuration
 * Throws on validation failure
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  if (config) return config;

  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    logger.fatal('Invalid environment configuration', { errors });
    throw new Error(`Invalid environment configuration:\n  - ${errors.join('\n  - ')}`);
  }

  const loaded = result.data;

  if (loaded.NODE_ENV === 'production') {
    if (!loaded.DATABASE_URL) {
      throw new Error('Production configuration requirements not met: DATABASE_URL is required in production');
    }
    if (!loaded.CORS_ORIGINS) {
      logger.warn('CORS_ORIGINS not set - cross-origin requests will be rejected');
    }
  }

  config = loaded;
  return config;
}

/**
 * Get the current configuration, loading it on first use
 */
export function getConfig(): EnvConfig {
  return config ?? loadConfig();
}

/**
 * Forget the loaded configuration (for testing)
 */
export function resetConfig(): void {
  config = null;
}

// =============================================================================
// Configuration Helpers
// =============================================================================

/**
 * Get CORS origins as an array
 */
export function getCorsOrigins(): string[] {
  const origins = getConfig().CORS_ORIGINS;
  if (!origins) {
    return getConfig().NODE_ENV === 'production'
      ? []
      : ['http://localhost:5173', 'http://localhost:3000'];
  }
  return origins.split(',').map(o => o.trim()).filter(o => o.length > 0);
}

/**
 * Get database pool configuration
 */
export function getDbPoolConfig(): {
  connectionString: string | undefined;
  max: number;
  min: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
} {
  const cfg = getConfig();
  return {
    connectionString: cfg.DATABASE_URL,
    max: cfg.DB_POOL_MAX,
    min: cfg.DB_POOL_MIN,
    idleTimeoutMillis: cfg.DB_IDLE_TIMEOUT,
    connectionTimeoutMillis: cfg.DB_CONNECT_TIMEOUT,
  };
}

/**
 * Centralized environment variable configuration
 * Validates and provides typed access to all environment variables
 */

import { z } from 'zod';
import { KRAKEN_API, SYNC_DEFAULTS } from '../constants.js';

const intFromString = (fallback: number) =>
  z.string().regex(/^\d+$/, 'Expected a non-negative integer').transform(val => parseInt(val, 10)).default(String(fallback));

const PaginationSchema = z.enum(['offset', 'timestamp']);

const EnvironmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Logging configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
  LOG_DIR: z.string().optional(),

  // Kraken credentials
  KRAKEN_API_URL: z.string().url().default(KRAKEN_API.BASE_URL),
  KRAKEN_API_KEY: z.string().optional(),
  KRAKEN_API_SECRET: z.string().optional(),
  KRAKEN_API_EXPIRY: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Use YYYY-MM-DD').optional(),

  // Storage configuration
  DATABASE_URL: z.string().optional(),
  STORE_IN_DATABASE: z.string().transform(val => val.toLowerCase() === 'true').default('false'),
  OUTPUT_DIR: z.string().default('outputs'),

  // Sync tuning
  SYNC_PAGE_SIZE: intFromString(SYNC_DEFAULTS.PAGE_SIZE),
  SYNC_THROTTLE_MS: intFromString(SYNC_DEFAULTS.THROTTLE_MS),
  SYNC_MAX_ATTEMPTS: intFromString(SYNC_DEFAULTS.MAX_ATTEMPTS),
  SYNC_BACKOFF_BASE_MS: intFromString(SYNC_DEFAULTS.BACKOFF_BASE_MS),
  SYNC_REQUEST_TIMEOUT_MS: intFromString(SYNC_DEFAULTS.REQUEST_TIMEOUT_MS),
  TRADES_PAGINATION: PaginationSchema.default('offset'),
  REWARDS_PAGINATION: PaginationSchema.default('offset')
});

export type Environment = z.infer<typeof EnvironmentSchema>;

let cachedEnv: Environment | null = null;

/**
 * Parse an explicit environment source
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
  try {
    return EnvironmentSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

/**
 * Get validated environment configuration
 * Caches the result for performance
 */
export function getEnvironment(): Environment {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnvironment(process.env);
  return cachedEnv;
}

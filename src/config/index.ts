/**
 * Centralized application configuration
 * Built from the environment, optionally overlaid with a YAML file
 */

import { readFileSync } from 'fs';
import YAML from 'yaml';
import { z } from 'zod';
import { getEnvironment, type Environment } from './environment.js';
import type { PaginationStrategy } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import type { LogLevel } from '../utils/logger.js';

export interface SyncTuning {
  pageSize: number;
  throttleMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  tradesPagination: PaginationStrategy;
  rewardsPagination: PaginationStrategy;
}

export interface AppConfig {
  kraken: {
    apiUrl: string;
    apiKey?: string;
    apiSecret?: string;
    apiExpiry?: string;
    timeoutMs: number;
  };
  sync: SyncTuning;
  storage: {
    enabled: boolean;
    databaseUrl?: string;
    outputDir: string;
  };
  logging: {
    level: LogLevel;
    dir?: string;
  };
}

// Keys accepted in a YAML config file; all optional, environment fills the rest
const ConfigFileSchema = z.object({
  sync: z.object({
    page_size: z.number().int().positive().optional(),
    throttle_ms: z.number().int().nonnegative().optional(),
    max_attempts: z.number().int().positive().optional(),
    backoff_base_ms: z.number().int().nonnegative().optional(),
    trades_pagination: z.enum(['offset', 'timestamp']).optional(),
    rewards_pagination: z.enum(['offset', 'timestamp']).optional()
  }).strict().optional(),
  storage: z.object({
    enabled: z.boolean().optional(),
    output_dir: z.string().min(1).optional()
  }).strict().optional(),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    dir: z.string().optional()
  }).strict().optional()
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

let cachedConfig: AppConfig | null = null;

export function buildConfig(env: Environment, file: ConfigFile = {}): AppConfig {
  return {
    kraken: {
      apiUrl: env.KRAKEN_API_URL,
      apiKey: env.KRAKEN_API_KEY,
      apiSecret: env.KRAKEN_API_SECRET,
      apiExpiry: env.KRAKEN_API_EXPIRY,
      timeoutMs: env.SYNC_REQUEST_TIMEOUT_MS
    },
    sync: {
      pageSize: file.sync?.page_size ?? env.SYNC_PAGE_SIZE,
      throttleMs: file.sync?.throttle_ms ?? env.SYNC_THROTTLE_MS,
      maxAttempts: file.sync?.max_attempts ?? env.SYNC_MAX_ATTEMPTS,
      backoffBaseMs: file.sync?.backoff_base_ms ?? env.SYNC_BACKOFF_BASE_MS,
      tradesPagination: file.sync?.trades_pagination ?? env.TRADES_PAGINATION,
      rewardsPagination: file.sync?.rewards_pagination ?? env.REWARDS_PAGINATION
    },
    storage: {
      enabled: file.storage?.enabled ?? env.STORE_IN_DATABASE,
      databaseUrl: env.DATABASE_URL,
      outputDir: file.storage?.output_dir ?? env.OUTPUT_DIR
    },
    logging: {
      level: file.logging?.level ?? env.LOG_LEVEL,
      dir: file.logging?.dir ?? env.LOG_DIR
    }
  };
}

export function parseConfigFile(text: string): ConfigFile {
  const raw: unknown = YAML.parse(text) ?? {};
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Config file validation failed:\n${issues.join('\n')}`);
  }
  return parsed.data;
}

/**
 * Load configuration, overlaying a YAML file when a path is given
 */
export function loadConfig(path?: string): AppConfig {
  if (!path) {
    return getConfig();
  }
  return buildConfig(getEnvironment(), parseConfigFile(readFileSync(path, 'utf8')));
}

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = buildConfig(getEnvironment());
  return cachedConfig;
}

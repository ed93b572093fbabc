/**
 * Application constants
 */

import { DataType } from './types/index.js';

// Kraken REST API
export const KRAKEN_API = {
  BASE_URL: 'https://api.kraken.com',
  TRADES_HISTORY: '/0/private/TradesHistory',
  LEDGERS: '/0/private/Ledgers'
} as const;

// Pagination and rate limiting
export const SYNC_DEFAULTS = {
  PAGE_SIZE: 50,
  THROTTLE_MS: 2500,
  MAX_ATTEMPTS: 5,
  BACKOFF_BASE_MS: 2000,
  REQUEST_TIMEOUT_MS: 30000
} as const;

export const RATE_LIMIT_MARKER = 'rate limit exceeded';

// Database constants
export const DB_CONFIG = {
  CONNECTION_TIMEOUT: 5000,
  IDLE_TIMEOUT: 30000,
  MAX_CONNECTIONS: 5,
  INSERT_CHUNK_SIZE: 500
} as const;

// Storage dispatch: one table per record type
export const RECORD_TABLES: Record<DataType, string> = {
  [DataType.Trades]: 'sync_trades',
  [DataType.Rewards]: 'sync_rewards'
};

export const METADATA_TABLE = 'sync_metadata';

// Days before API key expiry at which a warning is logged
export const API_KEY_EXPIRY_WARNING_DAYS = 14;

// Kraken asset codes that differ from their common ticker
export const BASE_TRANSFORM_MAP: Record<string, string> = {
  XXDG: 'DOGE',
  XETC: 'ETC',
  XETH: 'ETH',
  XLTC: 'LTC',
  XMLN: 'MLN',
  XREP: 'REP',
  XXBT: 'BTC',
  XXLM: 'XLM',
  XXMR: 'XMR',
  XXRP: 'XRP',
  XZEC: 'ZEC'
};

export const WSNAME_TRANSFORM_MAP: Record<string, string> = {
  'XDG/USD': 'DOGE/USD',
  'XBT/USD': 'BTC/USD'
};

// Error messages
export const ERROR_MESSAGES = {
  MISSING_CREDENTIALS: 'Kraken API credentials are missing. Set KRAKEN_API_KEY and KRAKEN_API_SECRET.',
  MISSING_DATABASE_URL: 'DATABASE_URL is required when database storage is enabled',
  STORE_UNREACHABLE: 'Persistent store is unreachable',
  INVALID_EXPIRY: 'Invalid KRAKEN_API_EXPIRY date. Use YYYY-MM-DD.'
} as const;

/**
 * API key lifetime check, run once at job start
 */

import { API_KEY_EXPIRY_WARNING_DAYS, ERROR_MESSAGES } from '../constants.js';
import { ConfigurationError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export type ExpiryStatus = 'unset' | 'valid' | 'expiring' | 'expired';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * `expiry` is a YYYY-MM-DD date; the key is treated as expired from the start of that day (UTC)
 */
export function checkApiKeyExpiry(expiry: string | undefined, now: Date, logger: Logger): ExpiryStatus {
  if (!expiry) {
    logger.warn('config', 'api_key_expiry_unset');
    return 'unset';
  }

  const expiresAt = Date.parse(`${expiry}T00:00:00Z`);
  if (Number.isNaN(expiresAt)) {
    throw new ConfigurationError(ERROR_MESSAGES.INVALID_EXPIRY);
  }

  const daysLeft = Math.floor((expiresAt - now.getTime()) / DAY_MS);
  if (expiresAt <= now.getTime()) {
    logger.error('config', 'api_key_expired', { details: { expiry } });
    return 'expired';
  }
  if (daysLeft < API_KEY_EXPIRY_WARNING_DAYS) {
    logger.warn('config', 'api_key_expiring', { details: { expiry, days_left: daysLeft } });
    return 'expiring';
  }

  logger.info('config', 'api_key_expiry', { details: { expiry, days_left: daysLeft } });
  return 'valid';
}

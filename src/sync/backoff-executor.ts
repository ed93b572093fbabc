/**
 * Backoff Request Executor
 *
 * Issues one signed call and retries it while the API reports rate limiting,
 * doubling the delay each time (2s, 4s, 8s, 16s, 32s with the defaults).
 * Any other API error is handed back to the caller untouched. Exhausted
 * retries, transport failures and malformed bodies all come back as `null`,
 * which the caller treats as end of data.
 */

import type { SignedRequestSender } from '../api/kraken-client.js';
import { RATE_LIMIT_MARKER, SYNC_DEFAULTS } from '../constants.js';
import type { HttpMethod, KrakenResponse, RequestPayload } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ValidationUtils } from '../utils/validation.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface BackoffConfig {
  maxAttempts: number;
  baseDelayMs: number;
  rateLimitMarker: string;
}

export interface BackoffExecutorOptions extends Partial<BackoffConfig> {
  logger?: Logger;
  sleep?: Sleep;
}

export class BackoffRequestExecutor {
  private readonly config: BackoffConfig;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(private readonly sender: SignedRequestSender, options: BackoffExecutorOptions = {}) {
    this.config = {
      maxAttempts: options.maxAttempts ?? SYNC_DEFAULTS.MAX_ATTEMPTS,
      baseDelayMs: options.baseDelayMs ?? SYNC_DEFAULTS.BACKOFF_BASE_MS,
      rateLimitMarker: options.rateLimitMarker ?? RATE_LIMIT_MARKER
    };
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? sleep;
  }

  async execute(method: HttpMethod, endpoint: string, payload: RequestPayload): Promise<KrakenResponse | null> {
    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      let response: KrakenResponse;
      try {
        response = await this.sender.send(method, endpoint, payload);
      } catch (error) {
        this.logger.error('backoff_executor', 'request_failed', {
          details: { endpoint, attempt, error: errorMessage(error) }
        });
        return null;
      }

      if (!ValidationUtils.isRateLimited(response.error, this.config.rateLimitMarker)) {
        return response;
      }

      const delayMs = this.delayFor(attempt);
      this.logger.warn('backoff_executor', 'rate_limited', {
        details: { endpoint, attempt, max_attempts: this.config.maxAttempts, delay_ms: delayMs }
      });
      await this.sleep(delayMs);
    }

    this.logger.error('backoff_executor', 'retries_exhausted', {
      details: { endpoint, max_attempts: this.config.maxAttempts }
    });
    return null;
  }

  /**
   * Delay after the given (1-based) rate-limited attempt
   */
  delayFor(attempt: number): number {
    return this.config.baseDelayMs * 2 ** (attempt - 1);
  }
}

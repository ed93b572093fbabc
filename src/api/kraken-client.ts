/**
 * Kraken REST client
 *
 * Signs and sends one private request. No retries here: rate limiting and
 * pagination are handled by the sync engine on top of this transport.
 *
 * SECURITY: the API key, secret and signature are never logged.
 */

import axios, { type AxiosInstance } from 'axios';
import { ERROR_MESSAGES, KRAKEN_API, SYNC_DEFAULTS } from '../constants.js';
import { NonceSource, signKrakenRequest } from '../libs/crypto.js';
import type { HttpMethod, KrakenResponse, RequestPayload } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ValidationUtils } from '../utils/validation.js';

/**
 * Capability the engine relies on: sign a request and return the decoded body
 */
export interface SignedRequestSender {
  send(method: HttpMethod, endpoint: string, payload: RequestPayload): Promise<KrakenResponse>;
}

export interface KrakenClientOptions {
  apiKey?: string;
  apiSecret?: string;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
  http?: AxiosInstance;
  nonces?: NonceSource;
}

export class KrakenClient implements SignedRequestSender {
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly http: AxiosInstance;
  private readonly nonces: NonceSource;
  private readonly logger: Logger;

  constructor(options: KrakenClientOptions) {
    if (!options.apiKey || !options.apiSecret) {
      throw new ConfigurationError(ERROR_MESSAGES.MISSING_CREDENTIALS);
    }

    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.logger = options.logger ?? silentLogger;
    this.nonces = options.nonces ?? new NonceSource();
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl ?? KRAKEN_API.BASE_URL,
      timeout: options.timeoutMs ?? SYNC_DEFAULTS.REQUEST_TIMEOUT_MS
    });

    this.logger.debug('kraken_client', 'credentials_loaded');
  }

  /**
   * Send a signed request. Throws on transport failures and non-2xx statuses;
   * API-level errors come back in the `error` list of the response.
   */
  async send(method: HttpMethod, endpoint: string, payload: RequestPayload): Promise<KrakenResponse> {
    const nonce = this.nonces.next();
    const body = new URLSearchParams({ nonce });
    for (const [key, value] of Object.entries(payload)) {
      body.append(key, String(value));
    }
    const postData = body.toString();

    this.logger.debug('kraken_client', 'request_sent', {
      details: { method, endpoint, params: Object.keys(payload).join(',') }
    });

    const response = await this.http.request<unknown>({
      method,
      url: endpoint,
      data: method === 'POST' ? postData : undefined,
      params: method === 'GET' ? payload : undefined,
      headers: {
        'API-Key': this.apiKey,
        'API-Sign': signKrakenRequest(endpoint, nonce, postData, this.apiSecret),
        'Content-Type': 'application/x-www-form-urlencoded'
      }
    });

    const envelope = ValidationUtils.parseEnvelope(response.data);
    if (!envelope) {
      throw new Error(`Malformed response from ${endpoint}`);
    }

    if (envelope.error.length > 0) {
      this.logger.warn('kraken_client', 'api_error', {
        details: { endpoint, errors: envelope.error.join('; ') }
      });
    } else {
      this.logger.debug('kraken_client', 'response_received', { details: { endpoint } });
    }

    return envelope;
  }
}

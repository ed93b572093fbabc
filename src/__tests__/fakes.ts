import { vi } from 'vitest';
import type { SignedRequestSender } from '../api/kraken-client.js';
import type { HttpMethod, KrakenResponse, RequestPayload } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export interface SentRequest {
  method: HttpMethod;
  endpoint: string;
  payload: RequestPayload;
}

/**
 * Replays canned Kraken responses in order and records what was asked for
 */
export class ScriptedSender implements SignedRequestSender {
  readonly requests: SentRequest[] = [];
  private readonly script: KrakenResponse[];

  constructor(...script: KrakenResponse[]) {
    this.script = script;
  }

  async send(method: HttpMethod, endpoint: string, payload: RequestPayload): Promise<KrakenResponse> {
    this.requests.push({ method, endpoint, payload });
    const next = this.script.shift();
    if (!next) {
      throw new Error(`No scripted response left for ${endpoint}`);
    }
    return next;
  }
}

export function createMockLogger() {
  return {
    error: vi.fn<Logger['error']>(),
    warn: vi.fn<Logger['warn']>(),
    info: vi.fn<Logger['info']>(),
    debug: vi.fn<Logger['debug']>()
  };
}

export const BASE_TIME = 1700000000;

/**
 * Trades page with ids `TX<n>` in the order given; trade n happened at BASE_TIME + n
 */
export function tradesPage(numbers: number[], count?: number): KrakenResponse {
  const trades: Record<string, Record<string, unknown>> = {};
  for (const n of numbers) {
    trades[`TX${n}`] = {
      ordertxid: `O${n}`,
      pair: 'XXBTZUSD',
      time: BASE_TIME + n + 0.25,
      type: 'buy',
      price: '30000.0',
      vol: '0.01'
    };
  }
  return { error: [], result: count === undefined ? { trades } : { trades, count } };
}

/**
 * Staking ledger page with ids `L<n>`; entry n happened at BASE_TIME + n
 */
export function ledgerPage(numbers: number[], count?: number): KrakenResponse {
  const ledger: Record<string, Record<string, unknown>> = {};
  for (const n of numbers) {
    ledger[`L${n}`] = {
      refid: `REF${n}`,
      time: BASE_TIME + n,
      type: 'staking',
      asset: 'DOT.S',
      amount: '0.1'
    };
  }
  return { error: [], result: count === undefined ? { ledger } : { ledger, count } };
}

/**
 * Descending run of integers, newest first as the API pages them
 */
export function descending(from: number, to: number): number[] {
  const numbers: number[] = [];
  for (let n = from; n >= to; n--) numbers.push(n);
  return numbers;
}

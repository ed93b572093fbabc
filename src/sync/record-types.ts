/**
 * Per-record-type wiring: which endpoint to page through, which fixed
 * parameters to send, how to read a page and where the resume id lives.
 */

import { KRAKEN_API } from '../constants.js';
import {
  DataType,
  type BaseRecord,
  type HttpMethod,
  type RecordBatch,
  type RequestPayload,
  type RewardEntry,
  type TradeRecord
} from '../types/index.js';
import { ValidationUtils, type ParsedResult } from '../utils/validation.js';
import type { WatermarkIdField } from './watermark.js';

export interface RecordTypeDefinition<T extends BaseRecord> {
  dataType: DataType;
  method: HttpMethod;
  endpoint: string;
  basePayload: RequestPayload;
  idField: WatermarkIdField;
  parseResult(result: unknown): RecordBatch<T> | null;
}

function toBatch<T extends BaseRecord>(parsed: ParsedResult<T> | null): RecordBatch<T> | null {
  return parsed === null ? null : { records: parsed.records, totalCount: parsed.count };
}

export const TRADE_HISTORY: RecordTypeDefinition<TradeRecord> = {
  dataType: DataType.Trades,
  method: 'POST',
  endpoint: KRAKEN_API.TRADES_HISTORY,
  basePayload: {},
  idField: 'last_trade_id',
  parseResult: result => toBatch(ValidationUtils.parseTradesResult(result))
};

export const STAKING_REWARDS: RecordTypeDefinition<RewardEntry> = {
  dataType: DataType.Rewards,
  method: 'POST',
  endpoint: KRAKEN_API.LEDGERS,
  basePayload: { asset: 'all', type: 'staking' },
  idField: 'last_reward_id',
  parseResult: result => toBatch(ValidationUtils.parseLedgerResult(result))
};

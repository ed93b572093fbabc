/**
 * Shared TypeScript type definitions
 */

// Record types
export enum DataType {
  Trades = 'trades',
  Rewards = 'rewards'
}

export type HttpMethod = 'GET' | 'POST';

export type RequestPayload = Record<string, string | number>;

/**
 * Fields common to every upstream record. `time` normally arrives as a number
 * or a floating-point string, but is kept as received: a record with a missing
 * or unusable time is still a record.
 */
export interface BaseRecord {
  time?: unknown;
  [field: string]: unknown;
}

/**
 * Only the fields the engine reads are typed; price, vol, cost, fee and the
 * rest stay available through the index signature.
 */
export interface TradeRecord extends BaseRecord {
  pair?: string;
  ordertxid?: string;
}

export interface EnrichedTradeRecord extends TradeRecord {
  base?: string;
  wsname?: string;
}

export interface RewardEntry extends BaseRecord {
  asset?: string;
  refid?: string;
}

// API types
export interface KrakenResponse {
  error: string[];
  result?: unknown;
}

/**
 * One page of records in API order (newest first), with the total the
 * API reported for the query, when it reports one.
 */
export interface RecordBatch<T extends BaseRecord> {
  records: Array<[id: string, record: T]>;
  totalCount: number | null;
}

// Persistence types
export interface Watermark {
  data_type: DataType;
  timestamp: number;
  record_timestamp_start: number | null;
  record_timestamp_end: number | null;
  last_trade_id?: string;
  last_reward_id?: string;
}

export interface StoredRecord<T extends BaseRecord = BaseRecord> {
  id: string;
  record: T;
}

export type PaginationStrategy = 'offset' | 'timestamp';

export type StopReason =
  | 'malformed_response'
  | 'empty_batch'
  | 'watermark_reached'
  | 'no_new_records'
  | 'offset_exhausted'
  | 'final_batch'
  | 'aborted';

export interface SyncResult<T extends BaseRecord> {
  dataType: DataType;
  records: Map<string, T>;
  metadata: Watermark | null;
  stopReason: StopReason;
  batches: number;
}

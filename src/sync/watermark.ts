/**
 * Watermark derivation
 *
 * The timestamp range covers every accumulated record with a usable `time`;
 * records without one stay in the result but do not move the range.
 */

import type { BaseRecord, DataType, Watermark } from '../types/index.js';

/**
 * Truncate a Kraken timestamp (number, or float as string) to whole seconds.
 * Returns null for anything that is not a finite number.
 */
export function normalizeTimestamp(value: unknown): number | null {
  let numeric: number;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    numeric = Number(value);
  } else {
    return null;
  }
  return Number.isFinite(numeric) ? Math.trunc(numeric) : null;
}

export type TimestampRange = [start: number | null, end: number | null];

export function deriveTimestampRange(records: Iterable<BaseRecord>): TimestampRange {
  let start: number | null = null;
  let end: number | null = null;

  for (const record of records) {
    const time = normalizeTimestamp(record.time);
    if (time === null) {
      continue;
    }
    if (start === null || time < start) start = time;
    if (end === null || time > end) end = time;
  }

  return [start, end];
}

export type WatermarkIdField = 'last_trade_id' | 'last_reward_id';

export interface WatermarkInput {
  dataType: DataType;
  records: Iterable<BaseRecord>;
  /** Id of the newest record seen in this run */
  lastRecordId: string | null;
  idField: WatermarkIdField;
  /** Run time, in Unix seconds */
  retrievedAt: number;
}

export function deriveWatermark(input: WatermarkInput): Watermark {
  const [start, end] = deriveTimestampRange(input.records);
  const watermark: Watermark = {
    data_type: input.dataType,
    timestamp: input.retrievedAt,
    record_timestamp_start: start,
    record_timestamp_end: end
  };
  if (input.lastRecordId !== null) {
    watermark[input.idField] = input.lastRecordId;
  }
  return watermark;
}

export function watermarkId(watermark: Watermark | null, idField: WatermarkIdField): string | null {
  return watermark?.[idField] ?? null;
}

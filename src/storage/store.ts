/**
 * Storage contracts
 *
 * Both stores are append-only: records are inserted once per upstream id and
 * watermarks are only ever added, the newest by record_timestamp_end winning.
 */

import type { BaseRecord, DataType, StoredRecord, Watermark } from '../types/index.js';

export interface MetadataStore {
  getLatestWatermark(dataType: DataType): Promise<Watermark | null>;
  insertWatermark(watermark: Watermark): Promise<void>;
}

export interface RecordStore {
  /** Insert records; ids already stored are left untouched. Returns rows inserted. */
  insertRecords<T extends BaseRecord>(dataType: DataType, records: ReadonlyArray<StoredRecord<T>>): Promise<number>;
}

export interface SyncStore extends MetadataStore, RecordStore {
  /** Fails when the backing store cannot be reached */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Most recent watermark first: by record_timestamp_end (missing last), then run time
 */
export function compareWatermarks(a: Watermark, b: Watermark): number {
  const endA = a.record_timestamp_end ?? Number.NEGATIVE_INFINITY;
  const endB = b.record_timestamp_end ?? Number.NEGATIVE_INFINITY;
  if (endA !== endB) {
    return endB - endA;
  }
  return b.timestamp - a.timestamp;
}

/**
 * Store used when persistence is disabled: reads find nothing, writes vanish
 */
export class NoopStore implements SyncStore {
  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  async getLatestWatermark(): Promise<Watermark | null> {
    return null;
  }

  async insertWatermark(): Promise<void> {}

  async insertRecords(): Promise<number> {
    return 0;
  }
}

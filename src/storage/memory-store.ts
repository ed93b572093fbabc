/**
 * In-memory store for development and tests - not suitable for production
 */

import { DataType, type BaseRecord, type StoredRecord, type Watermark } from '../types/index.js';
import { compareWatermarks, type SyncStore } from './store.js';

export class InMemoryStore implements SyncStore {
  private readonly records: Record<DataType, Map<string, BaseRecord>> = {
    [DataType.Trades]: new Map(),
    [DataType.Rewards]: new Map()
  };
  private readonly watermarks: Watermark[] = [];

  async ping(): Promise<void> {}

  async close(): Promise<void> {}

  async getLatestWatermark(dataType: DataType): Promise<Watermark | null> {
    const candidates = this.watermarks.filter(watermark => watermark.data_type === dataType);
    candidates.sort(compareWatermarks);
    return candidates[0] ?? null;
  }

  async insertWatermark(watermark: Watermark): Promise<void> {
    this.watermarks.push({ ...watermark });
  }

  async insertRecords<T extends BaseRecord>(dataType: DataType, records: ReadonlyArray<StoredRecord<T>>): Promise<number> {
    const table = this.records[dataType];
    let inserted = 0;
    for (const { id, record } of records) {
      if (!table.has(id)) {
        table.set(id, record);
        inserted++;
      }
    }
    return inserted;
  }

  getRecords(dataType: DataType): Map<string, BaseRecord> {
    return new Map(this.records[dataType]);
  }

  getWatermarks(dataType?: DataType): Watermark[] {
    return this.watermarks.filter(watermark => dataType === undefined || watermark.data_type === dataType);
  }
}

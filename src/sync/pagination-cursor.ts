/**
 * Pagination cursors
 *
 * Offset: `ofs` advances by the page size; done once it reaches the total
 * reported by the first page.
 * Timestamp: `end` moves to one second before the oldest record of the last
 * batch; done once a batch comes back shorter than a full page.
 */

import type { BaseRecord, PaginationStrategy, RequestPayload } from '../types/index.js';
import { normalizeTimestamp } from './watermark.js';

export interface PaginationCursor {
  readonly strategy: PaginationStrategy;
  /** Request parameters selecting the next page */
  params(): RequestPayload;
  /** Move past a batch that has been accumulated */
  advance(batch: ReadonlyArray<[string, BaseRecord]>, totalCount: number | null): void;
  /** True when the upstream has nothing beyond the pages already fetched */
  isExhausted(): boolean;
}

export class OffsetCursor implements PaginationCursor {
  readonly strategy = 'offset' as const;
  private offset = 0;
  private total: number | null = null;
  private batches = 0;

  constructor(private readonly pageSize: number) {}

  params(): RequestPayload {
    return { ofs: this.offset };
  }

  advance(_batch: ReadonlyArray<[string, BaseRecord]>, totalCount: number | null): void {
    // The total is only trusted from the first page
    if (this.batches === 0) {
      this.total = totalCount;
    }
    this.batches++;
    this.offset += this.pageSize;
  }

  isExhausted(): boolean {
    return this.total !== null && this.offset >= this.total;
  }

  get currentOffset(): number {
    return this.offset;
  }

  get reportedTotal(): number | null {
    return this.total;
  }
}

export class TimestampCursor implements PaginationCursor {
  readonly strategy = 'timestamp' as const;
  private end: number | null = null;
  private lastBatchSize: number | null = null;

  constructor(private readonly pageSize: number) {}

  params(): RequestPayload {
    return this.end === null ? {} : { end: this.end };
  }

  advance(batch: ReadonlyArray<[string, BaseRecord]>): void {
    this.lastBatchSize = batch.length;

    let oldest: number | null = null;
    for (const [, record] of batch) {
      const time = normalizeTimestamp(record.time);
      if (time !== null && (oldest === null || time < oldest)) {
        oldest = time;
      }
    }
    // Without any usable timestamp the cursor stays put; the no-new-records
    // check stops the loop when the same page comes back
    if (oldest !== null) {
      this.end = oldest - 1;
    }
  }

  isExhausted(): boolean {
    return this.lastBatchSize !== null && this.lastBatchSize < this.pageSize;
  }

  get currentEnd(): number | null {
    return this.end;
  }
}

export function createCursor(strategy: PaginationStrategy, pageSize: number): PaginationCursor {
  return strategy === 'timestamp' ? new TimestampCursor(pageSize) : new OffsetCursor(pageSize);
}

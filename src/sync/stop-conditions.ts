/**
 * Stop-Condition Evaluator
 *
 * Checked after every batch, first match wins:
 *   1. malformed or absent response
 *   2. empty batch
 *   3. known watermark id inside the batch
 *   4. no new records added
 *   5. offset reached the reported total (offset cursor)
 *   6. short batch (timestamp cursor)
 */

import type { BaseRecord, RecordBatch, StopReason } from '../types/index.js';
import type { PaginationCursor } from './pagination-cursor.js';

export interface StopDecision {
  reason: StopReason;
  level: 'info' | 'warn';
  message: string;
}

export interface WatermarkSplit<T> {
  /** Records preceding the watermark id, in API order */
  accepted: Array<[string, T]>;
  reached: boolean;
}

export interface BatchProgress {
  watermarkReached: boolean;
  added: number;
  cursor: PaginationCursor;
}

export function evaluateResponse<T extends BaseRecord>(batch: RecordBatch<T> | null): StopDecision | null {
  if (batch === null) {
    return { reason: 'malformed_response', level: 'warn', message: 'Malformed or missing response, stopping' };
  }
  if (batch.records.length === 0) {
    return { reason: 'empty_batch', level: 'info', message: 'Reached end of history' };
  }
  return null;
}

/**
 * Cut the batch at the first record whose id matches the stored watermark.
 * That record and everything after it were persisted by an earlier run.
 */
export function splitAtWatermark<T>(
  records: ReadonlyArray<[string, T]>,
  stopId: string | null
): WatermarkSplit<T> {
  if (stopId === null) {
    return { accepted: [...records], reached: false };
  }

  const accepted: Array<[string, T]> = [];
  for (const entry of records) {
    if (entry[0] === stopId) {
      return { accepted, reached: true };
    }
    accepted.push(entry);
  }
  return { accepted, reached: false };
}

export function evaluateProgress(progress: BatchProgress): StopDecision | null {
  if (progress.watermarkReached) {
    return { reason: 'watermark_reached', level: 'info', message: 'Reached last record of previous run' };
  }
  if (progress.added === 0) {
    return { reason: 'no_new_records', level: 'warn', message: 'Batch added no new records, pagination may be stalled' };
  }
  if (progress.cursor.isExhausted()) {
    return progress.cursor.strategy === 'offset'
      ? { reason: 'offset_exhausted', level: 'info', message: 'Offset reached reported total' }
      : { reason: 'final_batch', level: 'info', message: 'Final batch received' };
  }
  return null;
}

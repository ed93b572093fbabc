/**
 * Sync Orchestrator
 *
 * Retrieves every record added since the last run for one record type:
 *
 *   INIT -> FETCH_BATCH -> { STOP | ACCUMULATE -> THROTTLE -> FETCH_BATCH } -> FINALIZE
 *
 * Batches are fetched strictly one after another. The loop never throws:
 * a bad response ends pagination and whatever was gathered is returned.
 * Persisting the records and the returned watermark is the caller's job.
 * Empty and aborted runs return no watermark, so the older one stays in effect.
 */

import { SYNC_DEFAULTS } from '../constants.js';
import {
  type DataType,
  type BaseRecord,
  type KrakenResponse,
  type PaginationStrategy,
  type RecordBatch,
  type RewardEntry,
  type SyncResult,
  type TradeRecord,
  type Watermark
} from '../types/index.js';
import type { MetadataStore } from '../storage/store.js';
import { errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { sleep as defaultSleep, type BackoffRequestExecutor, type Sleep } from './backoff-executor.js';
import { DedupAccumulator } from './dedup-accumulator.js';
import { createCursor } from './pagination-cursor.js';
import { STAKING_REWARDS, TRADE_HISTORY, type RecordTypeDefinition } from './record-types.js';
import { evaluateProgress, evaluateResponse, splitAtWatermark, type StopDecision } from './stop-conditions.js';
import { deriveWatermark, watermarkId } from './watermark.js';

export interface SyncOrchestratorOptions {
  executor: BackoffRequestExecutor;
  metadataStore?: MetadataStore | null;
  logger?: Logger;
  sleep?: Sleep;
  pageSize?: number;
  throttleMs?: number;
  pagination?: Partial<Record<DataType, PaginationStrategy>>;
  /** Milliseconds since the epoch; used for the watermark's run time */
  clock?: () => number;
}

const ABORTED: StopDecision = { reason: 'aborted', level: 'warn', message: 'Sync aborted between batches' };
const MALFORMED: StopDecision = { reason: 'malformed_response', level: 'warn', message: 'Malformed or missing response, stopping' };

export class SyncOrchestrator {
  private readonly executor: BackoffRequestExecutor;
  private readonly metadataStore: MetadataStore | null;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly pageSize: number;
  private readonly throttleMs: number;
  private readonly pagination: Partial<Record<DataType, PaginationStrategy>>;
  private readonly clock: () => number;

  constructor(options: SyncOrchestratorOptions) {
    this.executor = options.executor;
    this.metadataStore = options.metadataStore ?? null;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.pageSize = options.pageSize ?? SYNC_DEFAULTS.PAGE_SIZE;
    this.throttleMs = options.throttleMs ?? SYNC_DEFAULTS.THROTTLE_MS;
    this.pagination = options.pagination ?? {};
    this.clock = options.clock ?? Date.now;
  }

  syncTrades(signal?: AbortSignal): Promise<SyncResult<TradeRecord>> {
    return this.sync(TRADE_HISTORY, signal);
  }

  syncRewards(signal?: AbortSignal): Promise<SyncResult<RewardEntry>> {
    return this.sync(STAKING_REWARDS, signal);
  }

  async sync<T extends BaseRecord>(definition: RecordTypeDefinition<T>, signal?: AbortSignal): Promise<SyncResult<T>> {
    const { dataType } = definition;
    const service = `sync_${dataType}`;

    // INIT
    const prior = await this.loadWatermark(dataType);
    const stopId = watermarkId(prior, definition.idField);
    if (prior === null) {
      this.logger.info(service, 'full_history_retrieval', { data_type: dataType });
    } else {
      this.logger.info(service, 'resuming', {
        data_type: dataType,
        details: { stop_id: stopId, record_timestamp_end: prior.record_timestamp_end }
      });
    }

    const strategy = this.pagination[dataType] ?? 'offset';
    const cursor = createCursor(strategy, this.pageSize);
    const accumulator = new DedupAccumulator<T>();
    let lastRecordId: string | null = null;
    let batches = 0;
    let stop: StopDecision;

    for (;;) {
      if (signal?.aborted) {
        stop = ABORTED;
        break;
      }

      // FETCH_BATCH
      const payload = { ...definition.basePayload, ...cursor.params() };
      const response = await this.executor.execute(definition.method, definition.endpoint, payload);
      batches++;

      const batch = this.readBatch(definition, response, service);
      const responseStop = evaluateResponse(batch);
      if (responseStop !== null || batch === null) {
        stop = responseStop ?? MALFORMED;
        break;
      }

      if (batches === 1) {
        lastRecordId = batch.records[0]?.[0] ?? null;
      }

      // ACCUMULATE
      const split = splitAtWatermark(batch.records, stopId);
      let added = 0;
      for (const [id, record] of split.accepted) {
        if (accumulator.add(id, record)) {
          added++;
        }
      }
      cursor.advance(batch.records, batch.totalCount);

      this.logger.debug(service, 'batch_processed', {
        data_type: dataType,
        details: { batch: batches, received: batch.records.length, added, total: accumulator.size, cursor: cursor.params() }
      });

      const progressStop = evaluateProgress({ watermarkReached: split.reached, added, cursor });
      if (progressStop !== null) {
        stop = progressStop;
        break;
      }

      // THROTTLE
      await this.sleep(this.throttleMs);
    }

    this.logger[stop.level](service, stop.reason, {
      data_type: dataType,
      details: { message: stop.message, batches, records: accumulator.size }
    });

    // FINALIZE
    if (accumulator.size === 0) {
      return { dataType, records: new Map(), metadata: null, stopReason: stop.reason, batches };
    }

    // An interrupted run has not reached the previous watermark; recording its
    // newest id would hide the older records it never fetched
    if (stop.reason === 'aborted') {
      return { dataType, records: accumulator.toMap(), metadata: null, stopReason: stop.reason, batches };
    }

    const metadata = deriveWatermark({
      dataType,
      records: accumulator.values(),
      lastRecordId,
      idField: definition.idField,
      retrievedAt: Math.floor(this.clock() / 1000)
    });

    this.logger.info(service, 'sync_complete', {
      data_type: dataType,
      details: {
        records: accumulator.size,
        record_timestamp_start: metadata.record_timestamp_start,
        record_timestamp_end: metadata.record_timestamp_end
      }
    });

    return { dataType, records: accumulator.toMap(), metadata, stopReason: stop.reason, batches };
  }

  private async loadWatermark(dataType: DataType): Promise<Watermark | null> {
    if (!this.metadataStore) {
      return null;
    }
    try {
      return await this.metadataStore.getLatestWatermark(dataType);
    } catch (error) {
      this.logger.warn(`sync_${dataType}`, 'watermark_read_failed', {
        data_type: dataType,
        details: { error: errorMessage(error) }
      });
      return null;
    }
  }

  private readBatch<T extends BaseRecord>(
    definition: RecordTypeDefinition<T>,
    response: KrakenResponse | null,
    service: string
  ): RecordBatch<T> | null {
    if (response === null) {
      return null;
    }
    if (response.error.length > 0) {
      this.logger.warn(service, 'api_error', { details: { errors: response.error.join('; ') } });
      return null;
    }
    return definition.parseResult(response.result);
  }
}

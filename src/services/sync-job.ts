/**
 * Sync job: one end-to-end run over the selected record types.
 *
 * For each type the orchestrator retrieves what is new, trades are enriched
 * with asset-pair names, then records are written before the watermark so a
 * failed record write never advances the resume point.
 */

import { KrakenClient } from '../api/kraken-client.js';
import type { AppConfig } from '../config/index.js';
import { ERROR_MESSAGES } from '../constants.js';
import { FileSink, type OutputFormat } from '../storage/file-sink.js';
import { PostgresStore } from '../storage/postgres-store.js';
import { NoopStore, type SyncStore } from '../storage/store.js';
import { BackoffRequestExecutor } from '../sync/backoff-executor.js';
import { SyncOrchestrator } from '../sync/sync-orchestrator.js';
import {
  DataType,
  type BaseRecord,
  type StopReason,
  type SyncResult,
  type TradeRecord,
  type Watermark
} from '../types/index.js';
import { ConfigurationError, StorageError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { CcxtAssetPairCatalog, enrichTrades, type AssetPairCatalog } from './enrichment.js';

export type StorageLocation = 'local' | 'database';

export interface SyncRunOptions {
  dataTypes: DataType[];
  location: StorageLocation;
  formats?: OutputFormat[];
  filename?: string;
  signal?: AbortSignal;
}

export interface DataTypeSummary {
  dataType: DataType;
  fetched: number;
  inserted: number;
  watermark: Watermark | null;
  stopReason: StopReason;
  files: string[];
}

export interface SyncJobDependencies {
  orchestrator: SyncOrchestrator;
  logger: Logger;
  /** Defaults to a no-op store: nothing is persisted and no prior watermark exists */
  store?: SyncStore;
  fileSink?: FileSink | null;
  catalog?: AssetPairCatalog | null;
}

export class SyncJob {
  private readonly orchestrator: SyncOrchestrator;
  private readonly logger: Logger;
  private readonly store: SyncStore;
  private readonly fileSink: FileSink | null;
  private readonly catalog: AssetPairCatalog | null;

  constructor(deps: SyncJobDependencies) {
    this.orchestrator = deps.orchestrator;
    this.logger = deps.logger;
    this.store = deps.store ?? new NoopStore();
    this.fileSink = deps.fileSink ?? null;
    this.catalog = deps.catalog ?? null;
  }

  async run(options: SyncRunOptions): Promise<DataTypeSummary[]> {
    this.logger.info('sync_job', 'started', {
      details: { data_types: options.dataTypes.join(','), location: options.location }
    });

    if (options.location === 'database') {
      await this.ensureStoreReachable();
    }

    const summaries: DataTypeSummary[] = [];
    for (const dataType of options.dataTypes) {
      const result: SyncResult<BaseRecord> = dataType === DataType.Trades
        ? await this.syncTrades(options.signal)
        : await this.orchestrator.syncRewards(options.signal);
      summaries.push(await this.persist(result, options));
    }

    this.logger.info('sync_job', 'completed', {
      details: Object.fromEntries(summaries.map(summary => [summary.dataType, summary.fetched]))
    });
    return summaries;
  }

  private async ensureStoreReachable(): Promise<void> {
    try {
      await this.store.ping();
    } catch (error) {
      this.logger.error('sync_job', 'store_unreachable', { details: { error: errorMessage(error) } });
      throw new StorageError(ERROR_MESSAGES.STORE_UNREACHABLE, error);
    }
  }

  private async syncTrades(signal?: AbortSignal): Promise<SyncResult<TradeRecord>> {
    const result = await this.orchestrator.syncTrades(signal);
    if (!this.catalog || result.records.size === 0) {
      return result;
    }

    try {
      return { ...result, records: await enrichTrades(result.records, this.catalog, this.logger) };
    } catch (error) {
      this.logger.warn('sync_job', 'enrichment_failed', {
        data_type: DataType.Trades,
        details: { error: errorMessage(error) }
      });
      return result;
    }
  }

  private async persist(result: SyncResult<BaseRecord>, options: SyncRunOptions): Promise<DataTypeSummary> {
    const summary: DataTypeSummary = {
      dataType: result.dataType,
      fetched: result.records.size,
      inserted: 0,
      watermark: result.metadata,
      stopReason: result.stopReason,
      files: []
    };

    if (result.records.size === 0) {
      this.logger.info('sync_job', 'no_new_records', { data_type: result.dataType });
      return summary;
    }

    const stored = Array.from(result.records, ([id, record]) => ({ id, record }));
    summary.inserted = await this.store.insertRecords(result.dataType, stored);
    if (result.metadata) {
      await this.store.insertWatermark(result.metadata);
    }

    if (this.fileSink) {
      for (const format of options.formats ?? []) {
        const path = this.fileSink.write(result.dataType, result.records, format, options.filename);
        if (path) {
          summary.files.push(path);
        }
      }
    }

    return summary;
  }
}

export interface CreateSyncJobOptions {
  location: StorageLocation;
  logger: Logger;
  /** Skip asset-pair enrichment of trades */
  skipEnrichment?: boolean;
}

/**
 * Wire a job from configuration: Kraken client, backoff, orchestrator and,
 * for database runs, the Postgres store that also supplies prior watermarks
 */
export function createSyncJob(config: AppConfig, options: CreateSyncJobOptions): { job: SyncJob; store: SyncStore } {
  const { logger } = options;

  const client = new KrakenClient({
    apiKey: config.kraken.apiKey,
    apiSecret: config.kraken.apiSecret,
    baseUrl: config.kraken.apiUrl,
    timeoutMs: config.kraken.timeoutMs,
    logger
  });

  const executor = new BackoffRequestExecutor(client, {
    maxAttempts: config.sync.maxAttempts,
    baseDelayMs: config.sync.backoffBaseMs,
    logger
  });

  let store: SyncStore = new NoopStore();
  if (options.location === 'database') {
    if (!config.storage.databaseUrl) {
      throw new ConfigurationError(ERROR_MESSAGES.MISSING_DATABASE_URL);
    }
    store = PostgresStore.connect(config.storage.databaseUrl, logger);
  }

  const orchestrator = new SyncOrchestrator({
    executor,
    metadataStore: store,
    logger,
    pageSize: config.sync.pageSize,
    throttleMs: config.sync.throttleMs,
    pagination: {
      [DataType.Trades]: config.sync.tradesPagination,
      [DataType.Rewards]: config.sync.rewardsPagination
    }
  });

  const job = new SyncJob({
    orchestrator,
    logger,
    store,
    fileSink: new FileSink(config.storage.outputDir, logger),
    catalog: options.skipEnrichment ? null : new CcxtAssetPairCatalog(undefined, logger)
  });

  return { job, store };
}

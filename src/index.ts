export { KrakenClient, type KrakenClientOptions, type SignedRequestSender } from './api/kraken-client.js';
export { buildConfig, getConfig, loadConfig, parseConfigFile, type AppConfig, type SyncTuning } from './config/index.js';
export { checkApiKeyExpiry, type ExpiryStatus } from './config/credentials.js';
export { NonceSource, signKrakenRequest } from './libs/crypto.js';
export { runMigrations } from './migrate.js';
export { CcxtAssetPairCatalog, enrichTrades, type AssetPairCatalog, type AssetPairInfo } from './services/enrichment.js';
export {
  SyncJob,
  createSyncJob,
  type DataTypeSummary,
  type StorageLocation,
  type SyncJobDependencies,
  type SyncRunOptions
} from './services/sync-job.js';
export { FileSink, type OutputFormat } from './storage/file-sink.js';
export { InMemoryStore } from './storage/memory-store.js';
export { PostgresStore, type SqlExecutor } from './storage/postgres-store.js';
export { NoopStore, type MetadataStore, type RecordStore, type SyncStore } from './storage/store.js';
export { BackoffRequestExecutor, type BackoffConfig } from './sync/backoff-executor.js';
export { DedupAccumulator } from './sync/dedup-accumulator.js';
export { OffsetCursor, TimestampCursor, createCursor, type PaginationCursor } from './sync/pagination-cursor.js';
export { STAKING_REWARDS, TRADE_HISTORY, type RecordTypeDefinition } from './sync/record-types.js';
export { evaluateProgress, evaluateResponse, splitAtWatermark, type StopDecision } from './sync/stop-conditions.js';
export { SyncOrchestrator, type SyncOrchestratorOptions } from './sync/sync-orchestrator.js';
export { deriveWatermark, normalizeTimestamp, type WatermarkIdField } from './sync/watermark.js';
export * from './types/index.js';
export { ConfigurationError, StorageError } from './utils/errors.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';

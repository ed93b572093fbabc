#!/usr/bin/env node
import { Command } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { checkApiKeyExpiry } from './config/credentials.js';
import { loadConfig } from './config/index.js';
import { ERROR_MESSAGES } from './constants.js';
import { runMigrations } from './migrate.js';
import { createSyncJob, type DataTypeSummary, type SyncRunOptions } from './services/sync-job.js';
import type { OutputFormat } from './storage/file-sink.js';
import { DataType } from './types/index.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const SyncCommandSchema = z.object({
  type: z.enum(['trades', 'rewards', 'all']).default('all'),
  location: z.enum(['local', 'database']).optional(),
  format: z.string().optional(),
  filename: z.string().min(1).optional(),
  config: z.string().optional(),
  enrich: z.boolean().default(true)
});

const FormatSchema = z.array(z.enum(['json', 'csv'])).min(1);

export interface SyncCommand extends Omit<SyncRunOptions, 'signal'> {
  configPath?: string;
  enrich: boolean;
}

/**
 * Turn raw commander options into a typed sync command.
 * Without --location, database storage is used when STORE_IN_DATABASE (or the config file) enables it.
 */
export function parseSyncOptions(raw: unknown, storageEnabled: boolean): SyncCommand {
  const parsed = SyncCommandSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `--${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid options:\n${issues.join('\n')}`);
  }
  const opts = parsed.data;

  const dataTypes = opts.type === 'all'
    ? [DataType.Trades, DataType.Rewards]
    : [opts.type === 'trades' ? DataType.Trades : DataType.Rewards];

  const location = opts.location ?? (storageEnabled ? 'database' : 'local');

  return {
    dataTypes,
    location,
    formats: parseFormats(opts.format, location),
    filename: opts.filename,
    configPath: opts.config,
    enrich: opts.enrich
  };
}

/**
 * Local runs export JSON unless told otherwise; database runs export only on request
 */
function parseFormats(format: string | undefined, location: 'local' | 'database'): OutputFormat[] {
  if (format === undefined) {
    return location === 'local' ? ['json'] : [];
  }
  const formats = FormatSchema.safeParse(format.split(',').map(value => value.trim()).filter(Boolean));
  if (!formats.success) {
    throw new ConfigurationError(`Invalid --format "${format}": use json, csv or json,csv`);
  }
  return formats.data;
}

export function formatSummary(summary: DataTypeSummary): string {
  const range = summary.watermark
    ? `${summary.watermark.record_timestamp_start ?? '-'}..${summary.watermark.record_timestamp_end ?? '-'}`
    : 'none';
  const files = summary.files.length ? ` files=${summary.files.join(',')}` : '';
  return `${summary.dataType}: fetched=${summary.fetched} inserted=${summary.inserted} stop=${summary.stopReason} range=${range}${files}`;
}

export async function runSync(raw: unknown): Promise<DataTypeSummary[]> {
  const configPath = SyncCommandSchema.pick({ config: true }).parse(raw).config;
  const config = loadConfig(configPath);
  const logger = createLogger({ level: config.logging.level, logDir: config.logging.dir });
  const command = parseSyncOptions(raw, config.storage.enabled);

  checkApiKeyExpiry(config.kraken.apiExpiry, new Date(), logger);

  const { job, store } = createSyncJob(config, {
    location: command.location,
    logger,
    skipEnrichment: !command.enrich
  });

  // Ctrl-C stops between batches; what was fetched so far is still saved
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const summaries = await job.run({ ...command, signal: controller.signal });
    for (const summary of summaries) {
      console.log(formatSummary(summary));
    }
    return summaries;
  } finally {
    process.off('SIGINT', onSigint);
    await store.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('trade-history-sync')
    .description('Incremental trade history and staking reward sync');

  program
    .command('sync')
    .description('retrieve everything added since the last run')
    .option('-t, --type <type>', 'trades, rewards or all', 'all')
    .option('-l, --location <location>', 'local or database')
    .option('-f, --format <formats>', 'local export formats: json, csv or json,csv')
    .option('--filename <name>', 'custom base name for exported files')
    .option('-c, --config <path>', 'YAML config file')
    .option('--no-enrich', 'skip asset-pair enrichment of trades')
    .action(async (opts: unknown) => {
      await runSync(opts);
    });

  program
    .command('migrate')
    .description('apply database migrations')
    .option('-c, --config <path>', 'YAML config file')
    .action(async (opts: { config?: string }) => {
      const config = loadConfig(opts.config);
      const logger = createLogger({ level: config.logging.level, logDir: config.logging.dir });
      if (!config.storage.databaseUrl) {
        throw new ConfigurationError(ERROR_MESSAGES.MISSING_DATABASE_URL);
      }
      await runMigrations(config.storage.databaseUrl, logger);
    });

  return program;
}

/**
 * True when `entry` (usually process.argv[1]) names this module, including
 * through the symlink npm installs for `bin`
 */
export function isMainModule(moduleUrl: string, entry: string | undefined): boolean {
  if (!entry) {
    return false;
  }
  try {
    return moduleUrl === pathToFileURL(realpathSync(entry)).href;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

if (isMainModule(import.meta.url, process.argv[1])) {
  buildProgram().parseAsync().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
}

/**
 * PostgreSQL store
 *
 * - Parameterized queries only
 * - Records and watermarks are inserted, never updated or deleted
 * - Record payloads are kept verbatim as JSONB, keyed by upstream id
 */

import { Pool } from 'pg';
import { z } from 'zod';
import { DB_CONFIG, METADATA_TABLE, RECORD_TABLES } from '../constants.js';
import { DataType, type BaseRecord, type StoredRecord, type Watermark } from '../types/index.js';
import { StorageError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { normalizeTimestamp } from '../sync/watermark.js';
import type { SyncStore } from './store.js';

/**
 * The slice of pg's Pool this store needs
 */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>>; rowCount: number | null }>;
}

// BIGINT columns come back from pg as strings
const BigIntColumn = z.coerce.number().int();

const WatermarkRowSchema = z.object({
  data_type: z.nativeEnum(DataType),
  timestamp: BigIntColumn,
  record_timestamp_start: BigIntColumn.nullable(),
  record_timestamp_end: BigIntColumn.nullable(),
  last_trade_id: z.string().nullable(),
  last_reward_id: z.string().nullable()
});

export class PostgresStore implements SyncStore {
  constructor(
    private readonly db: SqlExecutor,
    private readonly logger: Logger = silentLogger,
    private readonly onClose: () => Promise<void> = async () => {}
  ) {}

  static connect(connectionString: string, logger?: Logger): PostgresStore {
    const pool = new Pool({
      connectionString,
      max: DB_CONFIG.MAX_CONNECTIONS,
      idleTimeoutMillis: DB_CONFIG.IDLE_TIMEOUT,
      connectionTimeoutMillis: DB_CONFIG.CONNECTION_TIMEOUT
    });
    const executor: SqlExecutor = {
      query: (text, values) => pool.query(text, values)
    };
    return new PostgresStore(executor, logger, () => pool.end());
  }

  async ping(): Promise<void> {
    await this.run('ping_failed', 'SELECT 1');
  }

  async close(): Promise<void> {
    await this.onClose();
  }

  async getLatestWatermark(dataType: DataType): Promise<Watermark | null> {
    const result = await this.run(
      'watermark_read_failed',
      `SELECT data_type, "timestamp", record_timestamp_start, record_timestamp_end, last_trade_id, last_reward_id
       FROM ${METADATA_TABLE}
       WHERE data_type = $1
       ORDER BY record_timestamp_end DESC NULLS LAST, "timestamp" DESC
       LIMIT 1`,
      [dataType]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    const parsed = WatermarkRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new StorageError(`Invalid watermark row for ${dataType}`, parsed.error);
    }

    const { last_trade_id, last_reward_id, ...rest } = parsed.data;
    const watermark: Watermark = { ...rest };
    if (last_trade_id !== null) watermark.last_trade_id = last_trade_id;
    if (last_reward_id !== null) watermark.last_reward_id = last_reward_id;
    return watermark;
  }

  async insertWatermark(watermark: Watermark): Promise<void> {
    await this.run(
      'watermark_insert_failed',
      `INSERT INTO ${METADATA_TABLE}
         (data_type, "timestamp", record_timestamp_start, record_timestamp_end, last_trade_id, last_reward_id)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        watermark.data_type,
        watermark.timestamp,
        watermark.record_timestamp_start,
        watermark.record_timestamp_end,
        watermark.last_trade_id ?? null,
        watermark.last_reward_id ?? null
      ]
    );

    this.logger.debug('database', 'watermark_stored', {
      data_type: watermark.data_type,
      details: { record_timestamp_end: watermark.record_timestamp_end }
    });
  }

  async insertRecords<T extends BaseRecord>(dataType: DataType, records: ReadonlyArray<StoredRecord<T>>): Promise<number> {
    const table = RECORD_TABLES[dataType];
    let inserted = 0;

    for (let offset = 0; offset < records.length; offset += DB_CONFIG.INSERT_CHUNK_SIZE) {
      const chunk = records.slice(offset, offset + DB_CONFIG.INSERT_CHUNK_SIZE);
      const values: unknown[] = [];
      const tuples = chunk.map(({ id, record }, index) => {
        values.push(id, JSON.stringify(record), normalizeTimestamp(record.time));
        const base = index * 3;
        return `($${base + 1}, $${base + 2}::jsonb, $${base + 3})`;
      });

      const result = await this.run(
        'records_insert_failed',
        `INSERT INTO ${table} (id, record, record_time) VALUES ${tuples.join(', ')} ON CONFLICT (id) DO NOTHING`,
        values
      );
      inserted += result.rowCount ?? 0;
    }

    this.logger.info('database', 'records_stored', {
      data_type: dataType,
      details: { received: records.length, inserted }
    });
    return inserted;
  }

  private async run(failureEvent: string, text: string, values?: unknown[]) {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      const wrapped = new StorageError('Database query failed', error);
      this.logger.error('database', failureEvent, { details: { error: wrapped.message } });
      throw wrapped;
    }
  }
}

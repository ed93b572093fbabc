/**
 * Local export of synced records as JSON or CSV under the output directory.
 * File names: `<type>_<unix>.<ext>`, or `<custom>_<type>.<ext>` when a custom
 * name is given.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { stringify } from 'csv-stringify/sync';
import type { BaseRecord, DataType } from '../types/index.js';
import { StorageError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { normalizeTimestamp } from '../sync/watermark.js';

export type OutputFormat = 'json' | 'csv';

export class FileSink {
  constructor(
    private readonly outputDir: string,
    private readonly logger: Logger = silentLogger,
    private readonly clock: () => number = Date.now
  ) {}

  fileName(dataType: DataType, format: OutputFormat, customName?: string): string {
    if (customName) {
      return join(this.outputDir, `${customName}_${dataType}.${format}`);
    }
    return join(this.outputDir, `${dataType}_${Math.floor(this.clock() / 1000)}.${format}`);
  }

  /**
   * Write records to a new file. Returns the path, or null when there was nothing to write.
   */
  write(
    dataType: DataType,
    records: ReadonlyMap<string, BaseRecord>,
    format: OutputFormat,
    customName?: string
  ): string | null {
    if (records.size === 0) {
      this.logger.warn('file_sink', 'nothing_to_write', { data_type: dataType, details: { format } });
      return null;
    }

    const filePath = this.fileName(dataType, format, customName);
    const content = format === 'json' ? toJson(records) : toCsv(records);

    try {
      mkdirSync(this.outputDir, { recursive: true });
      writeFileSync(filePath, content, 'utf8');
    } catch (error) {
      const wrapped = new StorageError(`Failed to write ${filePath}`, error);
      this.logger.error('file_sink', 'write_failed', { data_type: dataType, details: { error: wrapped.message } });
      throw wrapped;
    }

    this.logger.info('file_sink', 'file_written', {
      data_type: dataType,
      details: { path: filePath, format, count: records.size }
    });
    return filePath;
  }
}

export function toJson(records: ReadonlyMap<string, BaseRecord>): string {
  return JSON.stringify(Object.fromEntries(records), null, 4);
}

/**
 * One row per record, oldest first; `id` leads, then every field in order of first appearance
 */
export function toCsv(records: ReadonlyMap<string, BaseRecord>): string {
  const columns = ['id'];
  const seen = new Set(columns);
  for (const record of records.values()) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const rows = Array.from(records, ([id, record]) => ({ ...record, id }));
  rows.sort((a, b) => {
    const left = sortKey(a.time);
    const right = sortKey(b.time);
    return left === right ? 0 : left < right ? -1 : 1;
  });

  return stringify(rows, { header: true, columns });
}

function sortKey(time: unknown): number {
  return normalizeTimestamp(time) ?? Number.POSITIVE_INFINITY;
}

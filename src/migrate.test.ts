import { readFileSync } from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { MIGRATIONS_DIR, listMigrations } from './migrate.js';

describe('listMigrations', () => {
  it('finds the schema migration beside the sources', () => {
    expect(listMigrations()).toEqual(['001_sync_schema.sql']);
  });

  it('creates the record and watermark tables', () => {
    const sql = readFileSync(path.join(MIGRATIONS_DIR, '001_sync_schema.sql'), 'utf8');
    for (const table of ['sync_trades', 'sync_rewards', 'sync_metadata']) {
      expect(sql).toContain(`CREATE TABLE IF NOT EXISTS ${table}`);
    }
  });
});

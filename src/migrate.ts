/**
 * Database Migration Tool
 *
 * Applies every migrations/*.sql file not yet recorded in the migrations
 * table, in file-name order, each inside its own transaction.
 */

import { readdirSync, readFileSync } from 'fs';
import { Pool } from 'pg';
import path from 'path';
import { fileURLToPath } from 'url';
import { getConfig } from './config/index.js';
import { ERROR_MESSAGES } from './constants.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';
import { createLogger, type Logger } from './utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const MIGRATIONS_DIR = path.resolve(__dirname, '..', 'migrations');

export function listMigrations(dir: string = MIGRATIONS_DIR): string[] {
  return readdirSync(dir)
    .filter(file => file.endsWith('.sql'))
    .sort();
}

export async function runMigrations(connectionString: string, logger: Logger, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const pool = new Pool({ connectionString });
  const applied: string[] = [];

  logger.info('migrate', 'started', {
    details: { database: connectionString.replace(/\/\/.*@/, '//*****@') }
  });

  try {
    const client = await pool.connect();

    try {
      await client.query(`
        CREATE TABLE IF NOT EXISTS migrations (
          id SERIAL PRIMARY KEY,
          filename VARCHAR(255) NOT NULL UNIQUE,
          applied_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
        )
      `);

      for (const filename of listMigrations(dir)) {
        const existing = await client.query('SELECT filename FROM migrations WHERE filename = $1', [filename]);
        if (existing.rows.length > 0) {
          logger.debug('migrate', 'already_applied', { details: { filename } });
          continue;
        }

        const sql = readFileSync(path.join(dir, filename), 'utf8');
        await client.query('BEGIN');
        try {
          await client.query(sql);
          await client.query('INSERT INTO migrations (filename) VALUES ($1)', [filename]);
          await client.query('COMMIT');
        } catch (error) {
          await client.query('ROLLBACK');
          throw error;
        }

        applied.push(filename);
        logger.info('migrate', 'applied', { details: { filename } });
      }
    } finally {
      client.release();
    }
  } catch (error) {
    logger.error('migrate', 'failed', { details: { error: errorMessage(error) } });
    throw error;
  } finally {
    await pool.end();
  }

  logger.info('migrate', 'completed', { details: { applied: applied.length } });
  return applied;
}

// Run migrations if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const config = getConfig();
  const logger = createLogger({ level: config.logging.level, logDir: config.logging.dir });
  if (!config.storage.databaseUrl) {
    throw new ConfigurationError(ERROR_MESSAGES.MISSING_DATABASE_URL);
  }
  runMigrations(config.storage.databaseUrl, logger).catch(() => {
    process.exitCode = 1;
  });
}

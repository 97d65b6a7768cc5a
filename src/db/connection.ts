import fs from 'fs';
import path from 'path';
import sqlite3 from 'sqlite3';
import { Database, open } from 'sqlite';
import { runMigrations } from './migrations';
import { SiteError, SiteErrorType, toError } from '../utils/error-handler';
import { AppLogger, createStorageLogger } from '../utils/logger';

export const MEMORY_DATABASE = ':memory:';

/**
 * Open the lead store and bring its schema up to date
 */
export async function openLeadStore(filename: string, logger: AppLogger = createStorageLogger()): Promise<Database> {
  const inMemory = filename === MEMORY_DATABASE;

  try {
    if (!inMemory) {
      fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }

    const db = await open({
      filename,
      driver: sqlite3.Database,
      mode: sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE
    });

    if (!inMemory) {
      await db.run('PRAGMA journal_mode = WAL');
    }
    await db.run('PRAGMA foreign_keys = ON');
    await db.run('PRAGMA busy_timeout = 5000');

    const applied = await runMigrations(db);
    if (applied.length > 0) {
      logger.info(`Applied migrations: ${applied.join(', ')}`, { filename }, 'open');
    }

    return db;
  } catch (error) {
    throw new SiteError(
      `Failed to open lead store ${filename}: ${toError(error).message}`,
      SiteErrorType.STORAGE_ERROR,
      'open',
      { filename }
    );
  }
}

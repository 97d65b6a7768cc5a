/**
 * Lead store schema migrations
 */

import { Database } from 'sqlite';

export interface Migration {
  version: number;
  description: string;
  up(db: Database): Promise<void>;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'Create demo request and newsletter tables',
    async up(db: Database): Promise<void> {
      await db.run(`
        CREATE TABLE IF NOT EXISTS demo_requests (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          first_name TEXT NOT NULL,
          last_name TEXT NOT NULL,
          email TEXT NOT NULL,
          phone TEXT,
          company TEXT NOT NULL,
          job_title TEXT,
          industry TEXT NOT NULL,
          company_size TEXT,
          interests TEXT NOT NULL DEFAULT '[]', -- JSON array
          message TEXT,
          submitted_at TEXT NOT NULL,
          sales_notified INTEGER NOT NULL DEFAULT 0,
          prospect_notified INTEGER NOT NULL DEFAULT 0,
          created_at DATETIME DEFAULT CURRENT_TIMESTAMP
        )
      `);

      await db.run(`
        CREATE TABLE IF NOT EXISTS newsletter_subscribers (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          email TEXT NOT NULL UNIQUE,
          source TEXT NOT NULL,
          subscribed_at TEXT NOT NULL
        )
      `);
    }
  },
  {
    version: 2,
    description: 'Index demo requests by submission time',
    async up(db: Database): Promise<void> {
      await db.run('CREATE INDEX IF NOT EXISTS idx_demo_requests_submitted_at ON demo_requests (submitted_at)');
    }
  }
];

/**
 * Apply every migration newer than the recorded version, each in its own transaction.
 * Returns the versions applied.
 */
export async function runMigrations(db: Database, migrations: readonly Migration[] = MIGRATIONS): Promise<number[]> {
  await db.run(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
    )
  `);

  const row = await db.get<{ version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations');
  const current = row?.version ?? 0;
  const applied: number[] = [];

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (migration.version <= current) {
      continue;
    }

    await db.run('BEGIN');
    try {
      await migration.up(db);
      await db.run(
        'INSERT INTO schema_migrations (version, description) VALUES (?, ?)',
        migration.version,
        migration.description
      );
      await db.run('COMMIT');
    } catch (error) {
      await db.run('ROLLBACK');
      throw error;
    }
    applied.push(migration.version);
  }

  return applied;
}

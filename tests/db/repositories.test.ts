/**
 * Lead store repository tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { Database } from 'sqlite';
import { MEMORY_DATABASE, openLeadStore } from '../../src/db/connection';
import { runMigrations } from '../../src/db/migrations';
import { DemoRequestRepository } from '../../src/db/repositories/demo-request.repository';
import { NewsletterRepository } from '../../src/db/repositories/newsletter.repository';
import { NewDemoRequest } from '../../src/db/types';
import { SiteError, SiteErrorType } from '../../src/utils/error-handler';
import { AppLogger } from '../../src/utils/logger';

const silent = new AppLogger({ consoleOutput: false });

function demoRequest(overrides: Partial<NewDemoRequest> = {}): NewDemoRequest {
  return {
    first_name: 'Ada',
    last_name: 'Lovelace',
    email: 'ada@example.com',
    phone: null,
    company: 'Analytical Works',
    job_title: 'Operations Manager',
    industry: 'power_distribution',
    company_size: '51-200',
    interests: ['Scheduling', 'Equipment'],
    message: null,
    submitted_at: '2026-03-15T12:00:00.000Z',
    ...overrides
  };
}

describe('lead store', () => {
  let db: Database;

  beforeEach(async () => {
    db = await openLeadStore(MEMORY_DATABASE, silent);
  });

  afterEach(async () => {
    await db.close();
  });

  test('migrations are applied once', async () => {
    expect(await runMigrations(db)).toEqual([]);
    const row = await db.get<{ version: number }>('SELECT MAX(version) AS version FROM schema_migrations');
    expect(row?.version).toBe(2);
  });

  describe('DemoRequestRepository', () => {
    let repository: DemoRequestRepository;

    beforeEach(() => {
      repository = new DemoRequestRepository(db);
    });

    test('stores and reads back a demo request', async () => {
      const created = await repository.create(demoRequest());

      expect(created).toMatchObject({
        id: 1,
        first_name: 'Ada',
        phone: null,
        interests: ['Scheduling', 'Equipment'],
        sales_notified: false,
        prospect_notified: false
      });
      expect(created.created_at).toBeInstanceOf(Date);
      expect(Number.isNaN(created.created_at.getTime())).toBe(false);
      expect(await repository.findById(created.id)).toEqual(created);
    });

    test('returns null for unknown ids', async () => {
      expect(await repository.findById(99)).toBeNull();
    });

    test('records notification results', async () => {
      const created = await repository.create(demoRequest());
      await repository.markNotified(created.id, { sales: true, prospect: false });

      const updated = await repository.findById(created.id);
      expect(updated?.sales_notified).toBe(true);
      expect(updated?.prospect_notified).toBe(false);
    });

    test('lists the newest requests first', async () => {
      await repository.create(demoRequest({ company: 'First', submitted_at: '2026-03-14T09:00:00.000Z' }));
      await repository.create(demoRequest({ company: 'Third', submitted_at: '2026-03-16T09:00:00.000Z' }));
      await repository.create(demoRequest({ company: 'Second', submitted_at: '2026-03-15T09:00:00.000Z' }));

      const recent = await repository.findRecent(2);

      expect(recent.map(request => request.company)).toEqual(['Third', 'Second']);
      expect(await repository.count()).toBe(3);
    });
  });

  describe('NewsletterRepository', () => {
    let repository: NewsletterRepository;

    beforeEach(() => {
      repository = new NewsletterRepository(db);
    });

    test('subscribes an address once', async () => {
      const first = await repository.subscribe('reader@example.com', 'website', '2026-03-15T12:00:00.000Z');
      const second = await repository.subscribe('reader@example.com', 'footer', '2026-03-16T12:00:00.000Z');

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.subscriber).toEqual({
        id: 1,
        email: 'reader@example.com',
        source: 'website',
        subscribed_at: '2026-03-15T12:00:00.000Z'
      });
      expect(await repository.count()).toBe(1);
    });

    test('lists the newest subscribers first', async () => {
      await repository.subscribe('one@example.com', 'website', '2026-03-14T12:00:00.000Z');
      await repository.subscribe('two@example.com', 'website', '2026-03-15T12:00:00.000Z');

      const recent = await repository.findRecent();
      expect(recent.map(subscriber => subscriber.email)).toEqual(['two@example.com', 'one@example.com']);
      expect(await repository.findByEmail('nobody@example.com')).toBeNull();
    });
  });
});

describe('openLeadStore', () => {
  test('creates the directory for a file database', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'site-leads-'));
    const filename = path.join(dir, 'data', 'leads.db');

    const db = await openLeadStore(filename, silent);
    await db.close();

    expect(fs.existsSync(filename)).toBe(true);
  });

  test('wraps open failures in a storage error', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'site-leads-'));
    const blocker = path.join(dir, 'not-a-directory');
    fs.writeFileSync(blocker, '');

    const attempt = openLeadStore(path.join(blocker, 'leads.db'), silent);

    await expect(attempt).rejects.toBeInstanceOf(SiteError);
    await expect(attempt).rejects.toMatchObject({ context: { errorType: SiteErrorType.STORAGE_ERROR } });
  });
});

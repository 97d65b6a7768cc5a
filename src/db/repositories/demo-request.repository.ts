import { Database } from 'sqlite';
import { DemoRequestRecord, DemoRequestStore, NewDemoRequest, NotificationFlags } from '../types';

interface DemoRequestRow {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  company: string;
  job_title: string | null;
  industry: string;
  company_size: string | null;
  interests: string;
  message: string | null;
  submitted_at: string;
  sales_notified: number;
  prospect_notified: number;
  created_at: string;
}

function parseInterests(value: string): string[] {
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
  } catch {
    return [];
  }
}

/**
 * Demo request data access
 */
export class DemoRequestRepository implements DemoRequestStore {
  constructor(private readonly db: Database) {}

  /**
   * Store a demo request
   */
  public async create(request: NewDemoRequest): Promise<DemoRequestRecord> {
    const result = await this.db.run(
      `INSERT INTO demo_requests (
        first_name, last_name, email, phone, company, job_title,
        industry, company_size, interests, message, submitted_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      request.first_name,
      request.last_name,
      request.email,
      request.phone,
      request.company,
      request.job_title,
      request.industry,
      request.company_size,
      JSON.stringify(request.interests),
      request.message,
      request.submitted_at
    );

    if (result.lastID === undefined) {
      throw new Error('Demo request insert returned no id');
    }

    const created = await this.findById(result.lastID);
    if (!created) {
      throw new Error(`Demo request ${result.lastID} missing after insert`);
    }
    return created;
  }

  public async findById(id: number): Promise<DemoRequestRecord | null> {
    const row = await this.db.get<DemoRequestRow>('SELECT * FROM demo_requests WHERE id = ?', id);
    return row ? this.mapToRecord(row) : null;
  }

  /**
   * Newest first
   */
  public async findRecent(limit: number = 20): Promise<DemoRequestRecord[]> {
    const rows = await this.db.all<DemoRequestRow[]>(
      'SELECT * FROM demo_requests ORDER BY submitted_at DESC, id DESC LIMIT ?',
      limit
    );
    return rows.map(row => this.mapToRecord(row));
  }

  /**
   * Record which notification emails went out
   */
  public async markNotified(id: number, flags: NotificationFlags): Promise<void> {
    await this.db.run(
      'UPDATE demo_requests SET sales_notified = ?, prospect_notified = ? WHERE id = ?',
      flags.sales ? 1 : 0,
      flags.prospect ? 1 : 0,
      id
    );
  }

  public async count(): Promise<number> {
    const row = await this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM demo_requests');
    return row?.count ?? 0;
  }

  private mapToRecord(row: DemoRequestRow): DemoRequestRecord {
    return {
      id: row.id,
      first_name: row.first_name,
      last_name: row.last_name,
      email: row.email,
      phone: row.phone,
      company: row.company,
      job_title: row.job_title,
      industry: row.industry,
      company_size: row.company_size,
      interests: parseInterests(row.interests),
      message: row.message,
      submitted_at: row.submitted_at,
      sales_notified: row.sales_notified === 1,
      prospect_notified: row.prospect_notified === 1,
      created_at: new Date(row.created_at.replace(' ', 'T') + 'Z')
    };
  }
}

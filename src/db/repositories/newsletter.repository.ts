import { Database } from 'sqlite';
import { NewsletterStore, NewsletterSubscriber, SubscribeResult } from '../types';

/**
 * Newsletter subscriber data access
 */
export class NewsletterRepository implements NewsletterStore {
  constructor(private readonly db: Database) {}

  /**
   * Add a subscriber; an address already on the list is left unchanged
   */
  public async subscribe(email: string, source: string, subscribedAt: string): Promise<SubscribeResult> {
    const result = await this.db.run(
      'INSERT OR IGNORE INTO newsletter_subscribers (email, source, subscribed_at) VALUES (?, ?, ?)',
      email,
      source,
      subscribedAt
    );

    const subscriber = await this.findByEmail(email);
    if (!subscriber) {
      throw new Error(`Subscriber ${email} missing after insert`);
    }

    return { subscriber, created: (result.changes ?? 0) > 0 };
  }

  public async findByEmail(email: string): Promise<NewsletterSubscriber | null> {
    const row = await this.db.get<NewsletterSubscriber>(
      'SELECT id, email, source, subscribed_at FROM newsletter_subscribers WHERE email = ?',
      email
    );
    return row ?? null;
  }

  /**
   * Newest first
   */
  public async findRecent(limit: number = 20): Promise<NewsletterSubscriber[]> {
    return this.db.all<NewsletterSubscriber[]>(
      'SELECT id, email, source, subscribed_at FROM newsletter_subscribers ORDER BY subscribed_at DESC, id DESC LIMIT ?',
      limit
    );
  }

  public async count(): Promise<number> {
    const row = await this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM newsletter_subscribers');
    return row?.count ?? 0;
  }
}

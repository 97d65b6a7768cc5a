/**
 * Newsletter signup tests
 */

import { NewsletterStore, NewsletterSubscriber, SubscribeResult } from '../../src/db/types';
import { NEWSLETTER_SUCCESS_MESSAGE, NewsletterService, WebhookClient } from '../../src/marketing/newsletter';
import { AppLogger } from '../../src/utils/logger';

const NOW = new Date('2026-03-15T12:00:00.000Z');
const WEBHOOK_URL = 'https://lists.example.com/hook';

class MemoryNewsletterStore implements NewsletterStore {
  readonly subscribers = new Map<string, NewsletterSubscriber>();

  async subscribe(email: string, source: string, subscribedAt: string): Promise<SubscribeResult> {
    const existing = this.subscribers.get(email);
    if (existing) {
      return { subscriber: existing, created: false };
    }
    const subscriber = { id: this.subscribers.size + 1, email, source, subscribed_at: subscribedAt };
    this.subscribers.set(email, subscriber);
    return { subscriber, created: true };
  }
}

describe('NewsletterService', () => {
  let store: MemoryNewsletterStore;
  let post: jest.Mock<Promise<{ status: number }>, [string, unknown, { timeout?: number }?]>;

  function createService(options: { webhookUrl?: string } = { webhookUrl: WEBHOOK_URL }): NewsletterService {
    const webhookClient: WebhookClient = { post };
    return new NewsletterService({
      store,
      webhookUrl: options.webhookUrl,
      webhookClient,
      logger: new AppLogger({ consoleOutput: false }),
      clock: () => NOW
    });
  }

  beforeEach(() => {
    store = new MemoryNewsletterStore();
    post = jest.fn(async (url: string, data: unknown, config?: { timeout?: number }) => ({ status: 200 }));
  });

  test('success message', () => {
    expect(NEWSLETTER_SUCCESS_MESSAGE).toBe('Thank you for subscribing!');
  });

  test('normalizes the address, stores it and forwards it', async () => {
    const outcome = await createService().signup('  Jane@Example.COM ');

    expect(outcome).toEqual({ email: 'jane@example.com', created: true, forwarded: true });
    expect(store.subscribers.get('jane@example.com')?.source).toBe('website');
    expect(post).toHaveBeenCalledWith(
      WEBHOOK_URL,
      { email: 'jane@example.com', source: 'website', subscribed_at: '2026-03-15T12:00:00.000Z' },
      { timeout: 5000 }
    );
  });

  test('treats a repeated signup as success without forwarding again', async () => {
    const service = createService();
    await service.signup('jane@example.com');

    const outcome = await service.signup('JANE@example.com', 'footer');

    expect(outcome).toEqual({ email: 'jane@example.com', created: false, forwarded: false });
    expect(post).toHaveBeenCalledTimes(1);
  });

  test('keeps signups local without a webhook', async () => {
    const outcome = await createService({}).signup('jane@example.com');

    expect(outcome.created).toBe(true);

    expect(outcome.forwarded).toBe(false);
    expect(post).not.toHaveBeenCalled();
  });

  test('keeps the signup when the webhook fails', async () => {
    post.mockRejectedValueOnce(new Error('timeout of 5000ms exceeded'));

    const outcome = await createService().signup('jane@example.com');

    expect(outcome).toEqual({ email: 'jane@example.com', created: true, forwarded: false });
    expect(store.subscribers.size).toBe(1);
  });

  test('does not count a non-2xx webhook reply as forwarded', async () => {
    post.mockResolvedValueOnce({ status: 500 });
    expect((await createService().signup('jane@example.com')).forwarded).toBe(false);
  });

  test.each([
    ['', 'Email is required'],
    ['   ', 'Email is required'],
    [undefined, 'Email is required'],
    ['not-an-email', 'Please enter a valid email address'],
    ['two words@example.com', 'Please enter a valid email address'],
    ['a@example.com, b@example.org', 'Please enter a valid email address'],
    ['Jane <jane@example.com>', 'Please enter a valid email address']
  ])('rejects %p', async (email, message) => {
    await expect(createService().signup(email)).rejects.toThrow(message);
    expect(store.subscribers.size).toBe(0);
  });
});

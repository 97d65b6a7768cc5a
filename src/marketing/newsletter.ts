/**
 * Newsletter signups
 */

import axios from 'axios';
import { NewsletterStore } from '../db/types';
import { isEmailAddress } from '../email/address';
import { AppLogger, createMarketingLogger } from '../utils/logger';
import { SiteError, SiteErrorType, toError } from '../utils/error-handler';

export const NEWSLETTER_SUCCESS_MESSAGE = 'Thank you for subscribing!';

export interface WebhookClient {
  post(url: string, data: unknown, config?: { timeout?: number }): Promise<{ status: number }>;
}

export interface SignupOutcome {
  email: string;
  /** false when the address was already on the list */
  created: boolean;
  /** true when the mailing list webhook accepted the signup */
  forwarded: boolean;
}

export interface NewsletterServiceOptions {
  store: NewsletterStore;
  webhookUrl?: string;
  webhookClient?: WebhookClient;
  logger?: AppLogger;
  clock?: () => Date;
}

export class NewsletterService {
  private readonly store: NewsletterStore;
  private readonly webhookUrl?: string;
  private readonly webhookClient: WebhookClient;
  private readonly logger: AppLogger;
  private readonly clock: () => Date;

  constructor(options: NewsletterServiceOptions) {
    this.store = options.store;
    this.webhookUrl = options.webhookUrl;
    this.webhookClient = options.webhookClient ?? axios.create({ timeout: 5000 });
    this.logger = options.logger ?? createMarketingLogger('newsletter');
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Subscribe an address. Signing up twice is not an error.
   */
  async signup(rawEmail: unknown, source: string = 'website'): Promise<SignupOutcome> {
    const email = typeof rawEmail === 'string' ? rawEmail.trim().toLowerCase() : '';

    if (email.length === 0) {
      throw new SiteError('Email is required', SiteErrorType.VALIDATION_ERROR, 'signup');
    }
    if (!isEmailAddress(email)) {
      throw new SiteError('Please enter a valid email address', SiteErrorType.VALIDATION_ERROR, 'signup');
    }

    const subscribedAt = this.clock().toISOString();
    const { created } = await this.store.subscribe(email, source, subscribedAt);
    this.logger.info(`Newsletter signup: ${email}`, { created, source }, 'signup');

    const forwarded = created ? await this.forward(email, source, subscribedAt) : false;
    return { email, created, forwarded };
  }

  private async forward(email: string, source: string, subscribedAt: string): Promise<boolean> {
    if (!this.webhookUrl) {
      return false;
    }

    try {
      const response = await this.webhookClient.post(
        this.webhookUrl,
        { email, source, subscribed_at: subscribedAt },
        { timeout: 5000 }
      );
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      this.logger.warn(`Mailing list webhook failed: ${toError(error).message}`, { email }, 'forward');
      return false;
    }
  }
}

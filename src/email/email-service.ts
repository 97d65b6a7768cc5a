/**
 * Email delivery
 *
 * Sends mail over SMTP with nodemailer. Delivery never throws: a missing
 * configuration or a transport failure is logged and reported as false.
 */

import nodemailer, { SendMailOptions } from 'nodemailer';
import { EmailConfig, getEmailConfig, isEmailConfigured } from '../config';
import { AppLogger, createEmailLogger } from '../utils/logger';
import { toError } from '../utils/error-handler';

export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId?: string }>;
}

export type TransportFactory = (config: EmailConfig) => MailTransport;

export interface DeliveryResult {
  success: boolean;
  subject: string;
  recipients: string[];
  messageId?: string;
  /** Why nothing was sent or what failed */
  error?: string;
  timestamp: Date;
}

/**
 * SMTP transport: implicit TLS on 465, STARTTLS required on other ports
 */
export function createSmtpTransport(config: EmailConfig): MailTransport {
  const implicitTls = config.smtpPort === 465;
  return nodemailer.createTransport({
    host: config.smtpServer,
    port: config.smtpPort,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: {
      user: config.smtpUser,
      pass: config.smtpPass
    },
    connectionTimeout: 10000,
    greetingTimeout: 10000
  });
}

/**
 * Delivery history tracker
 */
export class DeliveryHistory {
  private history: DeliveryResult[] = [];

  constructor(private readonly maxEntries: number = 500) {}

  record(result: DeliveryResult): void {
    this.history.push(result);
    if (this.history.length > this.maxEntries) {
      this.history.shift();
    }
  }

  /**
   * Newest first
   */
  getHistory(limit?: number): DeliveryResult[] {
    const sorted = [...this.history].reverse();
    return limit !== undefined ? sorted.slice(0, limit) : sorted;
  }

  getHistoryForRecipient(recipient: string, limit?: number): DeliveryResult[] {
    const wanted = recipient.toLowerCase();
    const filtered = this.getHistory().filter(result =>
      result.recipients.some(address => address.toLowerCase() === wanted)
    );
    return limit !== undefined ? filtered.slice(0, limit) : filtered;
  }

  /**
   * Percentage of successful deliveries; 100 when nothing was sent
   */
  getSuccessRate(): number {
    if (this.history.length === 0) return 100;

    const successes = this.history.filter(result => result.success).length;
    return (successes / this.history.length) * 100;
  }

  clear(): void {
    this.history = [];
  }
}

export interface EmailServiceOptions {
  configProvider?: () => EmailConfig;
  transportFactory?: TransportFactory;
  logger?: AppLogger;
  history?: DeliveryHistory;
}

export class EmailService {
  private readonly configProvider: () => EmailConfig;
  private readonly transportFactory: TransportFactory;
  private readonly logger: AppLogger;
  readonly history: DeliveryHistory;

  constructor(options: EmailServiceOptions = {}) {
    this.configProvider = options.configProvider ?? (() => getEmailConfig());
    this.transportFactory = options.transportFactory ?? createSmtpTransport;
    this.logger = options.logger ?? createEmailLogger();
    this.history = options.history ?? new DeliveryHistory();
  }

  /**
   * Current settings, read from the provider on every call
   */
  getConfig(): EmailConfig {
    return this.configProvider();
  }

  isConfigured(): boolean {
    return isEmailConfigured(this.configProvider());
  }

  /**
   * Send an email; true when the SMTP server accepted it
   */
  async sendEmail(subject: string, body: string, recipients: string[], isHtml = true): Promise<boolean> {
    const result = await this.deliver(subject, body, recipients, isHtml);
    return result.success;
  }

  async deliver(subject: string, body: string, recipients: string[], isHtml = true): Promise<DeliveryResult> {
    const config = this.configProvider();

    if (!isEmailConfigured(config)) {
      this.logger.warn(`SMTP not configured - Email not sent: ${subject}`, {
        smtpUserSet: Boolean(config.smtpUser),
        smtpPassSet: Boolean(config.smtpPass)
      }, 'send');
      return this.finish({ success: false, subject, recipients, error: 'SMTP not configured', timestamp: new Date() });
    }

    if (recipients.length === 0) {
      this.logger.warn(`No recipients - Email not sent: ${subject}`, undefined, 'send');
      return this.finish({ success: false, subject, recipients, error: 'No recipients', timestamp: new Date() });
    }

    const message: SendMailOptions = {
      from: config.smtpUser,
      to: recipients.join(', '),
      subject,
      ...(isHtml ? { html: body } : { text: body })
    };

    try {
      const info = await this.transportFactory(config).sendMail(message);
      this.logger.info(`Email sent: ${subject}`, { recipients: recipients.length }, 'send');
      return this.finish({ success: true, subject, recipients, messageId: info.messageId, timestamp: new Date() });
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Failed to send email: ${subject}`, err, { server: config.smtpServer, port: config.smtpPort }, 'send');
      return this.finish({ success: false, subject, recipients, error: err.message, timestamp: new Date() });
    }
  }

  private finish(result: DeliveryResult): DeliveryResult {
    this.history.record(result);
    return result;
  }
}

/**
 * Demo request handling
 *
 * Turns a submitted contact form into a stored lead, a notification to the
 * sales inbox and a confirmation to the prospect.
 */

import { isEmailAddress } from '../email/address';
import { EmailService } from '../email/email-service';
import { SiteIdentity } from '../config';
import { DemoRequestStore, NewDemoRequest } from '../db/types';
import { TemplateLoader, escapeHtml, templateLoader } from '../templates/html-template';
import { AppLogger, createMarketingLogger } from '../utils/logger';
import { SiteError, SiteErrorType, toError } from '../utils/error-handler';

export type FormBody = Record<string, unknown>;

export interface DemoRequestForm {
  first_name: string;
  last_name: string;
  email: string;
  phone: string;
  company: string;
  job_title: string;
  industry: string;
  company_size: string;
  interests: string[];
  message: string;
  submitted_at: string;
}

export type DemoRequestField = Exclude<keyof DemoRequestForm, 'interests' | 'submitted_at'>;

export const REQUIRED_FIELDS: readonly DemoRequestField[] = ['first_name', 'last_name', 'email', 'company', 'industry'];

const TEXT_FIELDS: readonly DemoRequestField[] = [
  'first_name',
  'last_name',
  'email',
  'phone',
  'company',
  'job_title',
  'industry',
  'company_size',
  'message'
];

export const DEMO_REQUEST_SUCCESS_MESSAGE = 'Thank you for your interest! Our team will contact you within 24 hours.';

export interface RenderedEmail {
  subject: string;
  body: string;
}

export interface DemoRequestOutcome {
  /** Stored lead id, null when the lead store failed */
  id: number | null;
  salesNotified: boolean;
  prospectNotified: boolean;
}

function textValue(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return textValue(value.find(item => typeof item === 'string'));
  }
  return '';
}

function listValue(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Read a demo request from a parsed form or JSON body
 */
export function parseDemoRequest(body: FormBody, now: Date = new Date()): DemoRequestForm {
  const form: DemoRequestForm = {
    first_name: '',
    last_name: '',
    email: '',
    phone: '',
    company: '',
    job_title: '',
    industry: '',
    company_size: '',
    interests: listValue(body.interests ?? body['interests[]']),
    message: '',
    submitted_at: now.toISOString()
  };

  for (const field of TEXT_FIELDS) {
    form[field] = textValue(body[field]);
  }

  return form;
}

/**
 * Required fields that are absent or empty, in form order
 */
export function findMissingFields(form: DemoRequestForm): DemoRequestField[] {
  return REQUIRED_FIELDS.filter(field => form[field].length === 0);
}

/**
 * Label for an industry code; unknown codes are shown as submitted
 */
export function industryDisplayName(code: string, industries: Record<string, string>): string {
  return Object.prototype.hasOwnProperty.call(industries, code) ? industries[code] : code;
}

function orPlaceholder(value: string, placeholder = 'Not provided'): string {
  return value.length > 0 ? value : placeholder;
}

/**
 * Escaped message text with line breaks kept
 */
export function messageToHtml(message: string): string {
  if (message.length === 0) {
    return 'No message provided';
  }
  return escapeHtml(message).replace(/\r?\n/g, '<br>\n');
}

export function buildSalesNotification(
  form: DemoRequestForm,
  industries: Record<string, string>,
  templates: TemplateLoader = templateLoader
): RenderedEmail {
  const subject = `New Demo Request: ${form.company} - ${form.first_name} ${form.last_name}`;
  const body = templates.load('emails/sales-notification')
    .setVariables({
      name: `${form.first_name} ${form.last_name}`,
      email: form.email,
      phone: orPlaceholder(form.phone),
      company: form.company,
      job_title: orPlaceholder(form.job_title),
      industry: industryDisplayName(form.industry, industries),
      company_size: orPlaceholder(form.company_size),
      interests: form.interests.length > 0 ? form.interests.join(', ') : 'Not specified',
      submitted_at: form.submitted_at
    })
    .setRaw('message_html', messageToHtml(form.message))
    .render();

  return { subject, body };
}

export function buildProspectConfirmation(
  form: DemoRequestForm,
  site: SiteIdentity,
  year: number,
  templates: TemplateLoader = templateLoader
): RenderedEmail {
  const subject = `Thank you for your interest in ${site.name}`;
  const body = templates.load('emails/prospect-confirmation')
    .setVariables({
      site_name: site.name,
      tagline: site.tagline,
      site_url: site.url.replace(/\/+$/, ''),
      site_host: site.url.replace(/^https?:\/\//, '').replace(/\/+$/, ''),
      contact_email: site.contactEmail,
      first_name: form.first_name,
      company: form.company,
      year
    })
    .render();

  return { subject, body };
}

function toNewDemoRequest(form: DemoRequestForm): NewDemoRequest {
  const nullable = (value: string): string | null => (value.length > 0 ? value : null);
  return {
    first_name: form.first_name,
    last_name: form.last_name,
    email: form.email,
    phone: nullable(form.phone),
    company: form.company,
    job_title: nullable(form.job_title),
    industry: form.industry,
    company_size: nullable(form.company_size),
    interests: form.interests,
    message: nullable(form.message),
    submitted_at: form.submitted_at
  };
}

export interface DemoRequestServiceOptions {
  emailService: EmailService;
  store: DemoRequestStore;
  site: SiteIdentity;
  industries: Record<string, string>;
  templates?: TemplateLoader;
  logger?: AppLogger;
  clock?: () => Date;
}

export class DemoRequestService {
  private readonly emailService: EmailService;
  private readonly store: DemoRequestStore;
  private readonly site: SiteIdentity;
  private readonly industries: Record<string, string>;
  private readonly templates: TemplateLoader;
  private readonly logger: AppLogger;
  private readonly clock: () => Date;

  constructor(options: DemoRequestServiceOptions) {
    this.emailService = options.emailService;
    this.store = options.store;
    this.site = options.site;
    this.industries = options.industries;
    this.templates = options.templates ?? templateLoader;
    this.logger = options.logger ?? createMarketingLogger('demo-request');
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Validate, store and announce a demo request.
   * Storage and email failures are logged; only invalid input is raised.
   */
  async submit(body: FormBody): Promise<DemoRequestOutcome> {
    const now = this.clock();
    const form = parseDemoRequest(body, now);

    const missing = findMissingFields(form);
    if (missing.length > 0) {
      throw new SiteError(
        `Missing required fields: ${missing.join(', ')}`,
        SiteErrorType.VALIDATION_ERROR,
        'submit',
        { missing }
      );
    }
    if (!isEmailAddress(form.email)) {
      throw new SiteError('Please enter a valid email address', SiteErrorType.VALIDATION_ERROR, 'submit', {
        field: 'email'
      });
    }

    let id: number | null = null;
    try {
      const record = await this.store.create(toNewDemoRequest(form));
      id = record.id;
    } catch (error) {
      this.logger.error('Failed to store demo request', toError(error), { company: form.company }, 'submit');
    }

    const sales = buildSalesNotification(form, this.industries, this.templates);
    const prospect = buildProspectConfirmation(form, this.site, now.getFullYear(), this.templates);
    const salesEmail = this.emailService.getConfig().salesEmail;

    const salesNotified = await this.emailService.sendEmail(sales.subject, sales.body, [salesEmail]);
    const prospectNotified = await this.emailService.sendEmail(prospect.subject, prospect.body, [form.email]);

    if (id !== null) {
      try {
        await this.store.markNotified(id, { sales: salesNotified, prospect: prospectNotified });
      } catch (error) {
        this.logger.error('Failed to record notification status', toError(error), { id }, 'submit');
      }
    }

    this.logger.info(
      `Demo request processed for ${form.first_name} ${form.last_name} at ${form.company}`,
      { id, salesNotified, prospectNotified },
      'submit'
    );

    return { id, salesNotified, prospectNotified };
  }
}

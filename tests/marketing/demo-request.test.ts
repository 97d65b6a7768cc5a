/**
 * Demo request tests
 */

import { SendMailOptions } from 'nodemailer';
import { DEFAULT_INDUSTRIES, DEFAULT_SITE, EmailConfig } from '../../src/config';
import { DemoRequestRecord, DemoRequestStore, NewDemoRequest, NotificationFlags } from '../../src/db/types';
import { EmailService } from '../../src/email/email-service';
import {
  DemoRequestService,
  buildProspectConfirmation,
  buildSalesNotification,
  findMissingFields,
  industryDisplayName,
  messageToHtml,
  parseDemoRequest
} from '../../src/marketing/demo-request';
import { SiteError, SiteErrorType } from '../../src/utils/error-handler';
import { AppLogger } from '../../src/utils/logger';

const NOW = new Date('2026-03-15T12:00:00.000Z');
const silent = new AppLogger({ consoleOutput: false });

const emailConfig: EmailConfig = {
  smtpServer: 'smtp.example.com',
  smtpPort: 587,
  smtpUser: 'sender@example.com',
  smtpPass: 'test-password',
  marketingEmail: 'info@example.com',
  salesEmail: 'sales@example.com'
};

const validBody = {
  first_name: ' Grace ',
  last_name: 'Hopper',
  email: 'grace@example.com',
  phone: '',
  company: 'A&B Utilities',
  job_title: 'Fleet Manager',
  industry: 'power_distribution',
  company_size: '51-200',
  interests: ['Scheduling', 'Reports'],
  message: 'We run <40> crews.\nNeed scheduling.'
};

describe('parseDemoRequest', () => {
  test('trims text and collects interests', () => {
    const form = parseDemoRequest(validBody, NOW);

    expect(form).toEqual({
      first_name: 'Grace',
      last_name: 'Hopper',
      email: 'grace@example.com',
      phone: '',
      company: 'A&B Utilities',
      job_title: 'Fleet Manager',
      industry: 'power_distribution',
      company_size: '51-200',
      interests: ['Scheduling', 'Reports'],
      message: 'We run <40> crews.\nNeed scheduling.',
      submitted_at: '2026-03-15T12:00:00.000Z'
    });
  });

  test('accepts bracketed interest names, single values and repeated fields', () => {
    const form = parseDemoRequest({ 'interests[]': 'Inventory', first_name: ['Ada', 'Other'], phone: 5551234 }, NOW);

    expect(form.interests).toEqual(['Inventory']);
    expect(form.first_name).toBe('Ada');
    expect(form.phone).toBe('5551234');
  });
});

describe('findMissingFields', () => {
  test('lists empty required fields in form order', () => {
    const form = parseDemoRequest({ first_name: 'Ada', email: 'ada@example.com', company: '  ' }, NOW);
    expect(findMissingFields(form)).toEqual(['last_name', 'company', 'industry']);
  });
});

describe('industryDisplayName', () => {
  test('uses the label, or the code when unknown', () => {
    expect(industryDisplayName('telecom', DEFAULT_INDUSTRIES)).toBe('Telecommunications');
    expect(industryDisplayName('shipbuilding', DEFAULT_INDUSTRIES)).toBe('shipbuilding');
    expect(industryDisplayName('toString', DEFAULT_INDUSTRIES)).toBe('toString');
  });
});

describe('messageToHtml', () => {
  test('escapes and keeps line breaks', () => {
    expect(messageToHtml('Line <1>\nLine 2')).toBe('Line &lt;1&gt;<br>\nLine 2');
  });

  test('says when there is no message', () => {
    expect(messageToHtml('')).toBe('No message provided');
  });
});

describe('notification emails', () => {
  const form = parseDemoRequest(validBody, NOW);

  test('sales notification lists the lead details', () => {
    const email = buildSalesNotification(form, DEFAULT_INDUSTRIES);

    expect(email.subject).toBe('New Demo Request: A&B Utilities - Grace Hopper');
    expect(email.body).toContain('>A&amp;B Utilities</td>');
    expect(email.body).toContain('>Power Distribution / Electric Utility</td>');
    expect(email.body).toContain('>Not provided</td>');
    expect(email.body).toContain('>Scheduling, Reports</td>');
    expect(email.body).toContain('We run &lt;40&gt; crews.<br>\nNeed scheduling.');
    expect(email.body).not.toContain('{{');
  });

  test('prospect confirmation greets the visitor', () => {
    const email = buildProspectConfirmation(form, DEFAULT_SITE, 2026);

    expect(email.subject).toBe('Thank you for your interest in Vigil Build');
    expect(email.body).toContain('Grace');
    expect(email.body).toContain('A&amp;B Utilities');
    expect(email.body).toContain('https://vigilbuild.com');
    expect(email.body).not.toContain('{{');
  });
});

describe('DemoRequestService', () => {
  let store: {
    create: jest.Mock<Promise<DemoRequestRecord>, [NewDemoRequest]>;
    markNotified: jest.Mock<Promise<void>, [number, NotificationFlags]>;
  };
  let sendMail: jest.Mock<Promise<{ messageId?: string }>, [SendMailOptions]>;
  let config: EmailConfig;

  function createService(): DemoRequestService {
    const demoStore: DemoRequestStore = store;
    return new DemoRequestService({
      emailService: new EmailService({
        configProvider: () => config,
        transportFactory: () => ({ sendMail }),
        logger: silent
      }),
      store: demoStore,
      site: DEFAULT_SITE,
      industries: DEFAULT_INDUSTRIES,
      logger: silent,
      clock: () => NOW
    });
  }

  beforeEach(() => {
    config = { ...emailConfig };
    store = {
      create: jest.fn(async (request: NewDemoRequest): Promise<DemoRequestRecord> => ({
        ...request,
        id: 7,
        sales_notified: false,
        prospect_notified: false,
        created_at: NOW
      })),
      markNotified: jest.fn(async (id: number, flags: NotificationFlags): Promise<void> => undefined)
    };
    sendMail = jest.fn(async (mail: SendMailOptions): Promise<{ messageId?: string }> => ({ messageId: '<1@example.com>' }));
  });

  test('stores the lead and emails sales, then the prospect', async () => {
    const outcome = await createService().submit(validBody);

    expect(outcome).toEqual({ id: 7, salesNotified: true, prospectNotified: true });
    expect(store.create).toHaveBeenCalledWith(expect.objectContaining({
      first_name: 'Grace',
      phone: null,
      interests: ['Scheduling', 'Reports'],
      submitted_at: '2026-03-15T12:00:00.000Z'
    }));
    expect(sendMail.mock.calls.map(([mail]) => mail.to)).toEqual(['sales@example.com', 'grace@example.com']);
    expect(sendMail.mock.calls[0][0].subject).toBe('New Demo Request: A&B Utilities - Grace Hopper');
    expect(store.markNotified).toHaveBeenCalledWith(7, { sales: true, prospect: true });
  });

  test('rejects incomplete requests before storing anything', async () => {
    const attempt = createService().submit({ first_name: 'Ada', email: 'ada@example.com' });

    await expect(attempt).rejects.toThrow('Missing required fields: last_name, company, industry');
    await expect(attempt).rejects.toBeInstanceOf(SiteError);
    expect(store.create).not.toHaveBeenCalled();
    expect(sendMail).not.toHaveBeenCalled();
  });

  test.each([
    'a@example.com, other@example.org, third@example.org',
    'a@example.com;other@example.org',
    'Visitor <a@example.com>',
    'not-an-address'
  ])('rejects the address %p before storing or emailing', async email => {
    const attempt = createService().submit({ ...validBody, email });

    await expect(attempt).rejects.toThrow('Please enter a valid email address');
    await expect(attempt).rejects.toBeInstanceOf(SiteError);
    expect(store.create).not.toHaveBeenCalled();
    expect(sendMail).not.toHaveBeenCalled();
  });

  test('still emails when the lead store fails', async () => {
    store.create.mockRejectedValueOnce(new Error('disk full'));

    const outcome = await createService().submit(validBody);

    expect(outcome).toEqual({ id: null, salesNotified: true, prospectNotified: true });
    expect(sendMail).toHaveBeenCalledTimes(2);
    expect(store.markNotified).not.toHaveBeenCalled();
  });

  test('records failed notifications when SMTP is not configured', async () => {
    config.smtpPass = '';

    const outcome = await createService().submit(validBody);

    expect(outcome).toEqual({ id: 7, salesNotified: false, prospectNotified: false });
    expect(store.markNotified).toHaveBeenCalledWith(7, { sales: false, prospect: false });
  });

  test('validation errors carry the missing field names', async () => {
    let caught: unknown;
    try {
      await createService().submit({});
    } catch (error) {
      caught = error;
    }

    expect(caught instanceof SiteError && caught.errorType).toBe(SiteErrorType.VALIDATION_ERROR);
    expect(caught instanceof SiteError && caught.context.details).toEqual({
      missing: ['first_name', 'last_name', 'email', 'company', 'industry']
    });
  });
});

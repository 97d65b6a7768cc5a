/**
 * Process wiring: configuration, lead store, services and the HTTP listener
 */

import http from 'http';
import { Database } from 'sqlite';
import { ConfigManager, SiteConfig } from '../config';
import { EnvLoader } from '../config/env';
import { ValidationReport, validateDeployment } from '../config/validator';
import { openLeadStore } from '../db/connection';
import { DemoRequestRepository } from '../db/repositories/demo-request.repository';
import { NewsletterRepository } from '../db/repositories/newsletter.repository';
import { EmailService } from '../email/email-service';
import { DemoRequestService } from '../marketing/demo-request';
import { NewsletterService } from '../marketing/newsletter';
import { ConfigurationError } from '../utils/error-handler';
import { configureLogging, defaultLogger } from '../utils/logger';
import { createApp } from './app';

export interface RunningServer {
  config: SiteConfig;
  server: http.Server;
  db: Database;
  /** Stop accepting connections and close the lead store */
  close(): Promise<void>;
}

export interface StartOptions {
  configManager?: ConfigManager;
  env?: NodeJS.ProcessEnv;
}

/**
 * Fail on production errors, log the rest
 */
export function enforceDeploymentReport(report: ValidationReport): void {
  for (const warning of report.warnings) {
    defaultLogger.warn(warning, undefined, 'startup');
  }
  if (report.status === 'fail') {
    throw new ConfigurationError(report.errors);
  }
}

export async function startServer(options: StartOptions = {}): Promise<RunningServer> {
  const env = options.env ?? process.env;
  if (!options.configManager) {
    EnvLoader.initialize();
  }

  const configManager = options.configManager ?? new ConfigManager({ env });
  enforceDeploymentReport(validateDeployment(env));
  const config = configManager.getConfig();
  configureLogging({ minLevel: config.logLevel, filePath: config.logFile });

  const db = await openLeadStore(config.leadsDbPath);
  const emailService = new EmailService({ configProvider: () => configManager.getEmailConfig() });

  const app = createApp({
    config,
    emailService,
    demoRequests: new DemoRequestService({
      emailService,
      store: new DemoRequestRepository(db),
      site: config.site,
      industries: config.industries
    }),
    newsletter: new NewsletterService({
      store: new NewsletterRepository(db),
      webhookUrl: config.newsletterWebhookUrl
    })
  });

  const server = http.createServer(app);
  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.port, config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
  } catch (error) {
    await db.close();
    throw error;
  }

  defaultLogger.info(`${config.site.name} listening on ${config.host}:${config.port}`, {
    environment: config.environment,
    debug: config.debug,
    email: emailService.isConfigured()
  }, 'startup');

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    await db.close();
    defaultLogger.info('Server stopped', undefined, 'shutdown');
  };

  return { config, server, db, close };
}

/**
 * HTTP application
 */

import express, { Application, NextFunction, Request, Response } from 'express';
import { SiteConfig } from '../config';
import { EmailService } from '../email/email-service';
import { DemoRequestService } from '../marketing/demo-request';
import { NewsletterService } from '../marketing/newsletter';
import { GENERIC_ERROR_MESSAGE, MarketingRoutes } from '../marketing/routes';
import { TemplateLoader } from '../templates/html-template';
import { SiteErrorHandler, SiteErrorType, isSiteError, siteErrorHandler } from '../utils/error-handler';
import { AppLogger, createHttpLogger } from '../utils/logger';
import { fromProjectRoot } from '../utils/paths';

export interface AppDependencies {
  config: SiteConfig;
  emailService: EmailService;
  demoRequests: DemoRequestService;
  newsletter: NewsletterService;
  templates?: TemplateLoader;
  errorHandler?: SiteErrorHandler;
  logger?: AppLogger;
  clock?: () => Date;
  /** Directory served under /static */
  publicDir?: string;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status: unknown = Reflect.get(error, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(deps: AppDependencies): Application {
  const { config } = deps;
  const logger = deps.logger ?? createHttpLogger();
  const errorHandler = deps.errorHandler ?? siteErrorHandler;
  const publicDir = deps.publicDir ?? fromProjectRoot('public');
  const startedAt = Date.now();

  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', config.isProduction);

  // middleware
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: true, limit: '100kb' }));
  app.use((req: Request, res: Response, next: NextFunction) => {
    const started = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
      logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode}`, { durationMs: Math.round(durationMs) }, 'request');
    });
    next();
  });

  // static assets
  app.use('/static', express.static(publicDir, { maxAge: config.isProduction ? '1d' : 0 }));
  app.get('/sw.js', (req: Request, res: Response) => {
    res.sendFile('sw.js', { root: publicDir });
  });
  app.get('/manifest.json', (req: Request, res: Response) => {
    res.sendFile('manifest.json', { root: publicDir });
  });

  app.get('/', (req: Request, res: Response) => {
    res.redirect(302, '/marketing/');
  });

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      environment: config.environment,
      uptime: Math.round((Date.now() - startedAt) / 1000),
      email: deps.emailService.isConfigured() ? 'configured' : 'not configured'
    });
  });

  const marketing = new MarketingRoutes({
    config,
    demoRequests: deps.demoRequests,
    newsletter: deps.newsletter,
    templates: deps.templates,
    errorHandler,
    clock: deps.clock
  });
  app.use('/marketing', marketing.router);

  // 404
  app.use((req: Request, res: Response) => {
    res.status(404).json({ success: false, message: 'Not found' });
  });

  // errors
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const clientStatus = httpStatusOf(error);
    if (clientStatus !== undefined) {
      errorHandler.handleError(error, { errorType: SiteErrorType.VALIDATION_ERROR, operation: req.path });
      res.status(clientStatus).json({ success: false, message: 'Invalid request body' });
      return;
    }

    const status = errorHandler.handleError(error, { operation: req.path });
    const exposeMessage = config.debug || (isSiteError(error) && status < 500);
    const message = exposeMessage && error instanceof Error ? error.message : GENERIC_ERROR_MESSAGE;
    res.status(status).json({ success: false, message });
  });

  return app;
}

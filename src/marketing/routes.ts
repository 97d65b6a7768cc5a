/**
 * Marketing website routes
 * Public pages and form endpoints, no authentication
 */

import { Request, Response, Router } from 'express';
import { SiteConfig } from '../config';
import { DEMO_REQUEST_SUCCESS_MESSAGE, DemoRequestService, FormBody } from './demo-request';
import { NEWSLETTER_SUCCESS_MESSAGE, NewsletterService } from './newsletter';
import { PageSlug, renderPage } from './pages';
import { FlashMessage, consumeFlash, setFlash } from '../server/flash';
import { TemplateLoader, templateLoader } from '../templates/html-template';
import { SiteErrorHandler, SiteErrorType, isSiteError, siteErrorHandler } from '../utils/error-handler';

export const GENERIC_ERROR_MESSAGE = 'An error occurred. Please try again.';

export interface MarketingRoutesOptions {
  config: SiteConfig;
  demoRequests: DemoRequestService;
  newsletter: NewsletterService;
  templates?: TemplateLoader;
  errorHandler?: SiteErrorHandler;
  clock?: () => Date;
}

/**
 * fetch() and JSON clients get JSON replies; plain form posts get a redirect
 */
export function wantsJson(req: Request): boolean {
  const accept = req.get('Accept') ?? '';
  const fetchMode = req.get('Sec-Fetch-Mode') ?? '';
  return Boolean(req.is('application/json')) || accept.startsWith('*/*') || fetchMode.includes('fetch');
}

function formBody(req: Request): FormBody {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? { ...body } : {};
}

export class MarketingRoutes {
  readonly router: Router;
  private readonly options: MarketingRoutesOptions;
  private readonly templates: TemplateLoader;
  private readonly errorHandler: SiteErrorHandler;
  private readonly clock: () => Date;

  constructor(options: MarketingRoutesOptions) {
    this.options = options;
    this.templates = options.templates ?? templateLoader;
    this.errorHandler = options.errorHandler ?? siteErrorHandler;
    this.clock = options.clock ?? (() => new Date());
    this.router = Router();

    this.setupRoutes();
  }

  private setupRoutes(): void {
    // pages
    this.router.get('/', this.page('home'));
    this.router.get('/features', this.page('features'));
    this.router.get('/about', this.page('about'));
    this.router.get('/contact', this.page('contact'));

    // forms
    this.router.post('/demo-request', this.demoRequest.bind(this));
    this.router.post('/newsletter', this.newsletterSignup.bind(this));
  }

  private page(slug: PageSlug) {
    return (req: Request, res: Response): void => {
      const { config } = this.options;
      const flash: FlashMessage | null = slug === 'contact' ? consumeFlash(req, res, config.secretKey) : null;

      const html = renderPage(slug, {
        site: config.site,
        industries: config.industries,
        currentYear: this.clock().getFullYear(),
        flash
      }, this.templates);

      res.type('html').send(html);
    };
  }

  /**
   * Demo request form submission
   */
  private async demoRequest(req: Request, res: Response): Promise<void> {
    const json = wantsJson(req);

    try {
      await this.options.demoRequests.submit(formBody(req));

      if (json) {
        res.json({ success: true, message: DEMO_REQUEST_SUCCESS_MESSAGE });
      } else {
        this.redirectWithFlash(res, { category: 'success', message: DEMO_REQUEST_SUCCESS_MESSAGE });
      }
    } catch (error) {
      const status = this.errorHandler.handleError(error, { operation: 'demo-request' });

      if (isSiteError(error) && error.errorType === SiteErrorType.VALIDATION_ERROR) {
        res.status(status).json({ success: false, message: error.message });
      } else if (json) {
        res.status(500).json({ success: false, message: GENERIC_ERROR_MESSAGE });
      } else {
        this.redirectWithFlash(res, { category: 'error', message: GENERIC_ERROR_MESSAGE });
      }
    }
  }

  /**
   * Newsletter signup from a form post or JSON body
   */
  private async newsletterSignup(req: Request, res: Response): Promise<void> {
    try {
      await this.options.newsletter.signup(formBody(req).email);
      res.json({ success: true, message: NEWSLETTER_SUCCESS_MESSAGE });
    } catch (error) {
      const status = this.errorHandler.handleError(error, { operation: 'newsletter' });

      if (isSiteError(error) && error.errorType === SiteErrorType.VALIDATION_ERROR) {
        res.status(status).json({ success: false, message: error.message });
      } else {
        res.status(500).json({ success: false, message: GENERIC_ERROR_MESSAGE });
      }
    }
  }

  private redirectWithFlash(res: Response, flash: FlashMessage): void {
    const { config } = this.options;
    setFlash(res, config.secretKey, flash, config.isProduction);
    res.redirect(302, '/marketing/contact');
  }
}

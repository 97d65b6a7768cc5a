/**
 * Server-rendered marketing pages
 */

import { SiteIdentity } from '../config';
import { FlashMessage } from '../server/flash';
import { TemplateLoader, escapeHtml, templateLoader } from '../templates/html-template';

export type PageSlug = 'home' | 'features' | 'about' | 'contact';

export interface PageDefinition {
  slug: PageSlug;
  /** Path below the marketing mount point */
  path: string;
  title: string;
  description: string;
}

export const PAGES: readonly PageDefinition[] = [
  {
    slug: 'home',
    path: '/',
    title: 'Construction Management Software',
    description: 'Scheduling, equipment, inventory and crews in one place for utilities, municipalities and contractors.'
  },
  {
    slug: 'features',
    path: '/features',
    title: 'Features',
    description: 'Every module: jobs and scheduling, equipment tracking, inventory, documents, reporting and mobile crews.'
  },
  {
    slug: 'about',
    path: '/about',
    title: 'Why Us',
    description: 'Built with field crews and operations managers from power distribution and public works.'
  },
  {
    slug: 'contact',
    path: '/contact',
    title: 'Request a Demo',
    description: 'Tell us about your operations and we will set up a personalized demo.'
  }
];

export interface PageContext {
  site: SiteIdentity;
  industries: Record<string, string>;
  currentYear: number;
  flash?: FlashMessage | null;
}

export function findPage(slug: PageSlug): PageDefinition {
  const page = PAGES.find(candidate => candidate.slug === slug);
  if (!page) {
    throw new Error(`Unknown page: ${slug}`);
  }
  return page;
}

export function renderFlash(flash: FlashMessage | null | undefined): string {
  if (!flash) {
    return '';
  }
  return `<div class="flash flash-${flash.category}" role="status">${escapeHtml(flash.message)}</div>`;
}

export function renderIndustryOptions(industries: Record<string, string>): string {
  return Object.entries(industries)
    .map(([code, label]) => `<option value="${escapeHtml(code)}">${escapeHtml(label)}</option>`)
    .join('\n');
}

function renderNavigation(active: PageSlug): string {
  return PAGES
    .map(page => {
      const current = page.slug === active ? ' aria-current="page"' : '';
      const href = page.path === '/' ? '/marketing/' : `/marketing${page.path}`;
      return `<a href="${href}"${current}>${escapeHtml(page.title)}</a>`;
    })
    .join('\n');
}

/**
 * Page body inside the shared layout
 */
export function renderPage(slug: PageSlug, context: PageContext, templates: TemplateLoader = templateLoader): string {
  const page = findPage(slug);
  const shared = {
    site_name: context.site.name,
    tagline: context.site.tagline,
    contact_email: context.site.contactEmail,
    current_year: context.currentYear
  };

  const content = templates.load(`pages/${slug}`)
    .setVariables(shared)
    .setRaw('flash', renderFlash(context.flash))
    .setRaw('industry_options', renderIndustryOptions(context.industries))
    .render();

  return templates.load('pages/layout')
    .setVariables({
      ...shared,
      title: `${page.title} | ${context.site.name}`,
      description: page.description
    })
    .setRaw('navigation', renderNavigation(slug))
    .setRaw('content', content)
    .render();
}

/**
 * Marketing page rendering tests
 */

import { DEFAULT_INDUSTRIES, DEFAULT_SITE } from '../../src/config';
import { PageContext, findPage, renderFlash, renderIndustryOptions, renderPage } from '../../src/marketing/pages';

const context: PageContext = {
  site: DEFAULT_SITE,
  industries: DEFAULT_INDUSTRIES,
  currentYear: 2026
};

describe('renderFlash', () => {
  test('renders nothing without a message', () => {
    expect(renderFlash(null)).toBe('');
    expect(renderFlash(undefined)).toBe('');
  });

  test('escapes the message', () => {
    expect(renderFlash({ category: 'error', message: '<x>' })).toBe(
      '<div class="flash flash-error" role="status">&lt;x&gt;</div>'
    );
  });
});

describe('renderIndustryOptions', () => {
  test('renders one option per industry', () => {
    expect(renderIndustryOptions({ a: 'A & B', b: 'C' })).toBe(
      '<option value="a">A &amp; B</option>\n<option value="b">C</option>'
    );
  });
});

describe('renderPage', () => {
  test('looks pages up by slug', () => {
    expect(findPage('about').title).toBe('Why Us');
  });

  test('renders the contact page inside the layout', () => {
    const html = renderPage('contact', { ...context, flash: { category: 'success', message: 'Thanks!' } });

    expect(html).toContain('<title>Request a Demo | Vigil Build</title>');
    expect(html).toContain('<a href="/marketing/contact" aria-current="page">Request a Demo</a>');
    expect(html).toContain('<a href="/marketing/">Construction Management Software</a>');
    expect(html).toContain('<option value="oil_gas">Oil &amp; Gas</option>');
    expect(html).toContain('<div class="flash flash-success" role="status">Thanks!</div>');
    expect(html).toContain('&copy; 2026 Vigil Build.');
  });

  test.each(['home', 'features', 'about', 'contact'] as const)('%s fills every placeholder', slug => {
    expect(renderPage(slug, context)).not.toContain('{{');
  });
});

/**
 * HTML template system
 *
 * {{name}} inserts an escaped value, {{{name}}} inserts raw HTML.
 * Placeholders without a value are left as they are.
 */

import fs from 'fs';
import path from 'path';
import { fromProjectRoot } from '../utils/paths';

export type TemplateValue = string | number;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

const PLACEHOLDER = /\{\{\{\s*(\w+)\s*\}\}\}|\{\{\s*(\w+)\s*\}\}/g;

export class HtmlTemplate {
  private template: string;
  private variables: Map<string, string> = new Map();
  private rawVariables: Map<string, string> = new Map();

  constructor(template: string) {
    this.template = template;
  }

  setVariable(name: string, value: TemplateValue): this {
    this.variables.set(name, String(value));
    return this;
  }

  setVariables(variables: Record<string, TemplateValue>): this {
    for (const [name, value] of Object.entries(variables)) {
      this.setVariable(name, value);
    }
    return this;
  }

  /**
   * Value inserted without escaping, for {{{name}}}
   */
  setRaw(name: string, html: string): this {
    this.rawVariables.set(name, html);
    return this;
  }

  render(): string {
    return this.template.replace(PLACEHOLDER, (match, rawName: string | undefined, name: string | undefined) => {
      if (rawName !== undefined) {
        return this.rawVariables.get(rawName) ?? this.variables.get(rawName) ?? match;
      }
      if (name !== undefined) {
        const value = this.variables.get(name);
        return value === undefined ? match : escapeHtml(value);
      }
      return match;
    });
  }

  static create(template: string): HtmlTemplate {
    return new HtmlTemplate(template);
  }
}

/**
 * Reads template files once and hands out fresh HtmlTemplate instances
 */
export class TemplateLoader {
  private cache: Map<string, string> = new Map();

  constructor(
    private readonly baseDir: string = fromProjectRoot('templates'),
    private readonly useCache: boolean = true
  ) {}

  load(name: string): HtmlTemplate {
    return new HtmlTemplate(this.read(name));
  }

  private read(name: string): string {
    const cached = this.useCache ? this.cache.get(name) : undefined;
    if (cached !== undefined) {
      return cached;
    }

    const filePath = path.resolve(this.baseDir, `${name}.html`);
    if (!filePath.startsWith(path.resolve(this.baseDir) + path.sep)) {
      throw new Error(`Template outside ${this.baseDir}: ${name}`);
    }

    const text = fs.readFileSync(filePath, 'utf-8');
    if (this.useCache) {
      this.cache.set(name, text);
    }
    return text;
  }

  clear(): void {
    this.cache.clear();
  }
}

export const templateLoader = new TemplateLoader();

/**
 * HTML view rendering: `{{ name }}` is escaped, `{{{ name }}}` is inserted as is
 */

import fs from 'fs/promises';
import path from 'path';

export type TemplateValue = string | number | boolean | null | undefined;

export type TemplateVariables = Record<string, TemplateValue>;

export interface TemplateRendererConfig {
  /** Directory views are read from */
  viewsDirectory: string;
  /** Throw on placeholders without a value instead of rendering them empty */
  strictMode: boolean;
  /** Keep views in memory after the first read */
  cacheViews: boolean;
}

const VARIABLE_PATTERN = /\{\{\{\s*([\w.]+)\s*\}\}\}|\{\{\s*([\w.]+)\s*\}\}/g;

export const DEFAULT_VIEWS_DIRECTORY = path.join(__dirname, '..', '..', 'views');

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export class TemplateRenderer {
  private config: TemplateRendererConfig;
  private views: Map<string, string> = new Map();

  constructor(config: Partial<TemplateRendererConfig> = {}) {
    this.config = {
      viewsDirectory: DEFAULT_VIEWS_DIRECTORY,
      strictMode: false,
      cacheViews: true,
      ...config
    };
  }

  async render(view: string, variables: TemplateVariables): Promise<string> {
    return this.renderString(await this.loadView(view), variables);
  }

  renderString(template: string, variables: TemplateVariables): string {
    return template.replace(VARIABLE_PATTERN, (match: string, raw?: string, escaped?: string) => {
      const name = raw ?? escaped ?? '';
      const value = variables[name];

      if (value === undefined || value === null) {
        if (this.config.strictMode) {
          throw new Error(`Missing template variable: ${name}`);
        }
        return '';
      }

      const text = String(value);
      return raw !== undefined ? text : escapeHtml(text);
    });
  }

  /**
   * Placeholder names used by a template, without duplicates
   */
  extractVariables(template: string): string[] {
    const names = new Set<string>();
    for (const match of template.matchAll(VARIABLE_PATTERN)) {
      names.add(match[1] ?? match[2]);
    }
    return [...names];
  }

  private async loadView(view: string): Promise<string> {
    const cached = this.views.get(view);
    if (cached !== undefined) {
      return cached;
    }

    const template = await fs.readFile(path.join(this.config.viewsDirectory, view), 'utf8');
    if (this.config.cacheViews) {
      this.views.set(view, template);
    }
    return template;
  }
}

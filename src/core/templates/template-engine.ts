/**
 * Template Engine
 *
 * File-based HTML templates with mustache-style substitution:
 * `{{name}}` (escaped), `{{{name}}}` (raw), `{{#name}}...{{/name}}` (list or
 * truthy block) and `{{^name}}...{{/name}}` (inverted block).
 */

import { promises as fs } from 'node:fs';
import { resolve, basename, extname } from 'node:path';
import { glob } from 'glob';
import type { Logger } from 'pino';
import { Result, Success, Failure, errorMessage } from '../../domain/types';

export type TemplateScalar = string | number | boolean | null | undefined;
export type TemplateValue = TemplateScalar | TemplateContext | readonly TemplateContext[];
export type TemplateContext = { [key: string]: TemplateValue };

export interface Template {
  name: string;
  content: string;
}

const TOKEN_PATTERN =
  /\{\{([#^])(\w+)\}\}([\s\S]*?)\{\{\/\2\}\}|\{\{\{(\w+)\}\}\}|\{\{(\w+)\}\}/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function isList(value: TemplateValue): value is readonly TemplateContext[] {
  return Array.isArray(value);
}

function isContext(value: TemplateValue): value is TemplateContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTruthy(value: TemplateValue): boolean {
  if (isList(value)) {
    return value.length > 0;
  }
  return value !== undefined && value !== null && value !== false && value !== '' && value !== 0;
}

function stringify(value: TemplateValue): string {
  if (value === undefined || value === null || typeof value === 'object') {
    return '';
  }
  return String(value);
}

/**
 * Single pass over the template; substituted values are never scanned again,
 * so data containing `{{...}}` comes out literally.
 */
function renderContent(template: string, context: TemplateContext): string {
  return template.replace(
    TOKEN_PATTERN,
    (
      _match: string,
      sectionKind: string | undefined,
      sectionKey: string | undefined,
      body: string | undefined,
      rawKey: string | undefined,
      key: string | undefined,
    ) => {
      if (sectionKind && sectionKey && body !== undefined) {
        const value = context[sectionKey];
        if (sectionKind === '^') {
          return isTruthy(value) ? '' : renderContent(body, context);
        }
        if (isList(value)) {
          return value.map((item) => renderContent(body, { ...context, ...item })).join('');
        }
        if (!isTruthy(value)) {
          return '';
        }
        return renderContent(body, isContext(value) ? { ...context, ...value } : context);
      }
      if (rawKey) {
        return stringify(context[rawKey]);
      }
      return key ? escapeHtml(stringify(context[key])) : '';
    },
  );
}

export class TemplateEngine {
  private templates: Map<string, Template> = new Map();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'TemplateEngine' });
  }

  /**
   * Load every `*.html` file in a directory; the template name is the file
   * name without extension.
   */
  async loadFromDirectory(directory: string): Promise<Result<number>> {
    const templateDir = resolve(directory);
    try {
      const files = await glob('*.html', { cwd: templateDir, absolute: true });

      for (const file of files.sort()) {
        const content = await fs.readFile(file, 'utf-8');
        this.registerTemplate({ name: basename(file, extname(file)), content });
      }

      this.logger.debug({ directory: templateDir, templateCount: files.length }, 'Templates loaded');
      return Success(files.length);
    } catch (error) {
      const message = `Failed to load templates from ${templateDir}: ${errorMessage(error)}`;
      this.logger.error({ directory: templateDir, error: message }, 'Template loading failed');
      return Failure(message);
    }
  }

  registerTemplate(template: Template): void {
    this.templates.set(template.name, template);
    this.logger.debug({ name: template.name }, 'Template registered');
  }

  render(templateName: string, context: TemplateContext = {}): Result<string> {
    const template = this.templates.get(templateName);
    if (!template) {
      return Failure(`Template not found: ${templateName}`);
    }

    try {
      return Success(renderContent(template.content, context).replace(/\n{3,}/g, '\n\n'));
    } catch (error) {
      return Failure(`Template rendering failed: ${errorMessage(error)}`);
    }
  }

  hasTemplate(name: string): boolean {
    return this.templates.has(name);
  }

  get templateCount(): number {
    return this.templates.size;
  }
}

/**
 * Template Engine Factory
 */

import { join, resolve } from 'node:path';
import type { Logger } from 'pino';
import { TemplateEngine } from './template-engine';
import { Result, Success, Failure } from '../../domain/types';

/** HTML templates shipped next to this module */
export const BUILTIN_TEMPLATE_DIR = join(__dirname, 'html');

export const REPORT_TEMPLATES = {
  target: 'target-report',
  summary: 'summary-report',
} as const;

export interface TemplateEngineConfig {
  /** Directory containing `*.html` templates; defaults to the shipped ones */
  templateDirectory?: string;
}

/**
 * Create an engine with the report templates loaded. Fails when the directory
 * cannot be read or lacks one of the report templates.
 */
export async function createTemplateEngine(
  logger: Logger,
  config: TemplateEngineConfig = {},
): Promise<Result<TemplateEngine>> {
  const directory = resolve(config.templateDirectory ?? BUILTIN_TEMPLATE_DIR);
  const engine = new TemplateEngine(logger);

  const loadResult = await engine.loadFromDirectory(directory);
  if (!loadResult.ok) {
    return Failure(loadResult.error);
  }

  const missing = Object.values(REPORT_TEMPLATES).filter((name) => !engine.hasTemplate(name));
  if (missing.length > 0) {
    return Failure(`Missing report templates in ${directory}: ${missing.join(', ')}`);
  }

  return Success(engine);
}

/**
 * Report templates - public exports
 */

export { TemplateEngine, escapeHtml } from './template-engine';
export { createTemplateEngine, BUILTIN_TEMPLATE_DIR, REPORT_TEMPLATES } from './factory';

export type { Template, TemplateContext, TemplateValue, TemplateScalar } from './template-engine';
export type { TemplateEngineConfig } from './factory';

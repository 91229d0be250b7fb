/**
 * Tests for TemplateEngine
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TemplateEngine, escapeHtml } from '../../../../src/core/templates/template-engine';
import { createTemplateEngine, REPORT_TEMPLATES } from '../../../../src/core/templates/factory';
import { createMockLogger } from '../../../__support__/utilities/mock-infrastructure';

describe('TemplateEngine', () => {
  let engine: TemplateEngine;

  const render = (content: string, context: Parameters<TemplateEngine['render']>[1] = {}): string => {
    engine.registerTemplate({ name: 'test', content });
    const result = engine.render('test', context);
    if (!result.ok) {
      throw new Error(result.error);
    }
    return result.value;
  };

  beforeEach(() => {
    engine = new TemplateEngine(createMockLogger());
  });

  describe('variables', () => {
    it('should substitute and escape variables', () => {
      expect(render('<td>{{name}}</td>', { name: '<script>&"\'' })).toBe(
        '<td>&lt;script&gt;&amp;&quot;&#39;</td>',
      );
    });

    it('should insert raw values with triple braces', () => {
      expect(render('<script>const d = {{{data}}};</script>', { data: '{"a":1}' })).toBe(
        '<script>const d = {"a":1};</script>',
      );
    });

    it('should render numbers and leave missing values empty', () => {
      expect(render('{{count}} of {{missing}}!', { count: 0 })).toBe('0 of !');
    });

    it('should not expand template syntax inside values', () => {
      expect(render('{{title}}', { title: '{{secret}}', secret: 'leaked' })).toBe('{{secret}}');
    });
  });

  describe('sections', () => {
    it('should iterate lists with each item over the outer context', () => {
      const output = render('{{#rows}}[{{name}}/{{suffix}}]{{/rows}}', {
        suffix: 'x',
        rows: [{ name: 'a' }, { name: 'b' }],
      });
      expect(output).toBe('[a/x][b/x]');
    });

    it('should render truthy blocks once and skip falsy ones', () => {
      expect(render('{{#on}}yes{{/on}}{{#off}}no{{/off}}', { on: true, off: false })).toBe('yes');
    });

    it('should render inverted blocks for empty lists and falsy values', () => {
      expect(render('{{^rows}}none{{/rows}}{{^flag}}unset{{/flag}}', { rows: [] })).toBe('noneunset');
      expect(render('{{^rows}}none{{/rows}}', { rows: [{ a: 1 }] })).toBe('');
    });

    it('should enter nested objects', () => {
      expect(render('{{#totals}}{{HIGH}}/{{total}}{{/totals}}', { totals: { HIGH: 2, total: 5 } })).toBe('2/5');
    });
  });

  it('should fail for unknown templates', () => {
    expect(engine.render('missing')).toEqual({ ok: false, error: 'Template not found: missing' });
  });

  describe('loadFromDirectory', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'templates-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should register each html file under its base name', async () => {
      await writeFile(join(dir, 'page.html'), '<h1>{{title}}</h1>');
      await writeFile(join(dir, 'notes.txt'), 'ignored');

      const result = await engine.loadFromDirectory(dir);

      expect(result).toEqual({ ok: true, value: 1 });
      expect(engine.hasTemplate('page')).toBe(true);
      expect(engine.hasTemplate('notes')).toBe(false);
    });
  });
});

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml('a < b && c > "d"')).toBe('a &lt; b &amp;&amp; c &gt; &quot;d&quot;');
  });
});

describe('createTemplateEngine', () => {
  it('should load the shipped report templates', async () => {
    const result = await createTemplateEngine(createMockLogger());

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.hasTemplate(REPORT_TEMPLATES.target)).toBe(true);
      expect(result.value.hasTemplate(REPORT_TEMPLATES.summary)).toBe(true);
    }
  });

  it('should fail when a report template is missing', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'templates-'));
    try {
      await writeFile(join(dir, 'target-report.html'), '<p></p>');
      const result = await createTemplateEngine(createMockLogger(), { templateDirectory: dir });
      expect(result).toEqual({ ok: false, error: `Missing report templates in ${dir}: summary-report` });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

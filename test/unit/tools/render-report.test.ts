/**
 * Report Renderer
 */

import { describe, test, expect, beforeAll, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createTemplateEngine } from '../../../src/core/templates/factory';
import { TemplateEngine } from '../../../src/core/templates/template-engine';
import {
  renderReports,
  buildSummaryContext,
  buildTargetContext,
  inlineJson,
  reportableFindings,
  truncateDescription,
} from '../../../src/tools/render-report';
import { aggregate } from '../../../src/tools/aggregate-findings';
import type { AggregateReport, ScanResult } from '../../../src/domain/types';
import { createMockLogger, finding, scanResult } from '../../__support__/utilities/mock-infrastructure';

const GENERATED_AT = new Date('2026-01-02T03:04:05.000Z');

const results: ScanResult[] = [
  scanResult('web', [
    finding('CVE-2', 'HIGH', { description: 'x'.repeat(350) }),
    finding('CVE-1', 'CRITICAL', { fixedVersion: '3.0.2' }),
    finding('CVE-3', 'LOW'),
  ]),
  scanResult('nginx', []),
];

const report: AggregateReport = aggregate(results, { allowlist: ['HIGH', 'CRITICAL'], policy: 'warn-only' });

describe('report helpers', () => {
  test('keeps allowlisted findings, most severe first', () => {
    expect(reportableFindings(results[0]?.findings ?? [], ['HIGH', 'CRITICAL']).map((f) => f.id)).toEqual([
      'CVE-1',
      'CVE-2',
    ]);
  });

  test('cuts descriptions at 300 characters', () => {
    expect(truncateDescription('x'.repeat(350))).toHaveLength(300);
    expect(truncateDescription('short')).toBe('short');
  });

  test('does not split a character outside the basic plane', () => {
    expect(truncateDescription('a😀😀😀', 3)).toBe('a😀😀');
    expect(truncateDescription(`${'x'.repeat(299)}😀😀`)).toBe(`${'x'.repeat(299)}😀`);
  });

  test('escapes "<" in inline JSON', () => {
    expect(inlineJson({ a: '</script>' })).toBe('{"a":"\\u003c/script>"}');
  });

  test('builds the per-target view from allowlisted findings', () => {
    const [web] = results;
    if (!web) throw new Error('fixture missing');

    const context = buildTargetContext(web, report, 'shop/web:release-1.8', 'now');

    expect(context).toMatchObject({
      imageRef: 'shop/web:release-1.8',
      allowlist: 'HIGH, CRITICAL',
      degraded: false,
      hasFindings: true,
    });
    expect(context.findings).toEqual([
      {
        id: 'CVE-1',
        severity: 'CRITICAL',
        packageName: 'openssl',
        installedVersion: '3.0.1',
        fixedVersion: '3.0.2',
        description: 'CVE-1 title',
      },
      {
        id: 'CVE-2',
        severity: 'HIGH',
        packageName: 'openssl',
        installedVersion: '3.0.1',
        fixedVersion: '',
        description: 'x'.repeat(300),
      },
    ]);
  });

  test('builds summary rows, totals and chart data', () => {
    const context = buildSummaryContext(['web', 'nginx'], report, 'now');

    expect(context.rows).toEqual([
      { name: 'web', reportFile: 'trivy-web.html', CRITICAL: 1, HIGH: 1, MEDIUM: 0, LOW: 1, UNKNOWN: 0, total: 3 },
      { name: 'nginx', reportFile: 'trivy-nginx.html', CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, UNKNOWN: 0, total: 0 },
    ]);
    expect(context.totals).toEqual({ CRITICAL: 1, HIGH: 1, MEDIUM: 0, LOW: 1, UNKNOWN: 0, total: 3 });
    expect(context).toMatchObject({
      outcome: 'WARN',
      policy: 'warn-only',
      totalReportable: 2,
      hasOverThreshold: true,
      overThreshold: 'web',
    });

    const chart: unknown = JSON.parse(String(context.chartData));
    expect(chart).toMatchObject({
      labels: ['web', 'nginx'],
      severities: ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'UNKNOWN'],
      totals: [1, 1, 0, 1, 0],
      colors: ['#8e0000', '#d84315', '#558b2f', '#0277bd', '#616161'],
    });
    expect(chart).toHaveProperty('datasets.0', { label: 'CRITICAL', data: [1, 0], backgroundColor: '#8e0000' });
  });
});

describe('renderReports', () => {
  let engine: TemplateEngine;
  let reportDir: string;

  beforeAll(async () => {
    const created = await createTemplateEngine(createMockLogger());
    if (!created.ok) throw new Error(created.error);
    engine = created.value;
  });

  beforeEach(async () => {
    reportDir = await mkdtemp(join(tmpdir(), 'reports-'));
  });

  afterEach(async () => {
    await rm(reportDir, { recursive: true, force: true });
  });

  test('writes a page per target, the summary and the JSON aggregate', async () => {
    const result = await renderReports(
      { report, results, reportDir, imageRefs: { web: 'shop/web:release-1.8' }, generatedAt: GENERATED_AT },
      { engine, logger: createMockLogger() },
    );

    expect(result).toEqual({
      ok: true,
      value: {
        targets: { web: join(reportDir, 'trivy-web.html'), nginx: join(reportDir, 'trivy-nginx.html') },
        summary: join(reportDir, 'trivy-summary.html'),
        json: join(reportDir, 'summary.json'),
      },
    });

    const webPage = await readFile(join(reportDir, 'trivy-web.html'), 'utf-8');
    expect(webPage).toContain('<title>Trivy Report - shop/web:release-1.8</title>');
    expect(webPage).toContain('<td><span class="badge CRITICAL">CRITICAL</span></td>');
    expect(webPage).not.toContain('CVE-3');

    const nginxPage = await readFile(join(reportDir, 'trivy-nginx.html'), 'utf-8');
    expect(nginxPage).toContain('<title>Trivy Report - shop/nginx</title>');
    expect(nginxPage).toContain('<div class="banner ok">No HIGH, CRITICAL vulnerabilities found.</div>');
    expect(nginxPage).not.toContain('<table');

    const summaryPage = await readFile(join(reportDir, 'trivy-summary.html'), 'utf-8');
    expect(summaryPage).toContain('<td><a href="trivy-web.html">web</a></td>');
    expect(summaryPage).toContain('<div class="outcome WARN">Outcome: WARN (2 HIGH, CRITICAL findings, policy warn-only)</div>');

    const json: unknown = JSON.parse(await readFile(join(reportDir, 'summary.json'), 'utf-8'));
    expect(json).toMatchObject({
      generatedAt: '2026-01-02T03:04:05.000Z',
      outcome: 'WARN',
      totalReportable: 2,
      reportableByTarget: { web: 2, nginx: 0 },
    });
  });

  test('fails when a template is not registered', async () => {
    const empty = new TemplateEngine(createMockLogger());

    const result = await renderReports({ report, results, reportDir }, { engine: empty, logger: createMockLogger() });

    expect(result).toEqual({ ok: false, error: 'Cannot render report for web: Template not found: target-report' });
  });
});

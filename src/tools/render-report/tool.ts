/**
 * Render Report Tool
 *
 * Writes one HTML page per scanned target, the summary dashboard, and the
 * aggregate as JSON into the report directory.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { REPORT_TEMPLATES } from '../../core/templates/factory';
import type { TemplateContext, TemplateEngine } from '../../core/templates/template-engine';
import { createTimer, type Logger } from '../../lib/logger';
import {
  SEVERITIES,
  Success,
  Failure,
  errorMessage,
  type Result,
  type AggregateReport,
  type Finding,
  type ScanResult,
  type Severity,
  type SeverityCounts,
} from '../../domain/types';
import { emptyCounts } from '../aggregate-findings/tool';

export const DESCRIPTION_LIMIT = 300;
export const SUMMARY_HTML = 'trivy-summary.html';
export const SUMMARY_JSON = 'summary.json';

export const SEVERITY_COLORS: Record<Severity, string> = {
  CRITICAL: '#8e0000',
  HIGH: '#d84315',
  MEDIUM: '#558b2f',
  LOW: '#0277bd',
  UNKNOWN: '#616161',
};

/** Most severe first, matching the summary table columns */
const DISPLAY_ORDER: Severity[] = [...SEVERITIES].reverse();

export interface RenderReportsParams {
  report: AggregateReport;
  results: readonly ScanResult[];
  reportDir: string;
  /** Page title per target name; falls back to the target's repository */
  imageRefs?: Readonly<Record<string, string>>;
  generatedAt?: Date;
}

export interface RenderReportsDeps {
  engine: TemplateEngine;
  logger: Logger;
}

export interface ReportFiles {
  targets: Record<string, string>;
  summary: string;
  json: string;
}

export function targetReportFileName(targetName: string): string {
  return `trivy-${targetName}.html`;
}

/** Cut to `limit` code points, never inside a surrogate pair */
export function truncateDescription(text: string, limit = DESCRIPTION_LIMIT): string {
  const codePoints = Array.from(text);
  return codePoints.length > limit ? codePoints.slice(0, limit).join('') : text;
}

/** Allowlisted findings, most severe first, then by id */
export function reportableFindings(findings: readonly Finding[], allowlist: readonly Severity[]): Finding[] {
  return findings
    .filter((finding) => allowlist.includes(finding.severity))
    .sort(
      (a, b) =>
        DISPLAY_ORDER.indexOf(a.severity) - DISPLAY_ORDER.indexOf(b.severity) || a.id.localeCompare(b.id),
    );
}

function countsContext(counts: SeverityCounts): TemplateContext {
  return {
    CRITICAL: counts.CRITICAL,
    HIGH: counts.HIGH,
    MEDIUM: counts.MEDIUM,
    LOW: counts.LOW,
    UNKNOWN: counts.UNKNOWN,
    total: counts.total,
  };
}

/**
 * JSON for an inline `<script>`; `<` is escaped so a value cannot close the tag.
 */
export function inlineJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

export function buildTargetContext(
  result: ScanResult,
  report: AggregateReport,
  imageRef: string,
  generatedAt: string,
): TemplateContext {
  const findings = reportableFindings(result.findings, report.allowlist).map(
    (finding): TemplateContext => ({
      id: finding.id,
      severity: finding.severity,
      packageName: finding.packageName,
      installedVersion: finding.installedVersion,
      fixedVersion: finding.fixedVersion ?? '',
      description: truncateDescription(finding.description ?? finding.title),
    }),
  );

  return {
    imageRef,
    generatedAt,
    allowlist: report.allowlist.join(', '),
    degraded: result.degraded,
    hasFindings: findings.length > 0,
    findings,
  };
}

export function buildSummaryContext(
  names: readonly string[],
  report: AggregateReport,
  generatedAt: string,
): TemplateContext {
  const totals = emptyCounts();
  const rows = names.map((name): TemplateContext => {
    const counts = report.perTarget[name] ?? emptyCounts();
    for (const severity of SEVERITIES) {
      totals[severity] += counts[severity];
    }
    totals.total += counts.total;
    return { name, reportFile: targetReportFileName(name), ...countsContext(counts) };
  });

  const chartData = {
    labels: names,
    datasets: DISPLAY_ORDER.map((severity) => ({
      label: severity,
      data: names.map((name) => report.perTarget[name]?.[severity] ?? 0),
      backgroundColor: SEVERITY_COLORS[severity],
    })),
    severities: DISPLAY_ORDER,
    totals: DISPLAY_ORDER.map((severity) => totals[severity]),
    colors: DISPLAY_ORDER.map((severity) => SEVERITY_COLORS[severity]),
  };

  return {
    generatedAt,
    outcome: report.outcome,
    policy: report.policy,
    allowlist: report.allowlist.join(', '),
    totalReportable: report.totalReportable,
    hasOverThreshold: report.overThresholdTargets.length > 0,
    overThreshold: report.overThresholdTargets.join(', '),
    rows,
    totals: countsContext(totals),
    chartData: inlineJson(chartData),
  };
}

/**
 * Render and write every report file. Failures to render or write are
 * returned, never thrown.
 */
export async function renderReports(
  params: RenderReportsParams,
  { engine, logger }: RenderReportsDeps,
): Promise<Result<ReportFiles>> {
  const { report, results, reportDir } = params;
  const generatedAt = (params.generatedAt ?? new Date()).toISOString();
  const timer = createTimer(logger, 'render-reports', { targets: results.length });

  try {
    await mkdir(reportDir, { recursive: true });

    const targets: Record<string, string> = {};
    const names: string[] = [];

    for (const result of results) {
      const name = result.target.name;
      const imageRef = params.imageRefs?.[name] ?? result.target.tag;
      const page = engine.render(
        REPORT_TEMPLATES.target,
        buildTargetContext(result, report, imageRef, generatedAt),
      );
      if (!page.ok) {
        timer.error(page.error, { target: name });
        return Failure(`Cannot render report for ${name}: ${page.error}`);
      }

      const path = join(reportDir, targetReportFileName(name));
      await writeFile(path, page.value, 'utf-8');
      targets[name] = path;
      if (!names.includes(name)) {
        names.push(name);
      }
      logger.debug({ target: name, path }, 'Target report written');
    }

    const summaryPage = engine.render(REPORT_TEMPLATES.summary, buildSummaryContext(names, report, generatedAt));
    if (!summaryPage.ok) {
      timer.error(summaryPage.error);
      return Failure(`Cannot render summary report: ${summaryPage.error}`);
    }

    const summary = join(reportDir, SUMMARY_HTML);
    await writeFile(summary, summaryPage.value, 'utf-8');

    const json = join(reportDir, SUMMARY_JSON);
    await writeFile(json, `${JSON.stringify({ generatedAt, ...report }, null, 2)}\n`, 'utf-8');

    logger.info({ summary, targets: names.length }, `Reports written to ${reportDir}`);
    timer.end({ files: names.length + 2 });

    return Success({ targets, summary, json });
  } catch (error) {
    timer.error(error);
    return Failure(`Cannot write reports to ${reportDir}: ${errorMessage(error)}`);
  }
}

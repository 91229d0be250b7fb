/**
 * Summarize Reports Workflow
 *
 * Re-aggregates the `trivy-<target>.json` files already in a report
 * directory and re-renders every report from them. No image is built or
 * scanned.
 */

import { basename, join } from 'node:path';
import { glob } from 'glob';
import type { Logger } from 'pino';
import { readScanFile } from '../infrastructure/scanners/trivy-report';
import { RESERVED_TARGET_NAMES } from '../config/defaults';
import type { TemplateEngine } from '../core/templates/template-engine';
import { aggregate } from '../tools/aggregate-findings/tool';
import { renderReports, type ReportFiles } from '../tools/render-report/tool';
import {
  Success,
  Failure,
  errorMessage,
  type Result,
  type AggregateReport,
  type BuildTarget,
  type FailurePolicy,
  type ScanResult,
  type Severity,
} from '../domain/types';

const SCAN_FILE_PATTERN = /^trivy-(.+)\.json$/;

export interface SummarizeReportsParams {
  reportDir: string;
  allowlist: readonly Severity[];
  policy: FailurePolicy;
  generatedAt?: Date;
}

export interface SummarizeReportsDeps {
  templates: TemplateEngine;
  logger: Logger;
}

export interface ReportsSummary {
  results: ScanResult[];
  report: AggregateReport;
  reportFiles: ReportFiles;
}

/** Target name encoded in a scan output file name, if it is one */
export function targetNameFromScanFile(path: string): string | undefined {
  return SCAN_FILE_PATTERN.exec(basename(path))?.[1];
}

export async function summarizeReports(
  params: SummarizeReportsParams,
  { templates, logger }: SummarizeReportsDeps,
): Promise<Result<ReportsSummary>> {
  let files: string[];
  try {
    files = (await glob('trivy-*.json', { cwd: params.reportDir })).sort();
  } catch (error) {
    return Failure(`Cannot list ${params.reportDir}: ${errorMessage(error)}`);
  }

  const results: ScanResult[] = [];
  for (const file of files) {
    const name = targetNameFromScanFile(file);
    if (!name) {
      continue;
    }
    if (RESERVED_TARGET_NAMES.includes(name.toLowerCase())) {
      logger.warn({ file }, 'Skipping scan file named after the summary report');
      continue;
    }
    // Only the name is known here; the repository doubles as the page title
    const target: BuildTarget = { name, buildFileRef: '', tag: name };
    results.push(await readScanFile(target, join(params.reportDir, file), logger));
  }

  if (results.length === 0) {
    return Failure(`No trivy-<target>.json files found in ${params.reportDir}`);
  }

  logger.info({ files: results.length, reportDir: params.reportDir }, 'Summarizing existing scan results');

  const report = aggregate(results, { allowlist: params.allowlist, policy: params.policy });
  const rendered = await renderReports(
    {
      report,
      results,
      reportDir: params.reportDir,
      ...(params.generatedAt ? { generatedAt: params.generatedAt } : {}),
    },
    { engine: templates, logger },
  );
  if (!rendered.ok) {
    return Failure(rendered.error);
  }

  return Success({ results, report, reportFiles: rendered.value });
}

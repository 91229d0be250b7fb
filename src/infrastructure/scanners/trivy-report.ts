/**
 * Trivy JSON report parsing
 *
 * Reads the document written by `trivy image --format json --output <file>`
 * and turns `Results[].Vulnerabilities[]` into findings. A file that is
 * missing, empty or not a Trivy document yields zero findings with
 * `degraded: true`; that is a warning for the caller, never a crash.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from 'pino';
import { errorMessage, isSeverity, type BuildTarget, type Finding, type ScanResult } from '../../domain/types';

const trivyVulnerabilitySchema = z.object({
  VulnerabilityID: z.string().min(1),
  Severity: z.string(),
  PkgName: z.string().default(''),
  InstalledVersion: z.string().default(''),
  FixedVersion: z.string().optional(),
  Title: z.string().optional(),
  Description: z.string().optional(),
});

const trivyReportSchema = z.object({
  ArtifactName: z.string().optional(),
  Results: z
    .array(
      z.object({
        Target: z.string().optional(),
        Vulnerabilities: z.array(z.unknown()).nullish(),
      }),
    )
    .nullish(),
});

export type TrivyVulnerability = z.infer<typeof trivyVulnerabilitySchema>;

export interface ParsedTrivyReport {
  artifactName?: string;
  findings: Finding[];
  /** Entries with an unrecognised severity or missing vulnerability id */
  ignored: number;
}

/**
 * Parse a Trivy JSON document. Throws on text that is not JSON or not shaped
 * like a Trivy report.
 */
export function parseTrivyReport(raw: string): ParsedTrivyReport {
  const report = trivyReportSchema.parse(JSON.parse(raw));
  const findings: Finding[] = [];
  let ignored = 0;

  for (const result of report.Results ?? []) {
    for (const entry of result.Vulnerabilities ?? []) {
      const parsed = trivyVulnerabilitySchema.safeParse(entry);
      if (!parsed.success) {
        ignored++;
        continue;
      }

      const vuln = parsed.data;
      const severity = vuln.Severity;
      if (!isSeverity(severity)) {
        ignored++;
        continue;
      }

      findings.push({
        id: vuln.VulnerabilityID,
        severity,
        packageName: vuln.PkgName,
        installedVersion: vuln.InstalledVersion,
        ...(vuln.FixedVersion ? { fixedVersion: vuln.FixedVersion } : {}),
        title: vuln.Title ?? vuln.VulnerabilityID,
        ...(vuln.Description ? { description: vuln.Description } : {}),
      });
    }
  }

  return {
    ...(report.ArtifactName ? { artifactName: report.ArtifactName } : {}),
    findings,
    ignored,
  };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load one target's scan output into a {@link ScanResult}
 */
export async function readScanFile(
  target: BuildTarget,
  outputPath: string,
  logger: Logger,
): Promise<ScanResult> {
  const degraded = (reason: string): ScanResult => {
    logger.warn(
      { target: target.name, outputPath, reason },
      `No usable scan output for ${target.name}; counting zero findings`,
    );
    return { target, findings: [], outputPath, ignoredFindings: 0, degraded: true };
  };

  let raw: string;
  try {
    raw = await readFile(outputPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return degraded('missing');
    }
    return degraded(errorMessage(error));
  }

  if (raw.trim().length === 0) {
    return degraded('empty');
  }

  let parsed: ParsedTrivyReport;
  try {
    parsed = parseTrivyReport(raw);
  } catch (error) {
    return degraded(`corrupt: ${errorMessage(error)}`);
  }

  if (parsed.ignored > 0) {
    logger.warn(
      { target: target.name, ignored: parsed.ignored },
      'Ignored scan entries with an unrecognised severity',
    );
  }

  return {
    target,
    findings: parsed.findings,
    outputPath,
    ignoredFindings: parsed.ignored,
    degraded: false,
  };
}

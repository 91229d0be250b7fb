/**
 * Scan Image Tool
 *
 * Runs the scanner once per built artifact, each into its own JSON file, and
 * loads the findings back. A scanner that cannot run is fatal for the stage;
 * a scan that produced no usable file counts as zero findings.
 */

import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { TrivyScanner } from '../../infrastructure/scanners/trivy-scanner';
import { readScanFile } from '../../infrastructure/scanners/trivy-report';
import { createTimer, type Logger } from '../../lib/logger';
import {
  Success,
  Failure,
  errorMessage,
  type Result,
  type BuiltArtifact,
  type ScanResult,
  type Severity,
} from '../../domain/types';

export type ImageScanner = Pick<TrivyScanner, 'scanToFile'>;

export interface ScanImagesParams {
  artifacts: readonly BuiltArtifact[];
  reportDir: string;
  /** Severities requested from the scanner */
  severities: readonly Severity[];
  ignoreUnfixed?: boolean;
}

export interface ScanImagesDeps {
  scanner: ImageScanner;
  logger: Logger;
}

/** `trivy-<target>.json`, one per target so concurrent runs never share a file */
export function scanOutputFileName(targetName: string): string {
  return `trivy-${targetName}.json`;
}

/**
 * Scan all artifacts in order. Returns a failure only for scanner
 * infrastructure problems.
 */
export async function scanImages(
  params: ScanImagesParams,
  { scanner, logger }: ScanImagesDeps,
): Promise<Result<ScanResult[]>> {
  const timer = createTimer(logger, 'scan-images', { artifacts: params.artifacts.length });

  try {
    await mkdir(params.reportDir, { recursive: true });
  } catch (error) {
    timer.error(error);
    return Failure(`Cannot create report directory ${params.reportDir}: ${errorMessage(error)}`);
  }

  const results: ScanResult[] = [];

  for (const artifact of params.artifacts) {
    const { target, imageRef } = artifact;
    const outputPath = join(params.reportDir, scanOutputFileName(target.name));

    // A stale file from an earlier run must not stand in for this scan
    await rm(outputPath, { force: true });

    logger.info({ target: target.name, imageRef }, `Scanning ${imageRef}`);

    const invocation = await scanner.scanToFile(imageRef, outputPath, {
      severity: params.severities,
      ...(params.ignoreUnfixed !== undefined ? { ignoreUnfixed: params.ignoreUnfixed } : {}),
    });

    if (!invocation.ok) {
      timer.error(invocation.error, { target: target.name });
      return Failure(`Scanner failed for ${target.name}: ${invocation.error}`);
    }

    const scanResult = await readScanFile(target, outputPath, logger);

    if (invocation.value.findingsDetected && scanResult.findings.length === 0) {
      logger.warn(
        { target: target.name, outputPath },
        'Scanner reported findings but none could be read from its output',
      );
    }

    logger.info(
      { target: target.name, findings: scanResult.findings.length, degraded: scanResult.degraded },
      `Scanned ${imageRef}: ${scanResult.findings.length} finding(s)`,
    );
    results.push(scanResult);
  }

  timer.end({ scanned: results.length });
  return Success(results);
}

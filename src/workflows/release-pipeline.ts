/**
 * Release Pipeline
 *
 * One pass over the selected targets: resolve, build, scan, aggregate,
 * report, and publish when the outcome allows it. Each stage returns its own
 * value; the run outcome is the worst of the stage outcomes.
 *
 * @example
 * ```typescript
 * const config = loadConfig({ ref: 'release/1.8', targets: 'web,nginx' });
 * const deps = await createPipelineDependencies(config, logger);
 * if (deps.ok) {
 *   const summary = await runPipeline(config, deps.value);
 *   process.exitCode = exitCodeFor(summary.status);
 * }
 * ```
 */

import { nanoid } from 'nanoid';
import type { PipelineConfig } from '../config';
import { ConfigurationError } from '../errors';
import { parseReference, deriveVersionTag } from '../config/reference';
import { resolveTargets } from '../tools/resolve-targets/tool';
import { buildImages } from '../tools/build-image/tool';
import { scanImages } from '../tools/scan/tool';
import { aggregate, mergeOutcomes, statusForOutcome } from '../tools/aggregate-findings/tool';
import { renderReports } from '../tools/render-report/tool';
import { publishImages, type PublishedImage } from '../tools/push-image/tool';
import {
  Success,
  Failure,
  errorMessage,
  type Result,
  type BuildTarget,
  type Outcome,
  type PipelineStage,
  type PipelineStatus,
  type ScanResult,
} from '../domain/types';
import type { PipelineDependencies, PipelineSummary, WorkflowStep } from './types';

/** Process exit code for a run status */
export function exitCodeFor(status: PipelineStatus): number {
  switch (status) {
    case 'SUCCESS':
      return 0;
    case 'UNSTABLE':
      return 2;
    case 'FAILED':
      return 1;
  }
}

interface Selection {
  ref: string;
  versionTag: string;
  targets: BuildTarget[];
}

export async function runPipeline(
  config: PipelineConfig,
  deps: PipelineDependencies,
): Promise<PipelineSummary> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const runId = nanoid(10);
  const logger = deps.logger.child({ runId });
  const steps: WorkflowStep[] = [];

  const summary: PipelineSummary = {
    runId,
    status: 'FAILED',
    outcome: 'OK',
    targets: [],
    artifacts: [],
    pushed: [],
    overThresholdTargets: [],
    steps,
    durationMs: 0,
  };

  const runStage = async <T>(stage: PipelineStage, fn: () => Promise<Result<T>>): Promise<Result<T>> => {
    const startTime = now();
    logger.info({ stage }, `Stage ${stage}: started`);

    let result: Result<T>;
    try {
      result = await fn();
    } catch (error) {
      result = Failure(errorMessage(error));
    }

    const endTime = now();
    if (result.ok) {
      steps.push({ name: stage, status: 'completed', startTime, endTime });
      logger.info({ stage }, `Stage ${stage}: completed`);
    } else {
      steps.push({ name: stage, status: 'failed', startTime, endTime, error: result.error });
      logger.error({ stage, error: result.error }, `Stage ${stage}: failed`);
    }
    return result;
  };

  const finish = (outcome: Outcome, failure?: { stage: PipelineStage; error: string }): PipelineSummary => {
    summary.outcome = failure ? mergeOutcomes(outcome, 'FAIL') : outcome;
    summary.status = failure ? 'FAILED' : statusForOutcome(summary.outcome);
    if (failure) {
      summary.failedStage = failure.stage;
      summary.error = failure.error;
    }
    summary.durationMs = now().getTime() - startedAt.getTime();

    logger.info(
      {
        status: summary.status,
        outcome: summary.outcome,
        failedStage: summary.failedStage,
        durationMs: summary.durationMs,
      },
      `Pipeline finished: ${summary.status}`,
    );
    return summary;
  };

  // Nothing is built, scanned or pushed before the reference and the target
  // selection are known to be valid.
  const selection = await runStage<Selection>('config', async () => {
    if (!config.ref) {
      throw new ConfigurationError(
        'No source reference given (--ref, PIPELINE_REF, BRANCH_NAME or GIT_REF)',
        'ref',
      );
    }
    const ref = parseReference(config.ref);
    const versionTag = deriveVersionTag(ref);
    const catalog = await deps.loadCatalog(config.catalogPath);
    const targets = resolveTargets(config.targets, catalog, logger, { strict: config.strict });
    return Success({ ref, versionTag, targets });
  });

  if (!selection.ok) {
    return finish('FAIL', { stage: 'config', error: selection.error });
  }

  const { ref, versionTag, targets } = selection.value;
  summary.ref = ref;
  summary.versionTag = versionTag;
  summary.targets = targets.map((t) => t.name);
  logger.info({ ref, versionTag, targets: summary.targets }, `Releasing ${summary.targets.join(', ')} as ${versionTag}`);

  const built = await runStage('build', () =>
    buildImages(
      {
        targets,
        versionTag,
        parallel: config.parallel,
        cache: config.cache,
        timeoutMs: config.buildTimeoutMs,
      },
      { docker: deps.docker, logger },
    ),
  );
  if (!built.ok) {
    return finish('FAIL', { stage: 'build', error: built.error });
  }
  const artifacts = built.value;
  summary.artifacts = artifacts;

  const scanned = await runStage<ScanResult[]>('scan', async () => {
    const ready = await deps.scanner.initialize();
    if (!ready.ok) {
      return Failure(ready.error);
    }
    return scanImages(
      {
        artifacts,
        reportDir: config.reportDir,
        severities: config.scanSeverities,
        ignoreUnfixed: config.ignoreUnfixed,
      },
      { scanner: deps.scanner, logger },
    );
  });
  if (!scanned.ok) {
    return finish('FAIL', { stage: 'scan', error: scanned.error });
  }
  const results = scanned.value;

  const report = aggregate(results, { allowlist: config.allowlist, policy: config.failurePolicy });
  summary.report = report;
  summary.overThresholdTargets = report.overThresholdTargets;
  logger.info(
    {
      outcome: report.outcome,
      totalReportable: report.totalReportable,
      reportableByTarget: report.reportableByTarget,
    },
    `Scan outcome ${report.outcome}: ${report.totalReportable} ${config.allowlist.join('/')} finding(s)`,
  );
  if (report.overThresholdTargets.length > 0) {
    logger.warn(
      { targets: report.overThresholdTargets },
      `Vulnerabilities above threshold in: ${report.overThresholdTargets.join(', ')}`,
    );
  }

  const imageRefs = Object.fromEntries(artifacts.map((a) => [a.target.name, a.imageRef]));
  const rendered = await runStage('report', () =>
    renderReports(
      {
        report,
        results,
        reportDir: config.reportDir,
        imageRefs,
        generatedAt: now(),
      },
      { engine: deps.templates, logger },
    ),
  );
  if (!rendered.ok) {
    return finish(report.outcome, { stage: 'report', error: rendered.error });
  }
  summary.reportFiles = rendered.value;

  if (!config.push) {
    logger.info('Publishing disabled');
    return finish(report.outcome);
  }

  if (report.outcome === 'FAIL') {
    const at = now();
    steps.push({ name: 'publish', status: 'skipped', startTime: at, endTime: at });
    logger.warn(`Publishing skipped: outcome FAIL under policy ${report.policy}`);
    return finish(report.outcome);
  }

  const { registry: credentials } = config;
  const published = await runStage<PublishedImage[]>('publish', async () => {
    if (!credentials) {
      return Failure('No registry credentials configured');
    }
    return publishImages(
      {
        artifacts,
        credentials: {
          ...(credentials.url ? { registry: credentials.url } : {}),
          username: credentials.username,
          password: credentials.password,
        },
        retries: config.pushRetries,
        ...(deps.pushRetryDelayMs !== undefined ? { retryDelayMs: deps.pushRetryDelayMs } : {}),
      },
      { registry: deps.registry, logger },
    );
  });
  if (!published.ok) {
    return finish(report.outcome, { stage: 'publish', error: published.error });
  }
  summary.pushed = published.value;

  return finish(report.outcome);
}

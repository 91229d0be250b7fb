#!/usr/bin/env node
/**
 * image-release-pipeline CLI
 *
 * `run` executes the release pipeline, `targets` lists the catalog and
 * `summarize` re-renders reports from scan files already on disk.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { loadConfig, type ConfigOverrides, type PipelineConfig } from '../config';
import { loadCatalog } from '../config/catalog';
import { isConfigurationError } from '../errors';
import { createLogger } from '../lib/logger';
import { createTemplateEngine } from '../core/templates/factory';
import { createPipelineDependencies } from '../workflows/dependencies';
import { exitCodeFor, runPipeline } from '../workflows/release-pipeline';
import { summarizeReports } from '../workflows/summarize-reports';
import { errorMessage } from '../domain/types';
import type { PipelineSummary } from '../workflows/types';

export interface RunOptions {
  ref?: string;
  targets?: string;
  policy?: string;
  cache?: boolean;
  serial?: boolean;
  push?: boolean;
  strict?: boolean;
  catalog?: string;
  reportDir?: string;
  buildTimeout?: number;
  debug?: boolean;
}

export interface SummarizeOptions {
  policy?: string;
  debug?: boolean;
}

function packageVersion(): string {
  // src/cli and dist/cli both sit two levels below the package root
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

/**
 * Map parsed flags to config overrides. Flags left at their commander
 * default are not overrides, so the environment still applies.
 */
export function toOverrides(options: RunOptions, fromCli: (key: keyof RunOptions) => boolean): ConfigOverrides {
  return {
    ...(options.ref !== undefined ? { ref: options.ref } : {}),
    ...(options.targets !== undefined ? { targets: options.targets } : {}),
    ...(options.policy !== undefined ? { failurePolicy: options.policy } : {}),
    ...(fromCli('cache') && options.cache !== undefined ? { cache: options.cache } : {}),
    ...(options.serial ? { parallel: false } : {}),
    ...(options.push ? { push: true } : {}),
    ...(options.strict ? { strict: true } : {}),
    ...(options.debug ? { debug: true } : {}),
    ...(options.catalog !== undefined ? { catalogPath: options.catalog } : {}),
    ...(options.reportDir !== undefined ? { reportDir: options.reportDir } : {}),
    ...(options.buildTimeout !== undefined ? { buildTimeoutMs: options.buildTimeout } : {}),
  };
}

/** Human-readable lines for the end of a run */
export function formatSummary(summary: PipelineSummary): string[] {
  const icon = summary.status === 'SUCCESS' ? '✅' : summary.status === 'UNSTABLE' ? '⚠️' : '❌';
  const lines = [`${icon} Pipeline ${summary.status} (outcome ${summary.outcome}, run ${summary.runId})`];

  if (summary.versionTag) {
    lines.push(`  Version tag: ${summary.versionTag}`);
  }
  if (summary.targets.length > 0) {
    lines.push(`  Targets: ${summary.targets.join(', ')}`);
  }
  if (summary.report) {
    lines.push(`  Reportable findings: ${summary.report.totalReportable}`);
  }
  if (summary.overThresholdTargets.length > 0) {
    lines.push(`  Over threshold: ${summary.overThresholdTargets.join(', ')}`);
  }
  if (summary.reportFiles) {
    lines.push(`  Summary report: ${summary.reportFiles.summary}`);
  }
  for (const image of summary.pushed) {
    lines.push(`  Pushed: ${image.imageRef}${image.digest ? ` (${image.digest})` : ''}`);
  }
  if (summary.failedStage) {
    lines.push(`  Failed stage: ${summary.failedStage}: ${summary.error ?? 'unknown error'}`);
  }
  return lines;
}

function loadConfigOrReport(overrides: ConfigOverrides): PipelineConfig | undefined {
  try {
    return loadConfig(overrides);
  } catch (error) {
    if (isConfigurationError(error)) {
      console.error(`❌ ${error.message}`);
      return undefined;
    }
    throw error;
  }
}

async function runCommand(options: RunOptions, command: Command): Promise<void> {
  const config = loadConfigOrReport(
    toOverrides(options, (key) => command.getOptionValueSource(key) === 'cli'),
  );
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ debug: config.debug });
  const deps = await createPipelineDependencies(config, logger);
  if (!deps.ok) {
    console.error(`❌ ${deps.error}`);
    process.exitCode = 1;
    return;
  }

  const summary = await runPipeline(config, deps.value);
  formatSummary(summary).forEach((line) => console.error(line));
  process.exitCode = exitCodeFor(summary.status);
}

async function targetsCommand(options: { catalog?: string }): Promise<void> {
  const config = loadConfigOrReport(options.catalog !== undefined ? { catalogPath: options.catalog } : {});
  if (!config) {
    process.exitCode = 1;
    return;
  }

  try {
    const catalog = await loadCatalog(config.catalogPath);
    for (const target of catalog.values()) {
      console.log(`${target.name}\t${target.tag}\t${target.buildFileRef}`);
    }
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

async function summarizeCommand(reportDir: string, options: SummarizeOptions): Promise<void> {
  const config = loadConfigOrReport({
    reportDir,
    ...(options.policy !== undefined ? { failurePolicy: options.policy } : {}),
    ...(options.debug ? { debug: true } : {}),
  });
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ debug: config.debug });
  const templates = await createTemplateEngine(logger);
  if (!templates.ok) {
    console.error(`❌ ${templates.error}`);
    process.exitCode = 1;
    return;
  }

  const result = await summarizeReports(
    { reportDir: config.reportDir, allowlist: config.allowlist, policy: config.failurePolicy },
    { templates: templates.value, logger },
  );
  if (!result.ok) {
    console.error(`❌ ${result.error}`);
    process.exitCode = 1;
    return;
  }

  console.error(`📄 Summary dashboard created: ${result.value.reportFiles.summary}`);
  console.error(`   Outcome ${result.value.report.outcome}, ${result.value.report.totalReportable} reportable finding(s)`);
}

const parseInteger = (value: string): number => Number.parseInt(value, 10);

export function createProgram(): Command {
  const program = new Command();

  program
    .name('image-release-pipeline')
    .description('Build, scan, report on and publish container images for a release')
    .version(packageVersion());

  program
    .command('run')
    .description('run the release pipeline for the selected targets')
    .option('--ref <ref>', 'source reference (v* or release*), e.g. release/1.8')
    .option('--targets <list>', 'comma-separated target names, or "all"')
    .option('--policy <policy>', 'failure policy: fail-build or warn-only')
    .option('--no-cache', 'build without the layer cache')
    .option('--serial', 'build targets one after another in catalog order')
    .option('--push', 'push images when the scan outcome allows it')
    .option('--strict', 'reject unknown target names instead of skipping them')
    .option('--catalog <path>', 'target catalog file (YAML)')
    .option('--report-dir <dir>', 'directory for scan output and reports')
    .option('--build-timeout <ms>', 'per-build timeout in milliseconds', parseInteger)
    .option('--debug', 'enable debug logging')
    .action(runCommand);

  program
    .command('targets')
    .description('list the targets in the catalog')
    .option('--catalog <path>', 'target catalog file (YAML)')
    .action(targetsCommand);

  program
    .command('summarize')
    .description('re-aggregate trivy-<target>.json files and re-render the reports')
    .argument('<reportDir>', 'directory holding the scan output files')
    .option('--policy <policy>', 'failure policy: fail-build or warn-only')
    .option('--debug', 'enable debug logging')
    .action(summarizeCommand);

  program.addHelpText(
    'after',
    `

Exit codes:
  0  SUCCESS   no allowlisted findings
  2  UNSTABLE  findings under warn-only
  1  FAILED    findings under fail-build, or a stage failed

Environment Variables:
  PIPELINE_REF / BRANCH_NAME / GIT_REF   source reference
  PIPELINE_TARGETS                       target selection (default: all)
  FAILURE_POLICY                         fail-build | warn-only
  SEVERITY_ALLOWLIST                     severities that count (default: HIGH,CRITICAL)
  REGISTRY_URL, REGISTRY_USERNAME, REGISTRY_PASSWORD
  LOG_LEVEL, NODE_ENV
`,
  );

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(`❌ ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}

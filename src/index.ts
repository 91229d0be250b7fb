/**
 * Public exports for using the release pipeline as a library
 */

export { runPipeline, exitCodeFor } from './workflows/release-pipeline';
export { createPipelineDependencies } from './workflows/dependencies';
export { summarizeReports, targetNameFromScanFile } from './workflows/summarize-reports';
export type { PipelineDependencies, PipelineSummary, PipelineScanner, WorkflowStep } from './workflows/types';
export type { ReportsSummary, SummarizeReportsParams } from './workflows/summarize-reports';

export { loadConfig, pipelineConfigSchema, type PipelineConfig, type ConfigOverrides } from './config';
export { loadCatalog, parseCatalog } from './config/catalog';
export { parseReference, deriveVersionTag } from './config/reference';

export { resolveTargets, parseSelection } from './tools/resolve-targets';
export { buildImages, imageRefFor, buildArgsFor } from './tools/build-image';
export { scanImages, scanOutputFileName } from './tools/scan';
export {
  aggregate,
  countBySeverity,
  countReportable,
  decideOutcome,
  mergeOutcomes,
  statusForOutcome,
} from './tools/aggregate-findings';
export { renderReports, type ReportFiles } from './tools/render-report';
export { publishImages, type PublishedImage } from './tools/push-image';

export { TrivyScanner, FINDINGS_EXIT_CODE } from './infrastructure/scanners/trivy-scanner';
export { parseTrivyReport, readScanFile } from './infrastructure/scanners/trivy-report';
export { createDockerClient, type DockerClient } from './infrastructure/docker/client';
export { createRegistryClient, type RegistryClient, type RegistryCredentials } from './infrastructure/docker/registry';
export { CommandExecutor } from './infrastructure/command-executor';
export { TemplateEngine, createTemplateEngine } from './core/templates';

export { createLogger, createTimer, type Logger } from './lib/logger';
export { ApplicationError, ConfigurationError, TimeoutError } from './errors';
export * from './domain/types';

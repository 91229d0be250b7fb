/**
 * Release pipeline type definitions
 */

import type { Logger } from 'pino';
import type { DockerClient, RegistryClient } from '../infrastructure/docker';
import type { TrivyScanner } from '../infrastructure/scanners/trivy-scanner';
import type { TemplateEngine } from '../core/templates/template-engine';
import type { ReportFiles } from '../tools/render-report/tool';
import type { PublishedImage } from '../tools/push-image/tool';
import type {
  AggregateReport,
  BuiltArtifact,
  Catalog,
  Outcome,
  PipelineStage,
  PipelineStatus,
} from '../domain/types';

/**
 * Individual stage within a pipeline run
 *
 * Tracks the lifecycle of each stage for the run summary and for debugging
 * failed runs.
 */
export interface WorkflowStep {
  name: PipelineStage;
  status: 'completed' | 'failed' | 'skipped';
  startTime: Date;
  endTime: Date;
  error?: string;
}

export type PipelineScanner = Pick<TrivyScanner, 'initialize' | 'scanToFile'>;

/**
 * Collaborators of a pipeline run. Production wiring lives in
 * `createPipelineDependencies`; tests pass stand-ins.
 */
export interface PipelineDependencies {
  logger: Logger;
  loadCatalog: (path: string) => Promise<Catalog>;
  docker: DockerClient;
  scanner: PipelineScanner;
  registry: RegistryClient;
  templates: TemplateEngine;
  /** Delay before a push is retried */
  pushRetryDelayMs?: number;
  now?: () => Date;
}

/**
 * Result of one pipeline run. Always returned, also for failed runs; the
 * failing stage and its message are in `failedStage` and `error`.
 */
export interface PipelineSummary {
  runId: string;
  status: PipelineStatus;
  outcome: Outcome;
  ref?: string;
  versionTag?: string;
  targets: string[];
  artifacts: BuiltArtifact[];
  report?: AggregateReport;
  reportFiles?: ReportFiles;
  pushed: PublishedImage[];
  overThresholdTargets: string[];
  failedStage?: PipelineStage;
  error?: string;
  steps: WorkflowStep[];
  durationMs: number;
}

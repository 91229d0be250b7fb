/**
 * Pipeline domain types
 *
 * Targets, findings and the aggregate produced from them. Everything here is
 * plain data; the stages under `src/tools` create and consume it.
 */

export const SEVERITIES = ['UNKNOWN', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * Exact, case-sensitive membership test against the severity enum
 */
export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}

/**
 * A named buildable image.
 */
export interface BuildTarget {
  name: string;
  /** Path of the Dockerfile, relative to `context` */
  buildFileRef: string;
  /** Image repository the version tag is appended to, e.g. `shop/web` */
  tag: string;
  /** Build context directory (default: current directory) */
  context?: string;
  /** Extra build arguments, applied before ROLE and VERSION */
  buildArgs?: Record<string, string>;
}

/** Ordered name → target mapping; iteration order is catalog order */
export type Catalog = ReadonlyMap<string, BuildTarget>;

export interface BuiltArtifact {
  target: BuildTarget;
  /** `<target.tag>:<versionTag>` */
  imageRef: string;
  imageId: string;
}

export interface Finding {
  id: string;
  severity: Severity;
  packageName: string;
  installedVersion: string;
  fixedVersion?: string;
  title: string;
  description?: string;
}

export interface ScanResult {
  readonly target: BuildTarget;
  readonly findings: readonly Finding[];
  readonly outputPath?: string;
  /** Entries dropped because their severity is not one of {@link SEVERITIES} */
  readonly ignoredFindings: number;
  /** Output file was absent, empty or unparsable */
  readonly degraded: boolean;
}

export type SeverityCounts = Record<Severity, number> & { total: number };

export type Outcome = 'OK' | 'WARN' | 'FAIL';

export type FailurePolicy = 'fail-build' | 'warn-only';

export const FAILURE_POLICIES = ['fail-build', 'warn-only'] as const satisfies readonly FailurePolicy[];

export interface AggregateReport {
  perTarget: Record<string, SeverityCounts>;
  reportableByTarget: Record<string, number>;
  totalReportable: number;
  outcome: Outcome;
  overThresholdTargets: string[];
  policy: FailurePolicy;
  allowlist: Severity[];
}

export type PipelineStatus = 'SUCCESS' | 'UNSTABLE' | 'FAILED';

export type PipelineStage = 'config' | 'build' | 'scan' | 'report' | 'publish';

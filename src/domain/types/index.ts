/**
 * Domain Types - Unified exports
 */

export { Success, Failure, isFail, errorMessage, type Result } from './result';
export {
  SEVERITIES,
  FAILURE_POLICIES,
  isSeverity,
  type Severity,
  type BuildTarget,
  type Catalog,
  type BuiltArtifact,
  type Finding,
  type ScanResult,
  type SeverityCounts,
  type Outcome,
  type FailurePolicy,
  type AggregateReport,
  type PipelineStatus,
  type PipelineStage,
} from './pipeline';

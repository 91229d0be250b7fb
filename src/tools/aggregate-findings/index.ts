/**
 * Aggregate Findings Tool
 */

export {
  aggregate,
  countBySeverity,
  countReportable,
  decideOutcome,
  mergeOutcomes,
  statusForOutcome,
  emptyCounts,
  type AggregateOptions,
} from './tool';

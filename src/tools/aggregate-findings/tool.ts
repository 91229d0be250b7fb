/**
 * Aggregate Findings Tool
 *
 * Turns per-target scan results into counts and one OK / WARN / FAIL outcome.
 * Everything here is a pure function of its arguments.
 */

import {
  SEVERITIES,
  isSeverity,
  type AggregateReport,
  type FailurePolicy,
  type Finding,
  type Outcome,
  type PipelineStatus,
  type ScanResult,
  type Severity,
  type SeverityCounts,
} from '../../domain/types';

export interface AggregateOptions {
  allowlist: readonly Severity[];
  policy: FailurePolicy;
}

const OUTCOME_RANK: Record<Outcome, number> = { OK: 0, WARN: 1, FAIL: 2 };

export function emptyCounts(): SeverityCounts {
  return { UNKNOWN: 0, LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0, total: 0 };
}

/**
 * Count findings per severity. Severity strings outside the enum (wrong case
 * included) are skipped, so they reach neither a column nor the total.
 */
export function countBySeverity(findings: readonly Finding[]): SeverityCounts {
  const counts = emptyCounts();
  for (const finding of findings) {
    if (isSeverity(finding.severity)) {
      counts[finding.severity]++;
      counts.total++;
    }
  }
  return counts;
}

export function addCounts(a: SeverityCounts, b: SeverityCounts): SeverityCounts {
  const sum = emptyCounts();
  for (const severity of SEVERITIES) {
    sum[severity] = a[severity] + b[severity];
  }
  sum.total = a.total + b.total;
  return sum;
}

/** Findings whose severity is in the allowlist */
export function countReportable(findings: readonly Finding[], allowlist: readonly Severity[]): number {
  return findings.filter((finding) => allowlist.includes(finding.severity)).length;
}

export function decideOutcome(totalReportable: number, policy: FailurePolicy): Outcome {
  if (totalReportable === 0) {
    return 'OK';
  }
  return policy === 'fail-build' ? 'FAIL' : 'WARN';
}

/** Worst-of merge: FAIL > WARN > OK */
export function mergeOutcomes(...outcomes: Outcome[]): Outcome {
  return outcomes.reduce<Outcome>(
    (worst, outcome) => (OUTCOME_RANK[outcome] > OUTCOME_RANK[worst] ? outcome : worst),
    'OK',
  );
}

export function statusForOutcome(outcome: Outcome): PipelineStatus {
  switch (outcome) {
    case 'OK':
      return 'SUCCESS';
    case 'WARN':
      return 'UNSTABLE';
    case 'FAIL':
      return 'FAILED';
  }
}

/**
 * Aggregate every scan result under one policy. All results are counted before
 * the outcome is decided, so a FAIL always carries the complete picture.
 */
export function aggregate(
  results: readonly ScanResult[],
  { allowlist, policy }: AggregateOptions,
): AggregateReport {
  const perTarget: Record<string, SeverityCounts> = {};
  const reportableByTarget: Record<string, number> = {};

  for (const result of results) {
    const name = result.target.name;
    const counts = countBySeverity(result.findings);
    const reportable = countReportable(result.findings, allowlist);

    perTarget[name] = addCounts(perTarget[name] ?? emptyCounts(), counts);
    reportableByTarget[name] = (reportableByTarget[name] ?? 0) + reportable;
  }

  const totalReportable = Object.values(reportableByTarget).reduce((sum, n) => sum + n, 0);
  const overThresholdTargets = Object.keys(reportableByTarget).filter(
    (name) => (reportableByTarget[name] ?? 0) > 0,
  );

  return {
    perTarget,
    reportableByTarget,
    totalReportable,
    outcome: decideOutcome(totalReportable, policy),
    overThresholdTargets,
    policy,
    allowlist: [...allowlist],
  };
}

/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the default values used throughout the pipeline.
 */

import type { FailurePolicy, Severity } from '../domain/types';

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  build: 1800000, // 30 minutes
  scan: 600000, // 10 minutes
  push: 900000, // 15 minutes
} as const;

/** Severities that count toward the pass/fail decision */
export const DEFAULT_ALLOWLIST: readonly Severity[] = ['HIGH', 'CRITICAL'];

/** Severities requested from the scanner, so reports show the full picture */
export const DEFAULT_SCAN_SEVERITIES: readonly Severity[] = [
  'CRITICAL',
  'HIGH',
  'MEDIUM',
  'LOW',
  'UNKNOWN',
];

export const DEFAULT_FAILURE_POLICY: FailurePolicy = 'fail-build';

/** Each push is retried this many times before the stage fails */
export const DEFAULT_PUSH_RETRIES = 2;

export const DEFAULT_PATHS = {
  catalog: 'pipeline.yaml',
  reportDir: 'trivy-reports',
  trivyCache: '/tmp/trivy-cache',
} as const;

/**
 * Target names whose `trivy-<name>.html` page would collide with the
 * summary dashboard. Compared case-insensitively.
 */
export const RESERVED_TARGET_NAMES: readonly string[] = ['summary'];

/** Tokens that select the whole catalog */
export const WILDCARD_TOKENS: readonly string[] = ['all', '*'];

/** Build argument names receiving the target name and the version tag */
export const BUILD_ARG_NAMES = {
  role: 'ROLE',
  version: 'VERSION',
} as const;

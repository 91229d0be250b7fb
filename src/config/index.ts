/**
 * Pipeline configuration
 *
 * CLI flags win over environment variables, which win over the defaults in
 * `./defaults`. The merged object is validated once; anything malformed is a
 * ConfigurationError before a single build starts.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { FAILURE_POLICIES, SEVERITIES, type Severity } from '../domain/types';
import {
  DEFAULT_ALLOWLIST,
  DEFAULT_FAILURE_POLICY,
  DEFAULT_PATHS,
  DEFAULT_PUSH_RETRIES,
  DEFAULT_SCAN_SEVERITIES,
  DEFAULT_TIMEOUTS,
} from './defaults';

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

const booleanFlag = (fallback: boolean) =>
  z.preprocess((value) => {
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.includes(normalized)) return true;
      if (FALSE_VALUES.includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(fallback));

const severityList = (fallback: readonly Severity[]) =>
  z.preprocess(
    (value) =>
      typeof value === 'string'
        ? value
            .split(',')
            .map((token) => token.trim())
            .filter((token) => token.length > 0)
        : value,
    z.array(z.enum(SEVERITIES)).min(1).default(() => [...fallback]),
  );

const milliseconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const pipelineConfigSchema = z.object({
  ref: z.string().min(1).optional(),
  targets: z.string().min(1).default('all'),
  failurePolicy: z.enum(FAILURE_POLICIES).default(DEFAULT_FAILURE_POLICY),
  cache: booleanFlag(true),
  parallel: booleanFlag(true),
  push: booleanFlag(false),
  debug: booleanFlag(false),
  strict: booleanFlag(false),
  catalogPath: z.string().min(1).default(DEFAULT_PATHS.catalog),
  reportDir: z.string().min(1).default(DEFAULT_PATHS.reportDir),
  buildTimeoutMs: milliseconds(DEFAULT_TIMEOUTS.build),
  scanTimeoutMs: milliseconds(DEFAULT_TIMEOUTS.scan),
  pushTimeoutMs: milliseconds(DEFAULT_TIMEOUTS.push),
  allowlist: severityList(DEFAULT_ALLOWLIST),
  scanSeverities: severityList(DEFAULT_SCAN_SEVERITIES),
  ignoreUnfixed: booleanFlag(true),
  skipDbUpdate: booleanFlag(false),
  scannerPath: z.string().min(1).default('trivy'),
  trivyCacheDir: z.string().min(1).default(DEFAULT_PATHS.trivyCache),
  pushRetries: z.coerce.number().int().min(0).max(10).default(DEFAULT_PUSH_RETRIES),
  registry: z
    .object({
      url: z.string().min(1).optional(),
      username: z.string().min(1),
      password: z.string().min(1),
    })
    .optional(),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

/**
 * Values taken from the command line. Only set keys override the environment.
 */
export interface ConfigOverrides {
  ref?: string;
  targets?: string;
  failurePolicy?: string;
  cache?: boolean;
  parallel?: boolean;
  push?: boolean;
  debug?: boolean;
  strict?: boolean;
  catalogPath?: string;
  reportDir?: string;
  buildTimeoutMs?: number;
}

function registryFromEnv(env: NodeJS.ProcessEnv): Record<string, string> | undefined {
  const { REGISTRY_URL, REGISTRY_USERNAME, REGISTRY_PASSWORD } = env;
  if (!REGISTRY_USERNAME && !REGISTRY_PASSWORD) {
    return undefined;
  }
  return {
    ...(REGISTRY_URL ? { url: REGISTRY_URL } : {}),
    username: REGISTRY_USERNAME ?? '',
    password: REGISTRY_PASSWORD ?? '',
  };
}

/**
 * Merge CLI overrides with the environment and validate
 * @throws ConfigurationError listing every invalid key
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const raw = {
    ref: overrides.ref ?? env.PIPELINE_REF ?? env.BRANCH_NAME ?? env.GIT_REF,
    targets: overrides.targets ?? env.PIPELINE_TARGETS,
    failurePolicy: overrides.failurePolicy ?? env.FAILURE_POLICY,
    cache: overrides.cache ?? env.BUILD_CACHE,
    parallel: overrides.parallel ?? env.PARALLEL_BUILDS,
    push: overrides.push ?? env.PUSH_IMAGES,
    debug: overrides.debug ?? env.PIPELINE_DEBUG,
    strict: overrides.strict ?? env.STRICT_TARGETS,
    catalogPath: overrides.catalogPath ?? env.PIPELINE_CATALOG,
    reportDir: overrides.reportDir ?? env.REPORT_DIR,
    buildTimeoutMs: overrides.buildTimeoutMs ?? env.BUILD_TIMEOUT,
    scanTimeoutMs: env.SCAN_TIMEOUT,
    pushTimeoutMs: env.PUSH_TIMEOUT,
    allowlist: env.SEVERITY_ALLOWLIST,
    scanSeverities: env.SCAN_SEVERITIES,
    ignoreUnfixed: env.IGNORE_UNFIXED,
    skipDbUpdate: env.TRIVY_SKIP_DB_UPDATE,
    scannerPath: env.TRIVY_PATH,
    trivyCacheDir: env.TRIVY_CACHE_DIR,
    pushRetries: env.PUSH_RETRIES,
    registry: registryFromEnv(env),
  };

  const parsed = pipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues[0]?.split(':')[0]);
  }

  const config = parsed.data;
  if (config.push && !config.registry) {
    throw new ConfigurationError(
      'Push is enabled but no registry credentials are set (REGISTRY_USERNAME, REGISTRY_PASSWORD)',
      'registry',
    );
  }

  return config;
}

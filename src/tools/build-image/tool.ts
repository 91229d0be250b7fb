/**
 * Build the images of the resolved targets.
 *
 * Parallel mode launches every build at once and joins them all before
 * reporting; serial mode follows catalog order and stops at the first
 * failure. Either way a failed or timed-out build fails the stage.
 *
 * @example
 * ```typescript
 * const result = await buildImages(
 *   { targets, versionTag: 'release-1.8', parallel: true, cache: true, timeoutMs: 1_800_000 },
 *   { docker: createDockerClient(logger), logger },
 * );
 * ```
 */

import type { DockerClient } from '../../infrastructure/docker/client';
import { createTimer, type Logger } from '../../lib/logger';
import { BUILD_ARG_NAMES } from '../../config/defaults';
import {
  Success,
  Failure,
  errorMessage,
  type Result,
  type BuildTarget,
  type BuiltArtifact,
} from '../../domain/types';

export interface BuildImagesParams {
  targets: readonly BuildTarget[];
  versionTag: string;
  parallel: boolean;
  cache: boolean;
  /** Per-build timeout in milliseconds */
  timeoutMs: number;
}

export interface BuildImagesDeps {
  docker: DockerClient;
  logger: Logger;
}

interface TargetBuildFailure {
  target: string;
  error: string;
}

/** `<repository>:<versionTag>` */
export function imageRefFor(target: BuildTarget, versionTag: string): string {
  return `${target.tag}:${versionTag}`;
}

/**
 * Build arguments for a target. ROLE and VERSION are substituted literally
 * and take precedence over the target's own arguments.
 */
export function buildArgsFor(target: BuildTarget, versionTag: string): Record<string, string> {
  return {
    ...target.buildArgs,
    [BUILD_ARG_NAMES.role]: target.name,
    [BUILD_ARG_NAMES.version]: versionTag,
  };
}

async function buildTarget(
  target: BuildTarget,
  params: BuildImagesParams,
  { docker, logger }: BuildImagesDeps,
): Promise<Result<BuiltArtifact>> {
  const imageRef = imageRefFor(target, params.versionTag);
  logger.info({ target: target.name, imageRef }, `Building ${imageRef}`);

  const result = await docker.buildImage({
    dockerfile: target.buildFileRef,
    t: imageRef,
    ...(target.context ? { context: target.context } : {}),
    buildargs: buildArgsFor(target, params.versionTag),
    nocache: !params.cache,
    timeoutMs: params.timeoutMs,
  });

  if (!result.ok) {
    logger.error({ target: target.name, error: result.error }, `Build of ${target.name} failed`);
    return Failure(result.error);
  }

  logger.info({ target: target.name, imageId: result.value.imageId }, `Built ${imageRef}`);
  return Success({ target, imageRef, imageId: result.value.imageId });
}

function describeFailures(failures: TargetBuildFailure[]): string {
  const names = failures.map((f) => f.target).join(', ');
  const details = failures.map((f) => `${f.target}: ${f.error}`).join('; ');
  return `Build failed for ${names} (${details})`;
}

async function buildInParallel(
  params: BuildImagesParams,
  deps: BuildImagesDeps,
): Promise<Result<BuiltArtifact[]>> {
  const settled = await Promise.allSettled(
    params.targets.map((target) => buildTarget(target, params, deps)),
  );

  const artifacts: BuiltArtifact[] = [];
  const failures: TargetBuildFailure[] = [];

  settled.forEach((outcome, index) => {
    const name = params.targets[index]?.name ?? `#${index}`;
    if (outcome.status === 'rejected') {
      failures.push({ target: name, error: errorMessage(outcome.reason) });
    } else if (!outcome.value.ok) {
      failures.push({ target: name, error: outcome.value.error });
    } else {
      artifacts.push(outcome.value.value);
    }
  });

  return failures.length > 0 ? Failure(describeFailures(failures)) : Success(artifacts);
}

async function buildInSequence(
  params: BuildImagesParams,
  deps: BuildImagesDeps,
): Promise<Result<BuiltArtifact[]>> {
  const artifacts: BuiltArtifact[] = [];

  for (const [index, target] of params.targets.entries()) {
    const result = await buildTarget(target, params, deps);
    if (!result.ok) {
      const skipped = params.targets.slice(index + 1).map((t) => t.name);
      if (skipped.length > 0) {
        deps.logger.warn({ skipped }, `Skipping remaining builds: ${skipped.join(', ')}`);
      }
      return Failure(describeFailures([{ target: target.name, error: result.error }]));
    }
    artifacts.push(result.value);
  }

  return Success(artifacts);
}

/**
 * Build every target and return the artifacts in target order
 */
export async function buildImages(
  params: BuildImagesParams,
  deps: BuildImagesDeps,
): Promise<Result<BuiltArtifact[]>> {
  const timer = createTimer(deps.logger, 'build-images', {
    targets: params.targets.length,
    parallel: params.parallel,
  });

  deps.logger.info(
    `Building ${params.targets.length} image(s) ${params.parallel ? 'in parallel' : 'sequentially'}`,
  );

  const result = params.parallel
    ? await buildInParallel(params, deps)
    : await buildInSequence(params, deps);

  if (result.ok) {
    timer.end({ built: result.value.length });
  } else {
    timer.error(result.error);
  }
  return result;
}

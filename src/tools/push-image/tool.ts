/**
 * Push Image Tool
 *
 * Publishes built artifacts: one login, each push retried on its own, and a
 * logout that runs whatever happened before it.
 */

import type { RegistryClient, RegistryCredentials } from '../../infrastructure/docker/registry';
import { retryResult } from '../../shared/async';
import { createTimer, type Logger } from '../../lib/logger';
import { Success, Failure, type Result, type BuiltArtifact } from '../../domain/types';

export interface PublishedImage {
  target: string;
  imageRef: string;
  digest?: string;
}

export interface PublishImagesParams {
  artifacts: readonly BuiltArtifact[];
  credentials: RegistryCredentials;
  /** Retries per push after the first attempt */
  retries: number;
  /** Delay before the first retry; doubles on each further retry */
  retryDelayMs?: number;
}

export interface PublishImagesDeps {
  registry: RegistryClient;
  logger: Logger;
}

export async function publishImages(
  params: PublishImagesParams,
  { registry, logger }: PublishImagesDeps,
): Promise<Result<PublishedImage[]>> {
  const { artifacts, credentials, retries, retryDelayMs = 2000 } = params;
  const timer = createTimer(logger, 'push-images', {
    artifacts: artifacts.length,
    registry: credentials.registry ?? 'docker.io',
  });

  try {
    const login = await registry.login(credentials);
    if (!login.ok) {
      timer.error(login.error);
      return Failure(`Registry login failed: ${login.error}`);
    }

    const published: PublishedImage[] = [];

    for (const { target, imageRef } of artifacts) {
      logger.info({ target: target.name, imageRef }, `Pushing ${imageRef}`);

      let attempts = 0;
      const pushed = await retryResult(
        (attempt) => {
          attempts = attempt;
          return registry.push(imageRef);
        },
        {
          retries,
          delayMs: retryDelayMs,
          onRetry: (attempt, error) =>
            logger.warn({ target: target.name, imageRef, attempt, error }, `Push of ${imageRef} failed, retrying`),
        },
      );

      if (!pushed.ok) {
        timer.error(pushed.error, { target: target.name, attempts });
        return Failure(`Push failed for ${target.name} after ${attempts} attempt(s): ${pushed.error}`);
      }

      published.push({
        target: target.name,
        imageRef,
        ...(pushed.value.digest ? { digest: pushed.value.digest } : {}),
      });
      logger.info({ target: target.name, imageRef, digest: pushed.value.digest }, `Pushed ${imageRef}`);
    }

    timer.end({ pushed: published.length });
    return Success(published);
  } finally {
    const logout = await registry.logout(credentials.registry);
    if (!logout.ok) {
      logger.warn({ error: logout.error }, 'Registry logout failed');
    }
  }
}

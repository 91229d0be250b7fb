/**
 * Docker Registry Client
 *
 * Pushes through the engine API. Login checks the credentials against the
 * registry once and keeps them for the pushes; logout drops them.
 */

import type { Readable } from 'node:stream';
import Docker from 'dockerode';
import type { Logger } from 'pino';
import { Success, Failure, errorMessage, type Result } from '../../domain/types';
import { isApplicationError } from '../../errors';
import { withTimeout } from '../../shared/async';
import { asReadable } from './client';

export interface RegistryCredentials {
  /** Registry host; Docker Hub when omitted */
  registry?: string;
  username: string;
  password: string;
}

export interface RegistryPushResult {
  imageRef: string;
  digest?: string;
}

export interface RegistryClient {
  login: (credentials: RegistryCredentials) => Promise<Result<void>>;
  push: (imageRef: string) => Promise<Result<RegistryPushResult>>;
  logout: (registry?: string) => Promise<Result<void>>;
}

export interface RegistryClientOptions {
  /** Upper bound for one push; 0 disables it */
  pushTimeoutMs?: number;
}

export const DOCKER_HUB_ADDRESS = 'https://index.docker.io/v1/';

interface DockerPushEvent {
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
  aux?: { Digest?: string };
}

/**
 * Create a registry client backed by the engine API
 * @param docker - Engine connection, shared with the build client in production
 */
export const createRegistryClient = (
  logger: Logger,
  docker: Docker = new Docker(),
  { pushTimeoutMs = 900000 }: RegistryClientOptions = {},
): RegistryClient => {
  let authconfig: Docker.AuthConfigObject | undefined;

  const followPush = (stream: Readable): Promise<DockerPushEvent[]> =>
    new Promise<DockerPushEvent[]>((resolve, reject) => {
      docker.modem.followProgress(
        stream,
        (err: Error | null, res: DockerPushEvent[]) => (err ? reject(err) : resolve(res)),
        (event: DockerPushEvent) => logger.trace(event, 'Docker push progress'),
      );
    });

  return {
    async login(credentials: RegistryCredentials): Promise<Result<void>> {
      const candidate: Docker.AuthConfig = {
        username: credentials.username,
        password: credentials.password,
        serveraddress: credentials.registry ?? DOCKER_HUB_ADDRESS,
      };

      try {
        await docker.checkAuth(candidate);
      } catch (error) {
        return Failure(`docker login failed: ${errorMessage(error)}`);
      }

      authconfig = candidate;
      logger.info({ registry: candidate.serveraddress }, 'Registry login succeeded');
      return Success(undefined);
    },

    async push(imageRef: string): Promise<Result<RegistryPushResult>> {
      let stream: Readable | undefined;

      try {
        const image = docker.getImage(imageRef);
        const events = await withTimeout(
          async () => {
            const response = await image.push(authconfig ? { authconfig } : {});
            stream = asReadable(response);
            return followPush(stream);
          },
          {
            timeoutMs: pushTimeoutMs,
            operation: `docker push of ${imageRef}`,
            onTimeout: () => stream?.destroy(),
          },
        );

        const failed = events.find((event) => event.error ?? event.errorDetail?.message);
        if (failed) {
          return Failure(`docker push failed: ${failed.errorDetail?.message ?? failed.error ?? 'Unknown error'}`);
        }

        const digest = [...events].reverse().find((event) => event.aux?.Digest)?.aux?.Digest;
        logger.info({ imageRef, digest }, 'Image pushed successfully');
        return Success({ imageRef, ...(digest ? { digest } : {}) });
      } catch (error) {
        return Failure(isApplicationError(error) ? error.message : `docker push failed: ${errorMessage(error)}`);
      }
    },

    async logout(registry?: string): Promise<Result<void>> {
      if (authconfig) {
        logger.info({ registry: registry ?? authconfig.serveraddress }, 'Registry credentials dropped');
      }
      authconfig = undefined;
      return Success(undefined);
    },
  };
};

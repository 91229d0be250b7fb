/**
 * Docker client for image builds
 */

import { Readable } from 'node:stream';
import Docker from 'dockerode';
import { glob } from 'glob';
import type { Logger } from 'pino';
import { Success, Failure, errorMessage, type Result } from '../../domain/types';
import { isApplicationError } from '../../errors';
import { withTimeout } from '../../shared/async';

/**
 * Options for building a Docker image.
 */
export interface DockerBuildOptions {
  /** Path to Dockerfile relative to context */
  dockerfile: string;
  /** Tag applied to the built image */
  t: string;
  /** Build context directory (default: current directory) */
  context?: string;
  /** Build-time variables (Docker ARG values), passed through verbatim */
  buildargs?: Record<string, string>;
  /** Disable the layer cache */
  nocache?: boolean;
  /** Upper bound for the whole build; 0 disables it */
  timeoutMs?: number;
}

/**
 * Result of a Docker image build operation.
 */
export interface DockerBuildResult {
  /** Unique identifier of the built image */
  imageId: string;
  /** Build output lines */
  logs: string[];
}

/**
 * Docker client interface for container operations.
 */
export interface DockerClient {
  buildImage: (options: DockerBuildOptions) => Promise<Result<DockerBuildResult>>;
}

interface DockerBuildEvent {
  stream?: string;
  error?: string;
  errorDetail?: { message?: string };
  aux?: { ID?: string };
}

/** Lines of build output kept for the failure message */
const LOG_TAIL = 20;

export function asReadable(stream: NodeJS.ReadableStream): Readable {
  return stream instanceof Readable ? stream : new Readable().wrap(stream);
}

/**
 * Create a Docker client backed by the engine API
 * @param logger - Logger instance for debug output
 * @param docker - Engine connection (default: environment / local socket)
 */
export const createDockerClient = (logger: Logger, docker: Docker = new Docker()): DockerClient => {
  const followBuild = (stream: Readable): Promise<DockerBuildEvent[]> =>
    new Promise<DockerBuildEvent[]>((resolve, reject) => {
      docker.modem.followProgress(
        stream,
        (err: Error | null, res: DockerBuildEvent[]) => (err ? reject(err) : resolve(res)),
        (event: DockerBuildEvent) => logger.trace(event, 'Docker build progress'),
      );
    });

  return {
    async buildImage(options: DockerBuildOptions): Promise<Result<DockerBuildResult>> {
      let stream: Readable | undefined;

      try {
        logger.debug({ tag: options.t, dockerfile: options.dockerfile }, 'Starting Docker build');

        const contextPath = options.context ?? '.';
        // dockerode tars these entries itself and applies .dockerignore
        const src = (await glob('**/*', { cwd: contextPath, dot: true, nodir: true, posix: true })).sort();

        const events = await withTimeout(
          async () => {
            const response = await docker.buildImage({ context: contextPath, src }, {
              t: options.t,
              dockerfile: options.dockerfile,
              ...(options.buildargs ? { buildargs: options.buildargs } : {}),
              nocache: options.nocache ?? false,
            });
            stream = asReadable(response);
            return followBuild(stream);
          },
          {
            timeoutMs: options.timeoutMs ?? 0,
            operation: `Build of ${options.t}`,
            onTimeout: () => stream?.destroy(),
          },
        );

        const logs = events
          .map((event) => event.stream?.trimEnd())
          .filter((line): line is string => line !== undefined && line.length > 0);

        const failed = events.find((event) => event.error ?? event.errorDetail?.message);
        if (failed) {
          const reason = failed.errorDetail?.message ?? failed.error ?? 'Unknown error';
          logger.error({ tag: options.t, reason, logs: logs.slice(-LOG_TAIL) }, 'Docker build failed');
          return Failure(`Build failed: ${reason}`);
        }

        const imageId = [...events].reverse().find((event) => event.aux?.ID)?.aux?.ID ?? '';

        logger.debug({ tag: options.t, imageId }, 'Docker build completed successfully');
        return Success({ imageId, logs });
      } catch (error) {
        const reason = isApplicationError(error) ? error.message : `Build failed: ${errorMessage(error)}`;
        logger.error({ error: reason, tag: options.t }, 'Docker build failed');

        return Failure(reason);
      }
    },
  };
};

/**
 * Production wiring for the release pipeline
 */

import Docker from 'dockerode';
import type { Logger } from 'pino';
import { CommandExecutor } from '../infrastructure/command-executor';
import { createDockerClient, createRegistryClient } from '../infrastructure/docker';
import { TrivyScanner } from '../infrastructure/scanners/trivy-scanner';
import { createTemplateEngine } from '../core/templates/factory';
import { loadCatalog } from '../config/catalog';
import type { PipelineConfig } from '../config';
import { Success, Failure, type Result } from '../domain/types';
import type { PipelineDependencies } from './types';

export async function createPipelineDependencies(
  config: PipelineConfig,
  logger: Logger,
): Promise<Result<PipelineDependencies>> {
  const templates = await createTemplateEngine(logger);
  if (!templates.ok) {
    return Failure(templates.error);
  }

  const executor = new CommandExecutor(logger);
  const engine = new Docker();

  return Success({
    logger,
    loadCatalog,
    docker: createDockerClient(logger, engine),
    scanner: new TrivyScanner(
      logger,
      {
        scannerPath: config.scannerPath,
        cacheDir: config.trivyCacheDir,
        timeout: config.scanTimeoutMs,
        severity: config.scanSeverities,
        ignoreUnfixed: config.ignoreUnfixed,
        skipUpdate: config.skipDbUpdate,
      },
      executor,
    ),
    registry: createRegistryClient(logger, engine, { pushTimeoutMs: config.pushTimeoutMs }),
    templates: templates.value,
  });
}

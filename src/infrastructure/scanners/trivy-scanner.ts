/**
 * Trivy Scanner - Integration with Trivy vulnerability scanner
 *
 * Runs `trivy image` and leaves the JSON report in a file. The process exit
 * code only tells "the scan ran" apart from "the scanner failed to run";
 * whether the image passes is decided later from the parsed findings.
 */

import type { Logger } from 'pino';
import { CommandExecutor } from '../command-executor';
import { SEVERITIES, Success, Failure, errorMessage, type Result, type Severity } from '../../domain/types';

/** Passed as `--exit-code`, so a scan that found something is not mistaken for a crash */
export const FINDINGS_EXIT_CODE = 4;

export interface TrivyConfig {
  scannerPath?: string;
  cacheDir?: string;
  /** Per-scan timeout in milliseconds */
  timeout?: number;
  severity?: readonly Severity[];
  ignoreUnfixed?: boolean;
  skipUpdate?: boolean;
}

export interface ScanToFileOptions {
  severity?: readonly Severity[];
  ignoreUnfixed?: boolean;
}

export interface ScanInvocation {
  imageRef: string;
  outputPath: string;
  exitCode: number;
  /** Trivy reported findings through its exit code */
  findingsDetected: boolean;
}

/** Grace period on top of Trivy's own `--timeout` before the process is killed */
const KILL_GRACE_MS = 30_000;

export class TrivyScanner {
  private readonly executor: CommandExecutor;
  private readonly config: Required<TrivyConfig>;
  private isInitialized = false;

  constructor(
    private readonly logger: Logger,
    config?: TrivyConfig,
    executor?: CommandExecutor,
  ) {
    this.executor = executor ?? new CommandExecutor(logger);
    this.config = {
      scannerPath: config?.scannerPath ?? 'trivy',
      cacheDir: config?.cacheDir ?? '/tmp/trivy-cache',
      timeout: config?.timeout ?? 600000, // 10 minutes
      severity: config?.severity ?? SEVERITIES,
      ignoreUnfixed: config?.ignoreUnfixed ?? true,
      skipUpdate: config?.skipUpdate ?? false,
    };
  }

  /**
   * Check the scanner binary and refresh its vulnerability database
   */
  async initialize(): Promise<Result<void>> {
    try {
      const isAvailable = await this.executor.isAvailable(this.config.scannerPath);
      if (!isAvailable) {
        return Failure(
          `Trivy is not installed (looked for "${this.config.scannerPath}" on PATH)`,
        );
      }

      const version = await this.executor.getVersion(this.config.scannerPath, 'version');
      this.logger.info({ version }, 'Trivy scanner initialized');

      if (!this.config.skipUpdate) {
        this.logger.info('Updating Trivy vulnerability database...');
        const updateResult = await this.executor.execute(
          this.config.scannerPath,
          ['image', '--download-db-only', '--cache-dir', this.config.cacheDir],
          { timeout: 120000 },
        );

        if (updateResult.exitCode !== 0) {
          this.logger.warn(
            { stderr: updateResult.stderr },
            'Failed to update Trivy database, continuing with existing database',
          );
        }
      }

      this.isInitialized = true;
      return Success(undefined);
    } catch (error) {
      return Failure(`Failed to initialize Trivy scanner: ${errorMessage(error)}`);
    }
  }

  /**
   * Scan an image and write the JSON report to `outputPath`.
   *
   * Succeeds when Trivy ran to completion, with or without findings. Fails
   * when the binary is missing, cannot be started, times out, or exits with
   * any code other than 0 and {@link FINDINGS_EXIT_CODE}.
   */
  async scanToFile(
    imageRef: string,
    outputPath: string,
    options: ScanToFileOptions = {},
  ): Promise<Result<ScanInvocation>> {
    if (!this.isInitialized) {
      const initResult = await this.initialize();
      if (!initResult.ok) {
        return Failure(initResult.error);
      }
    }

    const severities = options.severity ?? this.config.severity;
    const args = [
      'image',
      '--format',
      'json',
      '--quiet',
      '--cache-dir',
      this.config.cacheDir,
      '--timeout',
      `${Math.ceil(this.config.timeout / 1000)}s`,
      '--exit-code',
      String(FINDINGS_EXIT_CODE),
    ];

    if (severities.length > 0) {
      args.push('--severity', severities.join(','));
    }

    if (options.ignoreUnfixed ?? this.config.ignoreUnfixed) {
      args.push('--ignore-unfixed');
    }

    args.push('--output', outputPath, imageRef);

    this.logger.info({ imageRef, outputPath }, 'Scanning image with Trivy');

    try {
      const result = await this.executor.execute(this.config.scannerPath, args, {
        timeout: this.config.timeout + KILL_GRACE_MS,
      });

      if (result.timedOut) {
        return Failure(`Trivy scan of ${imageRef} timed out`);
      }

      if (result.exitCode !== 0 && result.exitCode !== FINDINGS_EXIT_CODE) {
        return Failure(
          `Trivy scan of ${imageRef} failed (exit ${result.exitCode}): ${result.stderr || 'Unknown error'}`,
        );
      }

      return Success({
        imageRef,
        outputPath,
        exitCode: result.exitCode,
        findingsDetected: result.exitCode === FINDINGS_EXIT_CODE,
      });
    } catch (error) {
      return Failure(`Trivy could not be started: ${errorMessage(error)}`);
    }
  }
}

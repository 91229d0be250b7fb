/**
 * Command Executor - Utility for executing external commands
 * Runs the trivy CLI with a timeout, optional stdin and bounded output.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
  maxBuffer?: number;
  /** Grace period between SIGTERM and SIGKILL once the timeout fires */
  killAfterMs?: number;
  /** Written to the child's stdin, which is then closed */
  input?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut?: boolean;
  /** Signal that ended the process, if any */
  signal?: NodeJS.Signals;
}

export class CommandExecutor {
  constructor(private readonly logger: Logger) {}

  /**
   * Execute a command with arguments.
   *
   * Resolves with the exit code whatever it is; rejects only when the process
   * could not be started (e.g. ENOENT) or its output overflowed `maxBuffer`.
   */
  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = 30000,
      maxBuffer = 10 * 1024 * 1024, // 10MB
      killAfterMs = 5000,
      input,
    } = options;

    this.logger.debug({ command, args, cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        cwd,
        env,
        shell: false,
        stdio: [input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      };

      const child = spawn(command, args, spawnOptions);

      const fail = (error: Error): void => {
        if (settled) return;
        settled = true;
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }
        reject(error);
      };

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          setTimeout(() => {
            if (child.exitCode === null && child.signalCode === null) {
              child.kill('SIGKILL');
            }
          }, killAfterMs).unref();
        }, timeout);
      }

      if (input !== undefined && child.stdin) {
        child.stdin.on('error', (error: Error) => {
          this.logger.debug({ command, error: error.message }, 'stdin closed early');
        });
        child.stdin.end(input);
      }

      child.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stdout.length + chunk.length <= maxBuffer) {
          stdout += chunk;
        } else {
          child.kill('SIGTERM');
          fail(new Error(`Command output exceeded maximum buffer size of ${maxBuffer} bytes`));
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stderr.length + chunk.length <= maxBuffer) {
          stderr += chunk;
        }
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }

        const exitCode = code ?? -1;

        this.logger.debug({ command, exitCode, timedOut, signal }, 'Command completed');

        resolve({
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode,
          timedOut,
          ...(signal ? { signal } : {}),
        });
      });

      child.on('error', (error: Error) => {
        this.logger.error({ command, error: error.message }, 'Command execution failed');
        fail(error);
      });
    });
  }

  /**
   * Check if a command is available on PATH
   */
  async isAvailable(command: string): Promise<boolean> {
    try {
      const result = await this.execute('which', [command], { timeout: 5000 });
      return result.exitCode === 0 && result.stdout.length > 0;
    } catch (error) {
      this.logger.debug({ command, error }, 'Availability check failed');
      return false;
    }
  }

  /**
   * Get the first line of a command's version output
   */
  async getVersion(command: string, versionFlag = '--version'): Promise<string | null> {
    const result = await this.execute(command, [versionFlag], { timeout: 5000 });
    if (result.exitCode === 0 && result.stdout) {
      return result.stdout.split('\n')[0]?.trim() ?? null;
    }
    return null;
  }
}

/**
 * Trivy Scanner Unit Tests
 */

import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import type { Logger } from 'pino';
import { TrivyScanner, FINDINGS_EXIT_CODE } from '../../../../src/infrastructure/scanners/trivy-scanner';
import { CommandExecutor, type CommandResult } from '../../../../src/infrastructure/command-executor';
import { createMockLogger } from '../../../__support__/utilities/mock-infrastructure';

const completed = (exitCode: number, stderr = ''): CommandResult => ({
  stdout: '',
  stderr,
  exitCode,
  timedOut: false,
});

describe('TrivyScanner', () => {
  let logger: Logger;
  let executor: CommandExecutor;

  beforeEach(() => {
    logger = createMockLogger();
    executor = new CommandExecutor(logger);
    jest.spyOn(executor, 'isAvailable').mockResolvedValue(true);
    jest.spyOn(executor, 'getVersion').mockResolvedValue('Version: 0.50.1');
  });

  describe('initialize', () => {
    test('fails when the binary is not on PATH', async () => {
      jest.spyOn(executor, 'isAvailable').mockResolvedValue(false);
      const scanner = new TrivyScanner(logger, {}, executor);

      const result = await scanner.initialize();

      expect(result).toEqual({ ok: false, error: 'Trivy is not installed (looked for "trivy" on PATH)' });
    });

    test('refreshes the vulnerability database', async () => {
      const execute = jest.spyOn(executor, 'execute').mockResolvedValue(completed(0));
      const scanner = new TrivyScanner(logger, { cacheDir: '/var/cache/trivy' }, executor);

      const result = await scanner.initialize();

      expect(result.ok).toBe(true);
      expect(execute).toHaveBeenCalledWith(
        'trivy',
        ['image', '--download-db-only', '--cache-dir', '/var/cache/trivy'],
        { timeout: 120000 },
      );
    });

    test('continues when the database update fails', async () => {
      jest.spyOn(executor, 'execute').mockResolvedValue(completed(1, 'network unreachable'));
      const scanner = new TrivyScanner(logger, {}, executor);

      const result = await scanner.initialize();

      expect(result.ok).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith(
        { stderr: 'network unreachable' },
        'Failed to update Trivy database, continuing with existing database',
      );
    });

    test('skips the database update when configured', async () => {
      const execute = jest.spyOn(executor, 'execute');
      const scanner = new TrivyScanner(logger, { skipUpdate: true }, executor);

      await scanner.initialize();

      expect(execute).not.toHaveBeenCalled();
    });
  });

  describe('scanToFile', () => {
    let scanner: TrivyScanner;

    beforeEach(() => {
      scanner = new TrivyScanner(logger, { skipUpdate: true, timeout: 600000 }, executor);
    });

    test('writes a JSON report with a dedicated findings exit code', async () => {
      const execute = jest.spyOn(executor, 'execute').mockResolvedValue(completed(0));

      const result = await scanner.scanToFile('shop/web:release-1.8', 'trivy-reports/trivy-web.json');

      expect(result).toEqual({
        ok: true,
        value: {
          imageRef: 'shop/web:release-1.8',
          outputPath: 'trivy-reports/trivy-web.json',
          exitCode: 0,
          findingsDetected: false,
        },
      });
      expect(execute).toHaveBeenCalledWith(
        'trivy',
        [
          'image',
          '--format',
          'json',
          '--quiet',
          '--cache-dir',
          '/tmp/trivy-cache',
          '--timeout',
          '600s',
          '--exit-code',
          '4',
          '--severity',
          'UNKNOWN,LOW,MEDIUM,HIGH,CRITICAL',
          '--ignore-unfixed',
          '--output',
          'trivy-reports/trivy-web.json',
          'shop/web:release-1.8',
        ],
        { timeout: 630000 },
      );
    });

    test('applies per-scan severity and unfixed options', async () => {
      const execute = jest.spyOn(executor, 'execute').mockResolvedValue(completed(0));

      await scanner.scanToFile('shop/web:v1', 'out.json', { severity: ['HIGH', 'CRITICAL'], ignoreUnfixed: false });

      const args = execute.mock.calls[0]?.[1] ?? [];
      expect(args).toContain('HIGH,CRITICAL');
      expect(args).not.toContain('--ignore-unfixed');
    });

    test('treats the findings exit code as a completed scan', async () => {
      jest.spyOn(executor, 'execute').mockResolvedValue(completed(FINDINGS_EXIT_CODE));

      const result = await scanner.scanToFile('shop/web:v1', 'out.json');

      expect(result.ok && result.value.findingsDetected).toBe(true);
    });

    test('fails on any other exit code', async () => {
      jest.spyOn(executor, 'execute').mockResolvedValue(completed(1, 'unable to find the specified image'));

      const result = await scanner.scanToFile('shop/web:v1', 'out.json');

      expect(result).toEqual({
        ok: false,
        error: 'Trivy scan of shop/web:v1 failed (exit 1): unable to find the specified image',
      });
    });

    test('fails on timeout', async () => {
      jest.spyOn(executor, 'execute').mockResolvedValue({ ...completed(-1), timedOut: true });

      const result = await scanner.scanToFile('shop/web:v1', 'out.json');

      expect(result).toEqual({ ok: false, error: 'Trivy scan of shop/web:v1 timed out' });
    });

    test('fails when the process cannot be started', async () => {
      jest.spyOn(executor, 'execute').mockRejectedValue(new Error('spawn trivy ENOENT'));

      const result = await scanner.scanToFile('shop/web:v1', 'out.json');

      expect(result).toEqual({ ok: false, error: 'Trivy could not be started: spawn trivy ENOENT' });
    });

    test('fails without scanning when the binary is missing', async () => {
      jest.spyOn(executor, 'isAvailable').mockResolvedValue(false);
      const execute = jest.spyOn(executor, 'execute');

      const result = await scanner.scanToFile('shop/web:v1', 'out.json');

      expect(result.ok).toBe(false);
      expect(execute).not.toHaveBeenCalled();
    });
  });
});

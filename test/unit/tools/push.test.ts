/**
 * Publisher
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import type { Logger } from 'pino';
import { publishImages, type PublishImagesParams } from '../../../src/tools/push-image';
import {
  artifact,
  createMockLogger,
  createMockRegistryClient,
} from '../../__support__/utilities/mock-infrastructure';

const DIGEST = `sha256:${'b'.repeat(64)}`;

describe('publishImages', () => {
  let logger: Logger;
  let registry: ReturnType<typeof createMockRegistryClient>;

  const params: PublishImagesParams = {
    artifacts: [artifact('web'), artifact('nginx')],
    credentials: { registry: 'registry.example.com', username: 'ci', password: 'test-secret' },
    retries: 2,
    retryDelayMs: 0,
  };

  beforeEach(() => {
    logger = createMockLogger();
    registry = createMockRegistryClient();
  });

  test('logs in once, pushes every artifact and logs out', async () => {
    registry.push.mockImplementation(async (imageRef) => ({ ok: true, value: { imageRef, digest: DIGEST } }));

    const result = await publishImages(params, { registry, logger });

    expect(result).toEqual({
      ok: true,
      value: [
        { target: 'web', imageRef: 'shop/web:release-1.8', digest: DIGEST },
        { target: 'nginx', imageRef: 'shop/nginx:release-1.8', digest: DIGEST },
      ],
    });
    expect(registry.login).toHaveBeenCalledTimes(1);
    expect(registry.login).toHaveBeenCalledWith(params.credentials);
    expect(registry.logout).toHaveBeenCalledWith('registry.example.com');
  });

  test('retries a failing push', async () => {
    registry.push
      .mockResolvedValueOnce({ ok: false, error: 'net/http: TLS handshake timeout' })
      .mockResolvedValueOnce({ ok: false, error: 'net/http: TLS handshake timeout' });

    const result = await publishImages(params, { registry, logger });

    expect(result.ok).toBe(true);
    expect(registry.push).toHaveBeenCalledTimes(4);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  test('fails after the retries run out and pushes nothing further', async () => {
    registry.push.mockResolvedValue({ ok: false, error: 'denied: requested access to the resource is denied' });

    const result = await publishImages(params, { registry, logger });

    expect(result).toEqual({
      ok: false,
      error: 'Push failed for web after 3 attempt(s): denied: requested access to the resource is denied',
    });
    expect(registry.push).toHaveBeenCalledTimes(3);
    expect(registry.push).not.toHaveBeenCalledWith('shop/nginx:release-1.8');
    expect(registry.logout).toHaveBeenCalledTimes(1);
  });

  test('does not push when login fails, and still logs out', async () => {
    registry.login.mockResolvedValue({ ok: false, error: 'docker login failed: unauthorized' });

    const result = await publishImages(params, { registry, logger });

    expect(result).toEqual({ ok: false, error: 'Registry login failed: docker login failed: unauthorized' });
    expect(registry.push).not.toHaveBeenCalled();
    expect(registry.logout).toHaveBeenCalledTimes(1);
  });

  test('does not let a logout failure mask a successful push', async () => {
    registry.logout.mockResolvedValue({ ok: false, error: 'docker logout timed out' });

    const result = await publishImages(params, { registry, logger });

    expect(result.ok).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith({ error: 'docker logout timed out' }, 'Registry logout failed');
  });
});

import { describe, expect, it, vi } from 'vitest';

import type { EnvRef } from '../config/executionContext';
import type { SecretValue } from '../secretsManager/secretValue';
import { SecretCacheManager } from './SecretCacheManager';

const makeLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const makeManager = (
  fetch: (secretId: string) => Promise<SecretValue | undefined>,
  env: EnvRef = {},
) => {
  const accessor = { fetch: vi.fn(fetch) };
  const logger = makeLogger();
  const manager = new SecretCacheManager({ accessor, env, logger });
  return { accessor, logger, manager };
};

describe('SecretCacheManager', () => {
  it('serves repeat reads from the cache', async () => {
    const { accessor, manager } = makeManager(async () => ({ token: 't1' }));

    const first = await manager.get({ secretId: 'api' });
    const second = await manager.get({ secretId: 'api' });

    expect(second).toBe(first);
    expect(accessor.fetch).toHaveBeenCalledTimes(1);
    expect(accessor.fetch).toHaveBeenCalledWith('api');
  });

  it('always calls the store when useCache is false', async () => {
    const { accessor, manager } = makeManager(async () => ({ token: 't1' }));

    await manager.get({ secretId: 'api' });
    await manager.get({ secretId: 'api', useCache: false });
    await manager.get({ secretId: 'api', useCache: false });

    expect(accessor.fetch).toHaveBeenCalledTimes(3);
  });

  it('refetches after clear', async () => {
    const { accessor, manager } = makeManager(async () => ({ token: 't1' }));

    await manager.get({ secretId: 'api' });
    manager.clear();
    manager.clear();
    await manager.get({ secretId: 'api' });

    expect(accessor.fetch).toHaveBeenCalledTimes(2);
  });

  it('never caches failures', async () => {
    const { accessor, manager } = makeManager(async () => undefined);

    await expect(manager.get({ secretId: 'api' })).resolves.toBeUndefined();
    await expect(manager.get({ secretId: 'api' })).resolves.toBeUndefined();

    expect(accessor.fetch).toHaveBeenCalledTimes(2);
    expect(manager.cache.size).toBe(0);
  });

  it('resolves an empty secret id to undefined without fetching', async () => {
    const { accessor, logger, manager } = makeManager(async () => ({}));

    await expect(manager.get({ secretId: '' })).resolves.toBeUndefined();
    expect(accessor.fetch).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  describe('getField', () => {
    it('returns the default for a missing key', async () => {
      const { manager } = makeManager(async () => ({ present: 'p' }));
      await expect(
        manager.getField({ secretId: 's', key: 'missing', defaultValue: 'X' }),
      ).resolves.toBe('X');
    });

    it('returns the value for a present key', async () => {
      const { manager } = makeManager(async () => ({ present: 'p' }));
      await expect(
        manager.getField({ secretId: 's', key: 'present', defaultValue: 'X' }),
      ).resolves.toBe('p');
    });

    it('returns the whole secret without a key', async () => {
      const { manager } = makeManager(async () => ({ present: 'p' }));
      await expect(manager.getField({ secretId: 's' })).resolves.toEqual({
        present: 'p',
      });
    });

    it('returns the default when the secret is absent', async () => {
      const { manager } = makeManager(async () => undefined);
      await expect(
        manager.getField({ secretId: 's', defaultValue: 'X' }),
      ).resolves.toBe('X');
      await expect(
        manager.getField({ secretId: 's', key: 'k' }),
      ).resolves.toBeUndefined();
    });
  });

  describe('getCredentials', () => {
    const env: EnvRef = {
      AWS_ACCESS_KEY_ID: 'env-access-key',
      AWS_SECRET_ACCESS_KEY: 'env-secret',
      AWS_DEFAULT_REGION: 'eu-west-1',
    };

    it('falls back to env when the secret is absent', async () => {
      const { accessor, manager } = makeManager(async () => undefined, env);

      await expect(manager.getCredentials()).resolves.toEqual({
        accessKeyId: 'env-access-key',
        secretAccessKey: 'env-secret',
        region: 'eu-west-1',
      });
      expect(accessor.fetch).toHaveBeenCalledWith('aws-credentials');
    });

    it('uses a complete secret, defaulting region from env', async () => {
      const { manager } = makeManager(
        async () => ({
          aws_access_key_id: 'secret-access-key',
          aws_secret_access_key: 'test-secret',
        }),
        env,
      );

      await expect(manager.getCredentials()).resolves.toEqual({
        accessKeyId: 'secret-access-key',
        secretAccessKey: 'test-secret',
        region: 'eu-west-1',
      });
    });

    it('prefers the secret region and defaults to us-east-1', async () => {
      const withRegion = makeManager(async () => ({
        aws_access_key_id: 'k',
        aws_secret_access_key: 's',
        aws_region: 'ap-south-1',
      }));
      await expect(withRegion.manager.getCredentials()).resolves.toEqual({
        accessKeyId: 'k',
        secretAccessKey: 's',
        region: 'ap-south-1',
      });

      const withoutRegion = makeManager(async () => ({
        aws_access_key_id: 'k',
        aws_secret_access_key: 's',
      }));
      await expect(withoutRegion.manager.getCredentials()).resolves.toEqual({
        accessKeyId: 'k',
        secretAccessKey: 's',
        region: 'us-east-1',
      });
    });

    it('falls back wholesale when the secret is incomplete', async () => {
      const { manager } = makeManager(
        async () => ({ aws_access_key_id: 'secret-only-key', aws_region: 'x' }),
        env,
      );

      await expect(manager.getCredentials()).resolves.toEqual({
        accessKeyId: 'env-access-key',
        secretAccessKey: 'env-secret',
        region: 'eu-west-1',
      });
    });

    it('returns empty credentials without throwing when nothing is set', async () => {
      const { manager } = makeManager(async () => undefined);

      await expect(manager.getCredentials()).resolves.toEqual({
        accessKeyId: undefined,
        secretAccessKey: undefined,
        region: 'us-east-1',
      });
    });

    it('caches the credentials secret', async () => {
      const { accessor, manager } = makeManager(async () => ({
        aws_access_key_id: 'k',
        aws_secret_access_key: 's',
      }));

      await manager.getCredentials();
      await manager.getCredentials();

      expect(accessor.fetch).toHaveBeenCalledTimes(1);
    });
  });
});

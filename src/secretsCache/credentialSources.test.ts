import { describe, expect, it, vi } from 'vitest';

import {
  type CredentialSource,
  isCompleteCredentials,
  readEnvCredentials,
  resolveCredentials,
} from './credentialSources';

describe('credentialSources', () => {
  it('isCompleteCredentials requires both key fields', () => {
    expect(
      isCompleteCredentials({
        accessKeyId: 'k',
        secretAccessKey: 's',
        region: 'us-east-1',
      }),
    ).toBe(true);
    expect(
      isCompleteCredentials({
        accessKeyId: 'k',
        secretAccessKey: undefined,
        region: 'us-east-1',
      }),
    ).toBe(false);
    expect(isCompleteCredentials(undefined)).toBe(false);
  });

  it('stops at the first complete source', async () => {
    const third = vi.fn(async () => undefined);
    const sources: CredentialSource[] = [
      { name: 'empty', resolve: async () => undefined },
      {
        name: 'second',
        resolve: async () => ({
          accessKeyId: 'k2',
          secretAccessKey: 's2',
          region: 'eu-central-1',
        }),
      },
      { name: 'third', resolve: third },
    ];

    await expect(
      resolveCredentials(sources, () => readEnvCredentials({})),
    ).resolves.toEqual({
      source: 'second',
      credentials: {
        accessKeyId: 'k2',
        secretAccessKey: 's2',
        region: 'eu-central-1',
      },
    });
    expect(third).not.toHaveBeenCalled();
  });

  it('returns the fallback when no source is complete', async () => {
    await expect(
      resolveCredentials([], () =>
        readEnvCredentials({ AWS_ACCESS_KEY_ID: 'only-key' }),
      ),
    ).resolves.toEqual({
      source: 'fallback',
      credentials: {
        accessKeyId: 'only-key',
        secretAccessKey: undefined,
        region: 'us-east-1',
      },
    });
  });
});

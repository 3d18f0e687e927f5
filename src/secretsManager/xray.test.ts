import { afterEach, describe, expect, it, vi } from 'vitest';

import { captureAwsSdkV3Client, shouldEnableXray } from './xray';

describe('xray', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('shouldEnableXray honors mode and daemon address', () => {
    expect(shouldEnableXray('off', '127.0.0.1:2000')).toBe(false);
    expect(shouldEnableXray('on', undefined)).toBe(true);
    expect(shouldEnableXray('auto', undefined)).toBe(false);
    expect(shouldEnableXray('auto', '127.0.0.1:2000')).toBe(true);
  });

  it('returns the client untouched when capture is disabled', async () => {
    const client = { send: vi.fn() };
    await expect(
      captureAwsSdkV3Client(client, { mode: 'off' }),
    ).resolves.toBe(client);
    await expect(
      captureAwsSdkV3Client(client, { mode: 'auto', daemonAddress: '' }),
    ).resolves.toBe(client);
  });

  it('rejects forced capture without a daemon address', async () => {
    vi.stubEnv('AWS_XRAY_DAEMON_ADDRESS', '');
    await expect(
      captureAwsSdkV3Client({ send: vi.fn() }, { mode: 'on' }),
    ).rejects.toThrow(
      'X-Ray capture requested but AWS_XRAY_DAEMON_ADDRESS is not set.',
    );
  });
});

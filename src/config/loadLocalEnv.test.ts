import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { loadLocalEnv } from './loadLocalEnv';

const fixtureDir = fileURLToPath(
  new URL('./__fixtures__/dotenv', import.meta.url),
);

describe('loadLocalEnv', () => {
  it('loads dotenv values under the base environment', async () => {
    const env = await loadLocalEnv({
      base: { ENVIRONMENT: 'production' },
      paths: [fixtureDir],
    });

    expect(env.SECRETS_PREFIX).toBe('fixture-agent');
    expect(env.ENVIRONMENT).toBe('production');
  });

  it('returns the base environment untouched inside Lambda', async () => {
    const base = { AWS_LAMBDA_FUNCTION_NAME: 'agent-fn' };
    await expect(loadLocalEnv({ base, paths: [fixtureDir] })).resolves.toBe(
      base,
    );
  });
});

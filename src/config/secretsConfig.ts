/**
 * Requirements addressed:
 * - Read package settings from environment variables through a zod schema.
 * - Blank variables count as unset; unknown keys are stripped.
 * - Misconfiguration throws when the config is read.
 */

import { z } from 'zod';

import { DEFAULT_REGION, type EnvRef } from './executionContext';

export const DEFAULT_PREFIX = 'strands-agent';
export const DEFAULT_REFRESH_INTERVAL_SECONDS = 300;
export const DEFAULT_FETCH_TIMEOUT_MS = 5_000;
export const DEFAULT_PREWARM = ['aws-credentials'];

export const secretsConfigSchema = z.object({
  prefix: z.string().min(1).default(DEFAULT_PREFIX),
  region: z.string().min(1).default(DEFAULT_REGION),
  refreshIntervalSeconds: z.coerce
    .number()
    .nonnegative()
    .default(DEFAULT_REFRESH_INTERVAL_SECONDS),
  fetchTimeoutMs: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_FETCH_TIMEOUT_MS),
  prewarm: z.array(z.string().min(1)).default(DEFAULT_PREWARM),
  xray: z.enum(['auto', 'on', 'off']).default('auto'),
});

export type SecretsConfig = z.infer<typeof secretsConfigSchema>;

const blankToUndefined = (v: string | undefined): string | undefined =>
  v?.trim() ? v.trim() : undefined;

const splitList = (v: string | undefined): string[] | undefined => {
  const raw = blankToUndefined(v);
  if (!raw) return;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
};

/**
 * Resolve {@link SecretsConfig} from an environment map.
 *
 * @throws ZodError when a variable is set to an invalid value.
 */
export const readSecretsConfig = (env: EnvRef = process.env): SecretsConfig =>
  secretsConfigSchema.parse({
    prefix: blankToUndefined(env.SECRETS_PREFIX),
    region: blankToUndefined(env.AWS_DEFAULT_REGION),
    refreshIntervalSeconds: blankToUndefined(env.SECRETS_CACHE_TTL_SECONDS),
    fetchTimeoutMs: blankToUndefined(env.SECRETS_FETCH_TIMEOUT_MS),
    prewarm: splitList(env.SECRETS_PREWARM),
    xray: blankToUndefined(env.SECRETS_XRAY),
  });

/**
 * Requirements addressed:
 * - Local development reads dotenv files; Lambda never does.
 * - Variables already present in the base environment win over file values.
 * - Only file-backed values are loaded (dynamic variables excluded).
 */

import { getDotenv } from '@karmaniverous/get-dotenv';

import { type EnvRef, isLambdaEnvironment } from './executionContext';

export type LoadLocalEnvOptions = {
  /** Environment to merge over (defaults to `process.env`). */
  base?: EnvRef;
  /** Directories searched for dotenv files. */
  paths?: string[];
  dotenvToken?: string;
  privateToken?: string;
  /** Environment-specific dotenv files to include (e.g. `.env.staging`). */
  env?: string;
};

export const loadLocalEnv = async ({
  base = process.env,
  paths = ['./'],
  dotenvToken = '.env',
  privateToken = 'local',
  env,
}: LoadLocalEnvOptions = {}): Promise<EnvRef> => {
  if (isLambdaEnvironment(base)) return base;

  const loaded = await getDotenv({
    paths,
    dotenvToken,
    privateToken,
    ...(env ? { env } : {}),
    excludeDynamic: true,
  });

  return { ...loaded, ...base };
};

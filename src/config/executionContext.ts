/**
 * Requirements addressed:
 * - Detect the Lambda runtime from `AWS_LAMBDA_FUNCTION_NAME`.
 * - The deployment environment name is read on every call, never cached.
 * - Region defaults to `us-east-1` when `AWS_DEFAULT_REGION` is unset.
 */

/** Environment surface read by this package (usually `process.env`). */
export type EnvRef = Record<string, string | undefined>;

export const DEFAULT_ENVIRONMENT = 'development';
export const DEFAULT_REGION = 'us-east-1';

const readVar = (env: EnvRef, name: string): string | undefined => {
  const v = env[name]?.trim();
  return v ? v : undefined;
};

/** True when running inside AWS Lambda. */
export const isLambdaEnvironment = (env: EnvRef = process.env): boolean =>
  typeof env.AWS_LAMBDA_FUNCTION_NAME === 'string';

/** Current deployment environment (development, staging, production...). */
export const getEnvironment = (env: EnvRef = process.env): string =>
  readVar(env, 'ENVIRONMENT') ?? DEFAULT_ENVIRONMENT;

/** True when explicit credentials capable of reaching the store are set. */
export const hasStoreCredentials = (env: EnvRef = process.env): boolean =>
  Boolean(readVar(env, 'AWS_ACCESS_KEY_ID'));

export const getDefaultRegion = (env: EnvRef = process.env): string =>
  readVar(env, 'AWS_DEFAULT_REGION') ?? DEFAULT_REGION;

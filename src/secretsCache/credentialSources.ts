/**
 * Requirements addressed:
 * - Credentials come from an ordered list of sources; the first complete
 *   result wins.
 * - When no source is complete, the environment values are returned as-is
 *   (possibly empty). Nothing throws.
 */

import {
  type EnvRef,
  getDefaultRegion,
} from '../config/executionContext';
import type { SecretValue } from '../secretsManager/secretValue';

/** Well-known secret holding static AWS credentials. */
export const AWS_CREDENTIALS_SECRET_ID = 'aws-credentials';

export type AwsCredentials = {
  accessKeyId: string | undefined;
  secretAccessKey: string | undefined;
  region: string;
};

export type CompleteAwsCredentials = AwsCredentials & {
  accessKeyId: string;
  secretAccessKey: string;
};

export type CredentialSource = {
  /** Label used in logs. */
  name: string;
  resolve: () => Promise<AwsCredentials | undefined>;
};

export const isCompleteCredentials = (
  c: AwsCredentials | undefined,
): c is CompleteAwsCredentials => !!c?.accessKeyId && !!c.secretAccessKey;

const readString = (v: unknown): string | undefined =>
  typeof v === 'string' && v ? v : undefined;

/** Credentials stored under {@link AWS_CREDENTIALS_SECRET_ID}. */
export const secretCredentialSource = (
  getSecret: (secretId: string) => Promise<SecretValue | undefined>,
  env: EnvRef,
): CredentialSource => ({
  name: 'secret',
  resolve: async () => {
    const secret = await getSecret(AWS_CREDENTIALS_SECRET_ID);
    if (!secret) return;

    return {
      accessKeyId: readString(secret.aws_access_key_id),
      secretAccessKey: readString(secret.aws_secret_access_key),
      region: readString(secret.aws_region) ?? getDefaultRegion(env),
    };
  },
});

export const readEnvCredentials = (env: EnvRef): AwsCredentials => ({
  accessKeyId: readString(env.AWS_ACCESS_KEY_ID),
  secretAccessKey: readString(env.AWS_SECRET_ACCESS_KEY),
  region: getDefaultRegion(env),
});

export const envCredentialSource = (env: EnvRef): CredentialSource => ({
  name: 'env',
  resolve: async () => readEnvCredentials(env),
});

/**
 * Poll `sources` in order and return the first complete result, else
 * `fallback` wholesale.
 */
export const resolveCredentials = async (
  sources: CredentialSource[],
  fallback: () => AwsCredentials,
): Promise<{ source: string; credentials: AwsCredentials }> => {
  for (const source of sources) {
    const credentials = await source.resolve();
    if (isCompleteCredentials(credentials)) {
      return { source: source.name, credentials };
    }
  }
  return { source: 'fallback', credentials: fallback() };
};

/**
 * Requirements addressed:
 * - Build AWS SDK v3 client config for downstream clients (e.g. the model
 *   runtime) from resolved credentials.
 * - Static credentials are used only when both key fields are present;
 *   otherwise the SDK default provider chain applies.
 */

import { assertLogger, type SecretsLogger } from '../secretsManager/logger';
import type { Secrets } from '../secrets';

/** Subset of AWS SDK v3 client config produced here. */
export type AwsClientConfig = {
  region: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
};

export const resolveAwsClientConfig = async ({
  secrets,
  logger: candidate = console,
}: {
  secrets: Pick<Secrets, 'getAwsCredentials' | 'isLambdaEnvironment'>;
  logger?: SecretsLogger;
}): Promise<AwsClientConfig> => {
  const logger = assertLogger(candidate, 'resolveAwsClientConfig');

  logger.info(
    secrets.isLambdaEnvironment()
      ? 'Running in AWS Lambda environment'
      : 'Running in local environment',
  );

  const { accessKeyId, secretAccessKey, region } =
    await secrets.getAwsCredentials();

  if (accessKeyId && secretAccessKey) {
    logger.info('AWS client config uses credentials from configuration');
    logger.info(`Using AWS region: ${region}`);
    return { region, credentials: { accessKeyId, secretAccessKey } };
  }

  logger.info('AWS client config uses default credentials');
  logger.info(`Using AWS region: ${region}`);
  return { region };
};

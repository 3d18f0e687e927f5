/**
 * Requirements addressed:
 * - Optional AWS X-Ray capture of the Secrets Manager client.
 * - Default “auto”: only capture when AWS_XRAY_DAEMON_ADDRESS is set.
 * - Never import aws-xray-sdk unless capture is enabled (the SDK throws
 *   without daemon configuration).
 */

import type { SecretsLogger } from './logger';

export type XrayMode = 'auto' | 'on' | 'off';

type XraySdk = {
  captureAWSv3Client: <U extends object>(client: U) => U;
};

const isXraySdk = (v: unknown): v is XraySdk =>
  !!v &&
  typeof v === 'object' &&
  'captureAWSv3Client' in v &&
  typeof v.captureAWSv3Client === 'function';

// CJS interop: the SDK may arrive on `default` or as the namespace itself.
const unwrapDefault = (mod: unknown): unknown =>
  !!mod && typeof mod === 'object' && 'default' in mod && mod.default
    ? mod.default
    : mod;

export const shouldEnableXray = (
  mode: XrayMode | undefined,
  daemonAddress: string | undefined,
): boolean => {
  if (mode === 'off') return false;
  if (mode === 'on') return true;
  return Boolean(daemonAddress);
};

export const captureAwsSdkV3Client = async <TClient extends object>(
  client: TClient,
  {
    mode = 'auto',
    logger = console,
    daemonAddress = process.env.AWS_XRAY_DAEMON_ADDRESS,
  }: {
    mode?: XrayMode;
    logger?: SecretsLogger;
    daemonAddress?: string;
  } = {},
): Promise<TClient> => {
  if (!shouldEnableXray(mode, daemonAddress)) return client;

  if (!daemonAddress) {
    throw new Error(
      'X-Ray capture requested but AWS_XRAY_DAEMON_ADDRESS is not set.',
    );
  }

  let mod: unknown;
  try {
    mod = await import('aws-xray-sdk');
  } catch {
    throw new Error(
      "X-Ray capture is enabled but 'aws-xray-sdk' is not installed. Install it or set SECRETS_XRAY=off.",
    );
  }

  const sdk = unwrapDefault(mod);
  if (!isXraySdk(sdk)) {
    logger.debug('aws-xray-sdk does not expose captureAWSv3Client', sdk);
    throw new Error('aws-xray-sdk missing captureAWSv3Client export.');
  }

  logger.debug('Enabling AWS X-Ray capture for AWS SDK v3 client.');
  return sdk.captureAWSv3Client(client);
};

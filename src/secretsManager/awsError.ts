/**
 * Requirements addressed:
 * - Classify every store failure into a closed set of kinds.
 * - Not-found and access-denied are expected conditions (warn); everything
 *   else is a fault (error).
 */

import { SecretsManagerServiceException } from '@aws-sdk/client-secrets-manager';

type AwsishError = {
  name?: unknown;
  code?: unknown;
  Code?: unknown;
};

export type SecretFailureKind =
  | 'not-found'
  | 'access-denied'
  | 'store-error'
  | 'transport-error'
  | 'timeout'
  | 'unsupported';

/** Raised when a store call outlives its time budget. */
export class SecretFetchTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Secrets Manager call timed out after ${String(timeoutMs)}ms.`);
    this.name = 'SecretFetchTimeoutError';
  }
}

export const getAwsErrorCode = (err: unknown): string | undefined => {
  if (!err || typeof err !== 'object') return;
  const e = err as AwsishError;
  const code = e.name ?? e.code ?? e.Code;
  return typeof code === 'string' ? code : undefined;
};

export const isAwsErrorCode = (err: unknown, code: string): boolean =>
  getAwsErrorCode(err) === code;

export const isResourceNotFoundError = (err: unknown): boolean =>
  isAwsErrorCode(err, 'ResourceNotFoundException');

export const isAccessDeniedError = (err: unknown): boolean =>
  isAwsErrorCode(err, 'AccessDeniedException');

const isServiceError = (err: unknown): boolean =>
  err instanceof SecretsManagerServiceException ||
  (!!err &&
    typeof err === 'object' &&
    '$fault' in err &&
    typeof err.$fault === 'string');

export const classifySecretError = (err: unknown): SecretFailureKind => {
  if (err instanceof SecretFetchTimeoutError) return 'timeout';
  if (isResourceNotFoundError(err)) return 'not-found';
  if (isAccessDeniedError(err)) return 'access-denied';
  if (isServiceError(err)) return 'store-error';
  return 'transport-error';
};

/** Log level used for each failure kind. */
export const failureLogLevel = (
  kind: SecretFailureKind,
): 'warn' | 'error' =>
  kind === 'not-found' || kind === 'access-denied' || kind === 'unsupported'
    ? 'warn'
    : 'error';

/**
 * This is the main entry point for the library.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_ENVIRONMENT,
  DEFAULT_REGION,
  type EnvRef,
  getEnvironment,
  hasStoreCredentials,
} from './config/executionContext';
export { loadLocalEnv, type LoadLocalEnvOptions } from './config/loadLocalEnv';
export {
  readSecretsConfig,
  type SecretsConfig,
  secretsConfigSchema,
} from './config/secretsConfig';
export {
  type AwsClientConfig,
  resolveAwsClientConfig,
} from './lambda/awsClientConfig';
export {
  errorResponse,
  type HttpHandler,
  type HttpResult,
  withSecretsRefresh,
} from './lambda/withSecretsRefresh';
export {
  clearCache,
  createSecrets,
  type CreateSecretsOptions,
  getAwsCredentials,
  getDefaultSecrets,
  getSecret,
  getSecretValue,
  isLambdaEnvironment,
  refreshSecretsIfNeeded,
  type Secrets,
  setDefaultSecrets,
} from './secrets';
export {
  AWS_CREDENTIALS_SECRET_ID,
  type AwsCredentials,
  type CredentialSource,
  envCredentialSource,
  isCompleteCredentials,
  resolveCredentials,
  secretCredentialSource,
} from './secretsCache/credentialSources';
export { SecretCache } from './secretsCache/SecretCache';
export {
  SecretCacheManager,
  type SecretCacheManagerOptions,
} from './secretsCache/SecretCacheManager';
export {
  SecretsRefresher,
  type SecretsRefresherOptions,
} from './secretsCache/SecretsRefresher';
export {
  classifySecretError,
  type SecretFailureKind,
  SecretFetchTimeoutError,
} from './secretsManager/awsError';
export type { SecretsLogger } from './secretsManager/logger';
export {
  type SecretLookup,
  SecretStoreAccessor,
  type SecretStoreAccessorOptions,
  type SecretStoreClient,
} from './secretsManager/SecretStoreAccessor';
export { parseSecretString, type SecretValue } from './secretsManager/secretValue';
export type { XrayMode } from './secretsManager/xray';

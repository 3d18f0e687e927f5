/**
 * Requirements addressed:
 * - Compose accessor, cache, cache manager and refresher into one explicitly
 *   owned object; no bare module-level map.
 * - Offer module-level convenience functions bound to a lazily created
 *   default instance that tests can replace.
 */

import {
  type EnvRef,
  isLambdaEnvironment as detectLambda,
} from './config/executionContext';
import { readSecretsConfig, type SecretsConfig } from './config/secretsConfig';
import type { AwsCredentials } from './secretsCache/credentialSources';
import { SecretCache } from './secretsCache/SecretCache';
import { SecretCacheManager } from './secretsCache/SecretCacheManager';
import { SecretsRefresher } from './secretsCache/SecretsRefresher';
import { assertLogger, type SecretsLogger } from './secretsManager/logger';
import {
  SecretStoreAccessor,
  type SecretStoreClient,
} from './secretsManager/SecretStoreAccessor';
import type { SecretValue } from './secretsManager/secretValue';

export type CreateSecretsOptions = {
  /** Environment surface (defaults to `process.env`). */
  env?: EnvRef;
  /** Overrides applied on top of the env-derived config. */
  config?: Partial<SecretsConfig>;
  logger?: SecretsLogger;
  /** Injection seam for tests. */
  client?: SecretStoreClient;
  /** Clock in epoch ms (refresh policy). */
  now?: () => number;
};

export type Secrets = {
  readonly config: SecretsConfig;
  readonly accessor: SecretStoreAccessor;
  readonly cache: SecretCache;
  readonly manager: SecretCacheManager;
  readonly refresher: SecretsRefresher;
  getSecret: (args: {
    secretId: string;
    useCache?: boolean;
  }) => Promise<SecretValue | undefined>;
  getSecretValue: (args: {
    secretId: string;
    key?: string;
    defaultValue?: unknown;
    useCache?: boolean;
  }) => Promise<unknown>;
  getAwsCredentials: () => Promise<AwsCredentials>;
  clearCache: () => void;
  isLambdaEnvironment: () => boolean;
  refreshSecretsIfNeeded: () => Promise<void>;
};

export const createSecrets = ({
  env = process.env,
  config: overrides = {},
  logger: candidate = console,
  client,
  now,
}: CreateSecretsOptions = {}): Secrets => {
  const logger = assertLogger(candidate, 'createSecrets');
  const config: SecretsConfig = { ...readSecretsConfig(env), ...overrides };

  const accessor = new SecretStoreAccessor({
    client,
    env,
    logger,
    prefix: config.prefix,
    region: config.region,
    timeoutMs: config.fetchTimeoutMs,
    xray: config.xray,
  });
  const cache = new SecretCache();
  const manager = new SecretCacheManager({ accessor, cache, env, logger });
  const refresher = new SecretsRefresher({
    manager,
    env,
    logger,
    refreshIntervalSeconds: config.refreshIntervalSeconds,
    prewarm: config.prewarm,
    now,
  });

  return {
    config,
    accessor,
    cache,
    manager,
    refresher,
    getSecret: (args) => manager.get(args),
    getSecretValue: (args) => manager.getField(args),
    getAwsCredentials: () => manager.getCredentials(),
    clearCache: () => manager.clear(),
    isLambdaEnvironment: () => detectLambda(env),
    refreshSecretsIfNeeded: async () => {
      await refresher.refreshIfNeeded();
    },
  };
};

let defaultSecrets: Secrets | undefined;

/** The process-wide instance, created from `process.env` on first use. */
export const getDefaultSecrets = (): Secrets =>
  (defaultSecrets ??= createSecrets());

/** Replace (or with no argument, reset) the process-wide instance. */
export const setDefaultSecrets = (secrets?: Secrets): void => {
  defaultSecrets = secrets;
};

// The wrappers are async so a config error from the lazy default instance
// surfaces as a rejection rather than a synchronous throw.
export const getSecret: Secrets['getSecret'] = async (args) =>
  getDefaultSecrets().getSecret(args);

export const getSecretValue: Secrets['getSecretValue'] = async (args) =>
  getDefaultSecrets().getSecretValue(args);

export const getAwsCredentials: Secrets['getAwsCredentials'] = async () =>
  getDefaultSecrets().getAwsCredentials();

export const clearCache: Secrets['clearCache'] = () => {
  getDefaultSecrets().clearCache();
};

/**
 * Lambda detection for the installed default instance, or for `process.env`
 * when none has been created or installed yet.
 */
export const isLambdaEnvironment = (): boolean =>
  defaultSecrets
    ? defaultSecrets.isLambdaEnvironment()
    : detectLambda(process.env);

export const refreshSecretsIfNeeded: Secrets['refreshSecretsIfNeeded'] =
  async () => getDefaultSecrets().refreshSecretsIfNeeded();

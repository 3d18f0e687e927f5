/**
 * Requirements addressed:
 * - Serve secrets from a process-wide cache; only successful fetches are
 *   cached, so every miss retries the store.
 * - `getField` resolves missing secrets and missing keys to the caller's
 *   default instead of failing.
 * - AWS credentials come from the `aws-credentials` secret, falling back to
 *   environment variables wholesale.
 */

import type { EnvRef } from '../config/executionContext';
import { assertLogger, type SecretsLogger } from '../secretsManager/logger';
import type { SecretStoreAccessor } from '../secretsManager/SecretStoreAccessor';
import type { SecretValue } from '../secretsManager/secretValue';
import {
  type AwsCredentials,
  type CredentialSource,
  envCredentialSource,
  readEnvCredentials,
  resolveCredentials,
  secretCredentialSource,
} from './credentialSources';
import { SecretCache } from './SecretCache';

export type SecretCacheManagerOptions = {
  accessor: Pick<SecretStoreAccessor, 'fetch'>;
  cache?: SecretCache;
  /** Environment used for credential fallback (defaults to `process.env`). */
  env?: EnvRef;
  logger?: SecretsLogger;
  /**
   * Credential sources polled in order by `getCredentials`. Defaults to the
   * `aws-credentials` secret followed by the environment.
   */
  credentialSources?: CredentialSource[];
};

export class SecretCacheManager {
  readonly cache: SecretCache;
  readonly #accessor: Pick<SecretStoreAccessor, 'fetch'>;
  readonly #env: EnvRef;
  readonly #logger: SecretsLogger;
  readonly #credentialSources: CredentialSource[];

  constructor({
    accessor,
    cache = new SecretCache(),
    env = process.env,
    logger = console,
    credentialSources,
  }: SecretCacheManagerOptions) {
    this.#accessor = accessor;
    this.cache = cache;
    this.#env = env;
    this.#logger = assertLogger(logger, 'SecretCacheManager');
    this.#credentialSources = credentialSources ?? [
      secretCredentialSource((secretId) => this.get({ secretId }), env),
      envCredentialSource(env),
    ];
  }

  /** Cached-or-fetched secret, or `undefined` when unavailable. */
  async get({
    secretId,
    useCache = true,
  }: {
    secretId: string;
    useCache?: boolean;
  }): Promise<SecretValue | undefined> {
    if (!secretId) {
      this.#logger.warn('Secret id is empty; nothing to fetch.');
      return;
    }

    if (useCache) {
      const cached = this.cache.get(secretId);
      if (cached) return cached;
    }

    const value = await this.#accessor.fetch(secretId);
    if (value) this.cache.set(secretId, value);
    return value;
  }

  /**
   * Read one key of a secret (or the whole secret when `key` is omitted).
   *
   * Resolves `defaultValue` when the secret or the key is missing.
   */
  async getField({
    secretId,
    key,
    defaultValue,
    useCache = true,
  }: {
    secretId: string;
    key?: string;
    defaultValue?: unknown;
    useCache?: boolean;
  }): Promise<unknown> {
    const secret = await this.get({ secretId, useCache });
    if (!secret) return defaultValue;
    if (typeof key === 'undefined') return secret;
    return Object.hasOwn(secret, key) ? secret[key] : defaultValue;
  }

  /** Static AWS credentials from the first complete source. */
  async getCredentials(): Promise<AwsCredentials> {
    const { source, credentials } = await resolveCredentials(
      this.#credentialSources,
      () => readEnvCredentials(this.#env),
    );
    this.#logger.debug(`Resolved AWS credentials from ${source}.`);
    return credentials;
  }

  clear(): void {
    this.cache.clear();
    this.#logger.debug('Secrets cache cleared');
  }
}

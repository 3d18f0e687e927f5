/**
 * Requirements addressed:
 * - Invoked once per inbound request; only acts inside Lambda.
 * - Clears the cache when the refresh interval has elapsed since the last
 *   clear, then pre-warms frequently used secrets.
 * - Pre-warm failures are logged, never propagated.
 */

import { tryit } from 'radash';

import { type EnvRef, isLambdaEnvironment } from '../config/executionContext';
import {
  DEFAULT_PREWARM,
  DEFAULT_REFRESH_INTERVAL_SECONDS,
} from '../config/secretsConfig';
import { assertLogger, type SecretsLogger } from '../secretsManager/logger';
import type { SecretCacheManager } from './SecretCacheManager';

export type SecretsRefresherOptions = {
  manager: Pick<SecretCacheManager, 'cache' | 'clear' | 'get'>;
  env?: EnvRef;
  logger?: SecretsLogger;
  refreshIntervalSeconds?: number;
  /** Secret ids re-fetched right after each clear. */
  prewarm?: string[];
  /** Clock in epoch ms. */
  now?: () => number;
};

export class SecretsRefresher {
  readonly #manager: Pick<SecretCacheManager, 'cache' | 'clear' | 'get'>;
  readonly #env: EnvRef;
  readonly #logger: SecretsLogger;
  readonly #intervalMs: number;
  readonly #prewarm: string[];
  readonly #now: () => number;

  constructor({
    manager,
    env = process.env,
    logger = console,
    refreshIntervalSeconds = DEFAULT_REFRESH_INTERVAL_SECONDS,
    prewarm = DEFAULT_PREWARM,
    now = Date.now,
  }: SecretsRefresherOptions) {
    this.#manager = manager;
    this.#env = env;
    this.#logger = assertLogger(logger, 'SecretsRefresher');
    this.#intervalMs = refreshIntervalSeconds * 1000;
    this.#prewarm = prewarm;
    this.#now = now;
  }

  /**
   * Clear and pre-warm the cache if the refresh interval has elapsed.
   *
   * @returns Whether the cache was cleared.
   */
  async refreshIfNeeded(): Promise<boolean> {
    if (!isLambdaEnvironment(this.#env)) return false;

    const now = this.#now();
    if (now - this.#manager.cache.lastRefresh <= this.#intervalMs) return false;

    this.#logger.debug('Refreshing secrets cache');
    this.#manager.clear();
    // Stamp before awaiting so concurrent requests skip the clear.
    this.#manager.cache.markRefreshed(now);

    await Promise.all(
      this.#prewarm.map(async (secretId) => {
        const [err, value] = await tryit(() =>
          this.#manager.get({ secretId }),
        )();
        if (err) {
          this.#logger.warn(
            `Error pre-loading secret ${secretId}: ${err.message}`,
          );
        } else if (!value) {
          this.#logger.debug(`Secret ${secretId} unavailable during pre-load`);
        }
      }),
    );

    return true;
  }
}

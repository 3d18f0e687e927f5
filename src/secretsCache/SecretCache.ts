import type { SecretValue } from '../secretsManager/secretValue';

/**
 * Process-lifetime secret cache.
 *
 * Entries never expire individually; the whole map is cleared at once, and
 * `lastRefresh` records when the refresh policy last did so.
 */
export class SecretCache {
  readonly #entries = new Map<string, SecretValue>();
  #lastRefresh = 0;

  get(secretId: string): SecretValue | undefined {
    return this.#entries.get(secretId);
  }

  set(secretId: string, value: SecretValue): void {
    this.#entries.set(secretId, value);
  }

  has(secretId: string): boolean {
    return this.#entries.has(secretId);
  }

  clear(): void {
    this.#entries.clear();
  }

  get size(): number {
    return this.#entries.size;
  }

  /** Epoch ms of the last scheduled refresh (`0` until the first). */
  get lastRefresh(): number {
    return this.#lastRefresh;
  }

  markRefreshed(at: number): void {
    this.#lastRefresh = at;
  }
}

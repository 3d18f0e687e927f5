/**
 * Requirements addressed:
 * - Fetch a secret by `{prefix}-{environment}-{secretId}`; the environment is
 *   read on every call so two environments never share a store entry.
 * - Outside Lambda and without AWS_ACCESS_KEY_ID, never touch the store.
 * - Bound every store call with a timeout.
 * - No failure escapes `fetch`: each resolves to `undefined` plus exactly one
 *   warn/error log record.
 * - Optional X-Ray capture of the lazily created SDK client.
 */

import {
  GetSecretValueCommand,
  type GetSecretValueCommandOutput,
  SecretsManagerClient,
} from '@aws-sdk/client-secrets-manager';

import {
  type EnvRef,
  DEFAULT_REGION,
  getEnvironment,
  hasStoreCredentials,
  isLambdaEnvironment,
} from '../config/executionContext';
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_PREFIX,
} from '../config/secretsConfig';
import {
  classifySecretError,
  failureLogLevel,
  type SecretFailureKind,
  SecretFetchTimeoutError,
} from './awsError';
import { assertLogger, type SecretsLogger } from './logger';
import { parseSecretString, type SecretValue } from './secretValue';
import { captureAwsSdkV3Client, type XrayMode } from './xray';

/** Minimal client surface used by the accessor (test injection seam). */
export type SecretStoreClient = {
  send: (
    command: GetSecretValueCommand,
    options?: { abortSignal?: AbortSignal },
  ) => Promise<
    Pick<GetSecretValueCommandOutput, 'SecretString' | 'SecretBinary'>
  >;
};

export type SecretStoreAccessorOptions = {
  /** Injection seam for tests. If provided, region/xray are ignored. */
  client?: SecretStoreClient;
  /** Environment surface (defaults to `process.env`). */
  env?: EnvRef;
  /** Logger instance. Defaults to `console`. */
  logger?: SecretsLogger;
  /** Secret name prefix. */
  prefix?: string;
  /** AWS region for the Secrets Manager client. */
  region?: string;
  /** Upper bound for a single store call. */
  timeoutMs?: number;
  /** AWS X-Ray capture mode. */
  xray?: XrayMode;
};

/** Outcome of a single store call. */
export type SecretLookup =
  | { ok: true; secretName: string; value: SecretValue }
  | {
      ok: false;
      secretName: string;
      kind: SecretFailureKind;
      error?: unknown;
    };

const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

const withTimeout = async <T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new SecretFetchTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Reads individual secrets from AWS Secrets Manager.
 *
 * Holds no cache; see `SecretCacheManager` for that.
 */
export class SecretStoreAccessor {
  readonly #env: EnvRef;
  readonly #logger: SecretsLogger;
  readonly #prefix: string;
  readonly #region: string;
  readonly #timeoutMs: number;
  readonly #xray: XrayMode;
  #client?: Promise<SecretStoreClient>;

  constructor({
    client,
    env = process.env,
    logger = console,
    prefix = DEFAULT_PREFIX,
    region = DEFAULT_REGION,
    timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
    xray = 'auto',
  }: SecretStoreAccessorOptions = {}) {
    this.#logger = assertLogger(logger, 'SecretStoreAccessor');
    this.#env = env;
    this.#prefix = prefix;
    this.#region = region;
    this.#timeoutMs = timeoutMs;
    this.#xray = xray;
    if (client) this.#client = Promise.resolve(client);
  }

  /** Full store name for a logical secret id in the current environment. */
  getSecretName(secretId: string): string {
    return `${this.#prefix}-${getEnvironment(this.#env)}-${secretId}`;
  }

  /** Whether the store may be consulted at all in this process. */
  canUseStore(): boolean {
    return isLambdaEnvironment(this.#env) || hasStoreCredentials(this.#env);
  }

  /**
   * Fetch and parse a secret.
   *
   * Resolves `undefined` when the store is skipped, the secret is missing or
   * inaccessible, the payload is binary, or the call fails for any reason.
   */
  async fetch(secretId: string): Promise<SecretValue | undefined> {
    if (!this.canUseStore()) {
      this.#logger.debug(
        `Not in Lambda and no AWS credentials, skipping Secrets Manager for ${secretId}`,
      );
      return;
    }

    const res = await this.lookup(secretId);
    if (res.ok) return res.value;

    this.#logger[failureLogLevel(res.kind)](
      this.#describeFailure(res.secretName, res.kind, res.error),
    );
    return;
  }

  /**
   * Call the store without the runtime gate and classify the outcome.
   *
   * Never rejects.
   */
  async lookup(secretId: string): Promise<SecretLookup> {
    const secretName = this.getSecretName(secretId);

    try {
      const client = await this.#getClient();
      const res = await withTimeout(
        (abortSignal) =>
          client.send(new GetSecretValueCommand({ SecretId: secretName }), {
            abortSignal,
          }),
        this.#timeoutMs,
      );

      if (typeof res.SecretString !== 'string') {
        return { ok: false, secretName, kind: 'unsupported' };
      }

      this.#logger.debug('Fetched secret value.', { secretName });
      return {
        ok: true,
        secretName,
        value: parseSecretString(res.SecretString),
      };
    } catch (error) {
      return { ok: false, secretName, kind: classifySecretError(error), error };
    }
  }

  #describeFailure(
    secretName: string,
    kind: SecretFailureKind,
    error: unknown,
  ): string {
    switch (kind) {
      case 'not-found':
        return `Secret not found: ${secretName}`;
      case 'access-denied':
        return `Access denied to secret: ${secretName}`;
      case 'unsupported':
        return `Binary secret not supported: ${secretName}`;
      case 'timeout':
        return `Timed out getting secret ${secretName}: ${describeError(error)}`;
      case 'store-error':
        return `Error getting secret ${secretName}: ${describeError(error)}`;
      case 'transport-error':
        return `Unexpected error getting secret ${secretName}: ${describeError(error)}`;
    }
  }

  #getClient(): Promise<SecretStoreClient> {
    if (!this.#client) {
      this.#client = this.#createClient().catch((err: unknown) => {
        // Allow the next call to retry client construction.
        this.#client = undefined;
        throw err;
      });
    }
    return this.#client;
  }

  async #createClient(): Promise<SecretStoreClient> {
    const base = new SecretsManagerClient({ region: this.#region });
    const client = await captureAwsSdkV3Client(base, {
      mode: this.#xray,
      logger: this.#logger,
      // Read from the injected env only; never fall back to process.env.
      daemonAddress: this.#env.AWS_XRAY_DAEMON_ADDRESS ?? '',
    });

    return {
      send: (command, options) => client.send(command, options),
    };
  }
}

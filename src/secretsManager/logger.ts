/**
 * Console-like logger contract used across this package.
 *
 * A custom logger must implement these methods; no polyfills are applied.
 */
export type SecretsLogger = Pick<Console, 'debug' | 'error' | 'info' | 'warn'>;

const LOGGER_METHODS = ['debug', 'info', 'warn', 'error'] as const;

export const isSecretsLogger = (v: unknown): v is SecretsLogger =>
  !!v &&
  typeof v === 'object' &&
  LOGGER_METHODS.every((name) => typeof Reflect.get(v, name) === 'function');

/** Validate a caller-supplied logger at construction time. */
export const assertLogger = (
  candidate: unknown,
  owner = 'strands-agent-secrets',
): SecretsLogger => {
  if (!isSecretsLogger(candidate)) {
    throw new Error(
      `${owner} needs a logger with ${LOGGER_METHODS.join(', ')} methods.`,
    );
  }
  return candidate;
};

import { describe, expect, it } from 'vitest';

import { assertLogger, isSecretsLogger } from './logger';

const noop = () => undefined;

describe('logger', () => {
  it('accepts console', () => {
    expect(isSecretsLogger(console)).toBe(true);
    expect(assertLogger(console)).toBe(console);
  });

  it('rejects a logger missing a method', () => {
    const partial = { debug: noop, info: noop, warn: noop };
    expect(isSecretsLogger(partial)).toBe(false);
    expect(() => assertLogger(partial, 'SecretCacheManager')).toThrow(
      'SecretCacheManager needs a logger with debug, info, warn, error methods.',
    );
  });

  it('rejects non-objects with the default owner', () => {
    expect(() => assertLogger(undefined)).toThrow(
      'strands-agent-secrets needs a logger with debug, info, warn, error methods.',
    );
  });
});

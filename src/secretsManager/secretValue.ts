/**
 * Requirements addressed:
 * - Secret payloads are parsed as JSON object maps.
 * - Anything else is wrapped as `{ value: <raw> }`.
 */

/** Parsed secret payload. */
export type SecretValue = Record<string, unknown>;

/** Key used to wrap secrets whose payload is not a JSON object map. */
export const RAW_VALUE_KEY = 'value';

export const isSecretValue = (v: unknown): v is SecretValue =>
  !!v && typeof v === 'object' && !Array.isArray(v);

export const parseSecretString = (secretString: string): SecretValue => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(secretString);
  } catch {
    return { [RAW_VALUE_KEY]: secretString };
  }

  return isSecretValue(parsed) ? parsed : { [RAW_VALUE_KEY]: secretString };
};

/**
 * Requirements addressed:
 * - Run the secrets refresh check once per Lambda invocation, before the
 *   wrapped handler.
 * - Log the incoming event without `headers` or `body`.
 * - Turn a thrown handler error into a 500 JSON response.
 */

import { omit } from 'radash';

import { assertLogger, type SecretsLogger } from '../secretsManager/logger';
import type { Secrets } from '../secrets';

/** HTTP-style Lambda result (API Gateway / Function URL). */
export type HttpResult = {
  statusCode: number;
  headers?: Record<string, string>;
  body?: string;
};

export type HttpHandler<TEvent extends Record<string, unknown>, TContext> = (
  event: TEvent,
  context: TContext,
) => Promise<HttpResult>;

export const errorResponse = (err: unknown): HttpResult => ({
  statusCode: 500,
  headers: { 'Content-Type': 'application/json' },
  body: JSON.stringify({
    error: err instanceof Error ? err.message : String(err),
    message: 'An error occurred processing the request',
  }),
});

export const withSecretsRefresh = <
  TEvent extends Record<string, unknown>,
  TContext,
>(
  handler: HttpHandler<TEvent, TContext>,
  {
    secrets,
    logger: candidate = console,
  }: {
    secrets: Pick<Secrets, 'refreshSecretsIfNeeded'>;
    logger?: SecretsLogger;
  },
): HttpHandler<TEvent, TContext> => {
  const logger = assertLogger(candidate, 'withSecretsRefresh');

  return async (event, context) => {
    await secrets.refreshSecretsIfNeeded();

    const record: Record<string, unknown> = event;
    const safeEvent = omit(record, ['headers', 'body']);
    logger.info(`Received event: ${JSON.stringify(safeEvent)}`);

    try {
      return await handler(event, context);
    } catch (err) {
      logger.error('Error processing request', err);
      return errorResponse(err);
    }
  };
};

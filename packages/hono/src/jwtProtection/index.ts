import {
  formatError,
  type JsonObject,
  type Jwt,
  verifyToken,
} from '@rsajwt/core';
import type { Context, MiddlewareHandler, Next, TypedResponse } from 'hono';
import { endTime, startTime } from 'hono/timing';
import { pino } from 'pino';

import type { JwtHonoConfig } from '../interfaces/jwtHonoConfig.js';
import { BearerAuthorizationSchema } from '../schemas/bearerAuthorization.schema.js';

/**
 * Context variables available when using bearer token middleware.
 */
export interface JwtContextVariables {
  jwt: Jwt<JsonObject>;
  jwtPayload: JsonObject;
}

/**
 * Creates middleware that requires a valid RS256 bearer token.
 * Expects the `timing()` middleware to be installed on the app.
 *
 * @param config - Key set, claim checks and logger
 * @returns Hono middleware handler that verifies the `Authorization` header
 */
export function secureBearerToken(
  config: JwtHonoConfig,
): MiddlewareHandler<{ Variables: JwtContextVariables }> {
  const logger = config.logger ?? pino({ enabled: false });

  return async (
    c: Context<{ Variables: JwtContextVariables }>,
    next: Next,
  ): Promise<
    | (Response & TypedResponse<'Bearer token required' | 'Invalid token', 401, 'text'>)
    | undefined
  > => {
    const result = BearerAuthorizationSchema.safeParse(c.req.header('Authorization'));
    if (!result.success) {
      return c.text('Bearer token required', 401);
    }

    startTime(c, 'verifyBearerToken');
    let jwt: Jwt<JsonObject>;
    try {
      jwt = verifyToken(result.data, config.keySet, { claims: config.claims });
    } catch (error) {
      logger.warn({ error: formatError(error), path: c.req.path }, 'bearer token rejected');
      return c.text('Invalid token', 401);
    } finally {
      endTime(c, 'verifyBearerToken');
    }

    c.set('jwt', jwt);
    c.set('jwtPayload', jwt.payload);
    await next();
  };
}

import type { JWKS } from '@rsajwt/core';
import type { Handler } from 'hono';

import type { JwtHonoConfig } from '../../interfaces/jwtHonoConfig.js';

/**
 * Creates a route handler publishing the public part of every key in the set.
 * @param config - The key set and logger
 * @returns Route handler for a JWKS endpoint
 */
export function jwksRouteHandler(config: JwtHonoConfig): Handler {
  return (c) => {
    try {
      const jwks: JWKS = {
        keys: config.keySet.keys().map((key) => key.toPublic().toJSON()),
      };
      return c.json(jwks);
    } catch (error) {
      config.logger?.error({ error, path: c.req.path }, 'JWKS endpoint error');
      return c.json({ error: 'Internal server error' }, 500);
    }
  };
}

import type { ClaimsValidationOptions, KeySet } from '@rsajwt/core';
import type { BaseLogger } from 'pino';

/**
 * Configuration shared by the Hono middleware and route handlers.
 */
export interface JwtHonoConfig {
  /** Keys bearer tokens are verified against; also published by the JWKS route */
  keySet: KeySet;

  /** Registered claim checks applied after the signature check */
  claims?: ClaimsValidationOptions;

  /** Optional pino logger */
  logger?: BaseLogger;
}

import type { JwkJson } from '../schemas/jwk.schema.js';

/**
 * JSON Web Key Set (JWKS) structure as defined by RFC 7517 §5.
 * Used to publish public keys for JWT signature verification.
 */
export interface JWKS {
  /** Keys of the set, each a complete JWK JSON object */
  keys: JwkJson[];
}

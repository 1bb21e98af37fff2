import type { KeySet } from './interfaces/keySet.js';
import type { PayloadCodec } from './interfaces/signingKey.js';
import { Jwk } from './jwk.js';
import { decodeTokenHeader, Jwt } from './jwt.js';
import type { ClaimsValidationOptions } from './schemas/jwtClaims.schema.js';
import type { JsonObject } from './schemas/jwtHeader.schema.js';
import { validateClaims } from './services/claims.service.js';

/**
 * Options for {@link verifyToken}.
 */
export interface VerifyOptions {
  /** Validate registered claims after the signature check; skipped when absent */
  claims?: ClaimsValidationOptions;
}

/**
 * Signs a payload and returns the compact token.
 *
 * @param payload - Claims to sign; serialized with JSON.stringify
 * @param jwk - Private RSA key; its `kid` is copied into the header
 */
export function signToken<T>(payload: T, jwk: Jwk): string {
  return Jwt.create(payload).sign(jwk);
}

/**
 * Decodes a token WITHOUT checking its signature.
 */
export function parseToken(token: string): Jwt<JsonObject>;
export function parseToken<T>(token: string, codec: PayloadCodec<T>): Jwt<T>;
export function parseToken<T>(
  token: string,
  codec?: PayloadCodec<T>,
): Jwt<T> | Jwt<JsonObject> {
  const parser = Jwt.from(token);
  return codec ? parser.parse(codec) : parser.parse();
}

/**
 * Decodes a token, verifies its signature and, when requested, its claims.
 *
 * @param token - Compact JWT
 * @param key - Verification key, or a key set the header's `kid` selects from
 * @param options - Payload codec and claim validation options
 * @throws {JwtError} any codec, key selection or claim validation error
 *
 * @example
 * ```typescript
 * const jwt = verifyToken(token, keySet, {
 *   codec: AccessTokenSchema,
 *   claims: { issuer: 'https://issuer.example.com', audience: 'api' },
 * });
 * ```
 */
export function verifyToken<T>(
  token: string,
  key: Jwk | KeySet,
  options: VerifyOptions & { codec: PayloadCodec<T> },
): Jwt<T>;
export function verifyToken(
  token: string,
  key: Jwk | KeySet,
  options?: VerifyOptions,
): Jwt<JsonObject>;
export function verifyToken<T>(
  token: string,
  key: Jwk | KeySet,
  options: VerifyOptions & { codec?: PayloadCodec<T> } = {},
): Jwt<T> | Jwt<JsonObject> {
  const jwk = key instanceof Jwk ? key : key.select(decodeTokenHeader(token).kid);
  const parser = Jwt.from(token).withVerificationKey(jwk);
  const jwt = options.codec ? parser.parse(options.codec) : parser.parse();
  if (options.claims) {
    validateClaims(jwt.payload, options.claims);
  }
  return jwt;
}

/**
 * Kinds of failure surfaced by the token codec and its collaborators.
 *
 * `Expired`, `Early` and `Payload` are raised by claim validation, `Key` and
 * `Connection` by key sets. `Signature` is reserved: malformed signature segments
 * are reported as `Invalid`.
 */
export const JwtErrorKind = Object.freeze({
  /** Token or key is malformed. */
  Invalid: 'Invalid',
  /** Token has expired. */
  Expired: 'Expired',
  /** Not Before (nbf) is set and it's too early to use the token. */
  Early: 'Early',
  /** Signature did not verify against the key. */
  Certificate: 'Certificate',
  /** No usable key. */
  Key: 'Key',
  /** Could not load a key set. */
  Connection: 'Connection',
  /** Problem with JWT header. */
  Header: 'Header',
  /** Problem with JWT payload. */
  Payload: 'Payload',
  /** Problem with JWT signature. */
  Signature: 'Signature',
  /** Unexpected failure from an underlying primitive. */
  Internal: 'Internal',
} as const);

export type JwtErrorKind = (typeof JwtErrorKind)[keyof typeof JwtErrorKind];

/**
 * Error thrown by every operation of the library.
 * Carries a kind and a short developer-facing message; never wraps a cause.
 *
 * @example
 * ```typescript
 * try {
 *   Jwt.from(token).withVerificationKey(jwk).parse();
 * } catch (error) {
 *   if (isJwtError(error, 'Certificate')) {
 *     // signature mismatch
 *   }
 * }
 * ```
 */
export class JwtError extends Error {
  constructor(
    readonly kind: JwtErrorKind,
    readonly msg: string,
  ) {
    super(`${kind}: ${msg}`);
    this.name = 'JwtError';
  }

  equals(other: JwtError): boolean {
    return this.kind === other.kind && this.msg === other.msg;
  }
}

/**
 * Narrows an unknown thrown value to a {@link JwtError}, optionally of a given kind.
 */
export function isJwtError(error: unknown, kind?: JwtErrorKind): error is JwtError {
  return error instanceof JwtError && (kind === undefined || error.kind === kind);
}

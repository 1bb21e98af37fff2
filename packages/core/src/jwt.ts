import { JwtError } from './errors/jwtError.js';
import type { PayloadCodec } from './interfaces/signingKey.js';
import type { Jwk } from './jwk.js';
import {
  type JsonObject,
  JsonObjectSchema,
  type JwtHeader,
  JwtHeaderSchema,
} from './schemas/jwtHeader.schema.js';
import { base64UrlDecode, base64UrlEncode } from './utils/base64Url.js';

/** Header of a token that has not been signed yet */
const EMPTY_HEADER: JwtHeader = Object.freeze({ alg: '' });

/**
 * JSON Web Token as described in RFC 7519, in compact serialization.
 *
 * @example
 * ```typescript
 * const token = Jwt.create({ sub: 'user-1' }).sign(privateJwk);
 *
 * const jwt = Jwt.from(token).withVerificationKey(publicJwk).parse(ClaimsSchema);
 * jwt.payload.sub; // typed by ClaimsSchema
 * ```
 */
export class Jwt<T> {
  constructor(
    readonly header: JwtHeader,
    readonly payload: T,
    /** Signature segment, still base64url-encoded */
    readonly signature: string,
  ) {}

  /**
   * Wraps a payload for signing. The header and signature stay empty until
   * {@link Jwt.sign} builds them.
   */
  static create<T>(payload: T): Jwt<T> {
    return new Jwt(EMPTY_HEADER, payload, '');
  }

  /** Starts the parse pipeline for a compact token. */
  static from(token: string): Parser {
    return new Parser(token);
  }

  /**
   * Signs the payload with `jwk` and returns the compact token.
   * The header is `{ alg, typ: 'JWT', kid }`, taken from the key; the output is
   * deterministic for identical payload and key.
   *
   * @throws {JwtError} `Invalid` when the payload cannot be serialized or the key
   * cannot sign, `Internal` when signing fails
   */
  sign(jwk: Jwk): string {
    const header: JwtHeader = {
      alg: jwk.alg(),
      typ: 'JWT',
      ...(jwk.kid !== undefined && { kid: jwk.kid }),
    };
    const signingInput = `${encodeSegment(header)}.${encodeSegment(this.payload)}`;
    const signature = jwk.sign(Buffer.from(signingInput, 'utf8'));
    return `${signingInput}.${base64UrlEncode(signature)}`;
  }
}

/**
 * Builder that decodes a compact token, optionally verifying it against a key.
 * `parse` is terminal: a parser decodes exactly one token.
 */
export class Parser {
  private verificationKey?: Jwk;
  private used = false;

  constructor(private readonly token: string) {}

  /** Sets the key the signature is checked against. The last call wins. */
  withVerificationKey(jwk: Jwk): this {
    this.verificationKey = jwk;
    return this;
  }

  /**
   * Decodes the token. Without a codec the payload is returned as a JSON object.
   *
   * @throws {JwtError} `Invalid` for malformed segments, `Header` for `alg: none` or an
   * algorithm that disagrees with the verification key, `Certificate` when the
   * signature does not verify
   */
  parse(): Jwt<JsonObject>;
  parse<T>(codec: PayloadCodec<T>): Jwt<T>;
  parse<T>(codec?: PayloadCodec<T>): Jwt<T> | Jwt<JsonObject> {
    if (this.used) {
      throw new JwtError('Internal', 'Parser already used');
    }
    this.used = true;
    return codec ? this.decode(codec) : this.decode(JsonObjectSchema);
  }

  private decode<P>(codec: PayloadCodec<P>): Jwt<P> {
    const [headerSegment, payloadSegment, signatureSegment] = splitToken(this.token);
    const header = decodeHeaderSegment(headerSegment);

    let payload: P;
    try {
      payload = codec.parse(decodeJsonSegment(payloadSegment));
    } catch {
      throw new JwtError('Invalid', 'Failed to decode payload');
    }

    const key = this.verificationKey;
    if (key) {
      if (header.alg !== key.alg()) {
        throw new JwtError('Header', 'Token algorithm does not match key');
      }
      let signature: Buffer;
      try {
        signature = base64UrlDecode(signatureSegment);
      } catch {
        throw new JwtError('Invalid', 'Failed to decode signature');
      }
      // the original segment bytes are signed, never a re-serialization
      key.verify(Buffer.from(`${headerSegment}.${payloadSegment}`, 'utf8'), signature);
    }

    return new Jwt(header, payload, signatureSegment);
  }
}

/**
 * Decodes the header of a compact token without checking its signature.
 * Used to pick a verification key by `kid`.
 */
export function decodeTokenHeader(token: string): JwtHeader {
  const [headerSegment] = splitToken(token);
  return decodeHeaderSegment(headerSegment);
}

function splitToken(token: string): [string, string, string] {
  const segments = token.split('.');
  if (segments.length !== 3) {
    throw new JwtError('Invalid', 'JWT does not have 3 segments');
  }
  const [header, payload, signature] = segments;
  return [header, payload, signature];
}

function decodeHeaderSegment(segment: string): JwtHeader {
  let header: JwtHeader;
  try {
    header = JwtHeaderSchema.parse(decodeJsonSegment(segment));
  } catch {
    throw new JwtError('Invalid', 'Failed to decode header');
  }
  if (header.alg.toLowerCase() === 'none') {
    throw new JwtError('Header', 'Unsecured JWT is not accepted');
  }
  return header;
}

function decodeJsonSegment(segment: string): unknown {
  return JSON.parse(base64UrlDecode(segment).toString('utf8'));
}

function encodeSegment(value: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch {
    throw new JwtError('Invalid', 'Failed to encode segment');
  }
  if (json === undefined) {
    throw new JwtError('Invalid', 'Failed to encode segment');
  }
  return base64UrlEncode(json);
}

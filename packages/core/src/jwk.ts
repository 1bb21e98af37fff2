import type { z } from 'zod';

import { JwtError } from './errors/jwtError.js';
import {
  type JwkJson,
  type JwkMetadata,
  JwkMetadataSchema,
  JwksDocumentSchema,
  type RsaPrivateMembers,
  RsaPrivateMembersSchema,
  type RsaPublicMembers,
  RsaPublicMembersSchema,
} from './schemas/jwk.schema.js';
import { createKeyMaterial, type KeyBody, type KeyMaterial } from './services/rsa.service.js';

/**
 * JSON Web Key as described in RFC 7517, restricted to RSA keys.
 *
 * Instances are immutable and safe to share; the key is imported into the crypto
 * backend once, at construction.
 *
 * @example
 * ```typescript
 * const jwk = Jwk.parse(privateKeyJson);
 * const signature = jwk.sign(Buffer.from('message'));
 * jwk.toPublic().verify(Buffer.from('message'), signature);
 * ```
 */
export class Jwk {
  private readonly material: KeyMaterial;

  private constructor(
    private readonly metadata: JwkMetadata,
    private readonly body: KeyBody,
  ) {
    this.material = createKeyMaterial(body);
  }

  /**
   * Parses a single JWK JSON object.
   *
   * @param json - JWK serialized as JSON
   * @throws {JwtError} `Invalid` when the JSON or one of its members is malformed,
   * `Internal` when the key cannot be imported
   */
  static parse(json: string): Jwk {
    let value: unknown;
    try {
      value = JSON.parse(json);
    } catch {
      throw new JwtError('Invalid', 'Failed to decode key');
    }
    return Jwk.from(value);
  }

  /**
   * Builds a key from an already-decoded JWK object.
   * A non-empty `d` member selects the private variant.
   */
  static from(value: unknown): Jwk {
    if (value instanceof Jwk) {
      return value;
    }
    const metadata = JwkMetadataSchema.safeParse(value);
    if (!metadata.success) {
      throw new JwtError('Invalid', 'Failed to decode key');
    }
    const body: z.ZodSafeParseResult<RsaPublicMembers | RsaPrivateMembers> = hasPrivateExponent(value)
      ? RsaPrivateMembersSchema.safeParse(value)
      : RsaPublicMembersSchema.safeParse(value);
    if (!body.success) {
      throw new JwtError('Invalid', 'Failed to decode key');
    }
    return 'd' in body.data
      ? new Jwk(metadata.data, { type: 'rsa-private', ...body.data })
      : new Jwk(metadata.data, { type: 'rsa-public', ...body.data });
  }

  get kty(): string {
    return this.metadata.kty;
  }

  get kid(): string | undefined {
    return this.metadata.kid;
  }

  /** True when the key holds private material and can sign. */
  get isPrivate(): boolean {
    return this.body.type === 'rsa-private';
  }

  /**
   * Algorithm of the key: the `alg` member, or the one implied by the key type.
   */
  alg(): string {
    return this.metadata.alg ?? this.material.defaultAlg;
  }

  /**
   * Verifies an RS256 signature of `message`. Private keys verify with their public part.
   *
   * @throws {JwtError} `Certificate` on any mismatch, including a malformed signature
   */
  verify(message: Uint8Array, signature: Uint8Array): void {
    this.material.verifier.verify(message, signature);
  }

  /**
   * Signs `message` with RSASSA-PKCS1-v1_5 over SHA-256.
   *
   * @throws {JwtError} `Invalid` for public keys, `Internal` when signing fails
   */
  sign(message: Uint8Array): Buffer {
    if (!this.material.signer) {
      throw new JwtError('Invalid', "Key doesn't support signing");
    }
    return this.material.signer.sign(message);
  }

  /** Public projection of this key; metadata members are kept. */
  toPublic(): Jwk {
    if (this.body.type === 'rsa-public') {
      return this;
    }
    return new Jwk(this.metadata, { type: 'rsa-public', n: this.body.n, e: this.body.e });
  }

  /** RFC 7517 JSON form, with absent members omitted. */
  toJSON(): JwkJson {
    const { type, ...members } = this.body;
    return { ...this.metadata, ...members };
  }
}

function hasPrivateExponent(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || !('d' in value)) {
    return false;
  }
  return value.d !== undefined && value.d !== '';
}

/**
 * Parses a JSON Web Key Set (`{ "keys": [...] }`).
 *
 * @param document - JWKS as a JSON string or an already-decoded value
 * @throws {JwtError} `Invalid` when the envelope or any key is malformed
 */
export function parseJwks(document: unknown): Jwk[] {
  let value = document;
  if (typeof document === 'string') {
    try {
      value = JSON.parse(document);
    } catch {
      throw new JwtError('Invalid', 'Failed to decode key set');
    }
  }
  const result = JwksDocumentSchema.safeParse(value);
  if (!result.success) {
    throw new JwtError('Invalid', 'Failed to decode key set');
  }
  return result.data.keys.map((key) => {
    try {
      return Jwk.from(key);
    } catch (error) {
      if (error instanceof JwtError && error.kind === 'Invalid') {
        throw new JwtError('Invalid', 'Failed to decode key set');
      }
      throw error;
    }
  });
}

import {
  createPrivateKey,
  createPublicKey,
  type JsonWebKey,
  type KeyObject,
  sign,
  verify,
} from 'node:crypto';

import { JwtError } from '../errors/jwtError.js';
import type { Signer, Verifier } from '../interfaces/signingKey.js';
import type { RsaPrivateMembers, RsaPublicMembers } from '../schemas/jwk.schema.js';
import {
  bigIntFromBase64Url,
  bigIntToBase64Url,
  mod,
  modInverse,
} from '../utils/bigInt.js';

/** RSA public key body */
export interface RsaPublicBody extends RsaPublicMembers {
  type: 'rsa-public';
}

/** RSA private key body */
export interface RsaPrivateBody extends RsaPrivateMembers {
  type: 'rsa-private';
}

/**
 * Key body of a JWK, discriminated by `type`.
 * Other key families are added as new arms together with a branch in
 * {@link createKeyMaterial}.
 */
export type KeyBody = RsaPublicBody | RsaPrivateBody;

/**
 * Imported, ready-to-use key operations for one key body.
 */
export interface KeyMaterial {
  /** Algorithm implied by the key body when the JWK has no `alg` */
  defaultAlg: string;
  verifier: Verifier;
  signer?: Signer;
}

const RS256_DIGEST = 'sha256';

/**
 * Builds the verifier and (for private keys) the signer of a key body.
 *
 * @throws {JwtError} `Internal` when the crypto backend rejects the key
 */
export function createKeyMaterial(body: KeyBody): KeyMaterial {
  switch (body.type) {
    case 'rsa-public':
      return {
        defaultAlg: 'RS256',
        verifier: rs256Verifier(importKey(() => createPublicKey(publicJwk(body)))),
      };
    case 'rsa-private': {
      const privateKey = importKey(() => createPrivateKey(privateJwk(body)));
      return {
        defaultAlg: 'RS256',
        verifier: rs256Verifier(importKey(() => createPublicKey(privateKey))),
        signer: rs256Signer(privateKey),
      };
    }
  }
}

function rs256Verifier(publicKey: KeyObject): Verifier {
  return {
    verify(message, signature) {
      let valid: boolean;
      try {
        valid = verify(RS256_DIGEST, message, publicKey, signature);
      } catch {
        valid = false;
      }
      if (!valid) {
        throw new JwtError('Certificate', 'Signature does not match certificate');
      }
    },
  };
}

function rs256Signer(privateKey: KeyObject): Signer {
  return {
    sign(message) {
      try {
        return sign(RS256_DIGEST, message, privateKey);
      } catch {
        throw new JwtError('Internal', 'Sign message');
      }
    },
  };
}

function importKey(load: () => KeyObject): KeyObject {
  try {
    return load();
  } catch {
    throw new JwtError('Internal', 'Failed to import key');
  }
}

function publicJwk(body: RsaPublicMembers): { key: JsonWebKey; format: 'jwk' } {
  return { key: { kty: 'RSA', n: body.n, e: body.e }, format: 'jwk' };
}

function privateJwk(body: RsaPrivateMembers): { key: JsonWebKey; format: 'jwk' } {
  const { dp, dq, qi } = completeCrtMembers(body);
  return {
    key: { kty: 'RSA', n: body.n, e: body.e, d: body.d, p: body.p, q: body.q, dp, dq, qi },
    format: 'jwk',
  };
}

/**
 * Fills in the CRT members a private JWK may omit:
 * `dp = d mod (p-1)`, `dq = d mod (q-1)`, `qi = q^-1 mod p`.
 * Members that are present are used as received.
 */
export function completeCrtMembers(
  body: RsaPrivateMembers,
): Required<Pick<RsaPrivateMembers, 'dp' | 'dq' | 'qi'>> {
  if (body.dp !== undefined && body.dq !== undefined && body.qi !== undefined) {
    return { dp: body.dp, dq: body.dq, qi: body.qi };
  }
  const d = bigIntFromBase64Url(body.d);
  const p = bigIntFromBase64Url(body.p);
  const q = bigIntFromBase64Url(body.q);
  // p or q of 0 or 1 leaves nothing to invert or reduce by
  if (p < 2n || q < 2n) {
    throw new JwtError('Internal', 'Failed to import key');
  }
  let qi: string;
  try {
    qi = body.qi ?? bigIntToBase64Url(modInverse(q, p));
  } catch {
    throw new JwtError('Internal', 'Failed to import key');
  }
  return {
    dp: body.dp ?? bigIntToBase64Url(mod(d, p - 1n)),
    dq: body.dq ?? bigIntToBase64Url(mod(d, q - 1n)),
    qi,
  };
}

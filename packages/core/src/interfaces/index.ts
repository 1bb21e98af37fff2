export type { JWKS } from './jwks.js';
export type { KeySet } from './keySet.js';
export type { PayloadCodec, Signer, Verifier } from './signingKey.js';

export { isJwtError, JwtError, JwtErrorKind } from './errors/jwtError.js';
export type { JWKS, KeySet, PayloadCodec, Signer, Verifier } from './interfaces/index.js';
export { Jwk, parseJwks } from './jwk.js';
export { decodeTokenHeader, Jwt, Parser } from './jwt.js';
export * from './schemas/index.js';
export { validateClaims } from './services/claims.service.js';
export { parseToken, signToken, type VerifyOptions, verifyToken } from './tokens.js';
export { base64UrlDecode, base64UrlEncode, isBase64Url } from './utils/base64Url.js';
export { bigIntFromBase64Url, bigIntToBase64Url } from './utils/bigInt.js';
export { formatError } from './utils/errorFormatting.js';
export { selectKey } from './utils/keySelection.js';

import { z } from 'zod';

import { isBase64Url } from '../utils/base64Url.js';

const Base64UrlIntegerSchema = z
  .string()
  .min(1)
  .refine(isBase64Url, 'must be unpadded base64url');

/**
 * Members common to every JSON Web Key (RFC 7517 §4).
 * Unknown members are stripped; known optional members are kept as received.
 */
export const JwkMetadataSchema = z.object({
  kty: z.literal('RSA').describe('Key type; only RSA keys are supported'),
  kid: z.string().optional(),
  alg: z.literal('RS256').optional().describe('Only RS256 is implemented for RSA keys'),
  use: z.string().optional(),
  key_ops: z.array(z.string()).optional(),
  x5u: z.string().optional(),
  x5c: z.union([z.string(), z.array(z.string())]).optional(),
  x5t: z.string().optional(),
  'x5t#S256': z.string().optional(),
});

/** RSA public key members (RFC 7518 §6.3.1) */
export const RsaPublicMembersSchema = z.object({
  n: Base64UrlIntegerSchema.describe('Modulus'),
  e: Base64UrlIntegerSchema.describe('Public exponent'),
});

/** RSA private key members (RFC 7518 §6.3.2); CRT members are optional */
export const RsaPrivateMembersSchema = RsaPublicMembersSchema.extend({
  d: Base64UrlIntegerSchema.describe('Private exponent'),
  p: Base64UrlIntegerSchema.describe('First prime factor'),
  q: Base64UrlIntegerSchema.describe('Second prime factor'),
  dp: Base64UrlIntegerSchema.optional(),
  dq: Base64UrlIntegerSchema.optional(),
  qi: Base64UrlIntegerSchema.optional(),
});

export const RsaPublicJwkSchema = JwkMetadataSchema.extend(RsaPublicMembersSchema.shape);
export const RsaPrivateJwkSchema = JwkMetadataSchema.extend(
  RsaPrivateMembersSchema.shape,
);

export type JwkMetadata = z.infer<typeof JwkMetadataSchema>;
export type RsaPublicMembers = z.infer<typeof RsaPublicMembersSchema>;
export type RsaPrivateMembers = z.infer<typeof RsaPrivateMembersSchema>;
export type RsaPublicJwk = z.infer<typeof RsaPublicJwkSchema>;
export type RsaPrivateJwk = z.infer<typeof RsaPrivateJwkSchema>;
export type JwkJson = RsaPublicJwk | RsaPrivateJwk;

/** JSON Web Key Set envelope (RFC 7517 §5); members are validated one by one */
export const JwksDocumentSchema = z.object({
  keys: z.array(z.unknown()),
});

export {
  ClaimsValidationOptionsSchema,
  RegisteredClaimsSchema,
  type ClaimsValidationOptions,
  type RegisteredClaims,
} from './jwtClaims.schema.js';
export {
  JsonObjectSchema,
  JwtHeaderSchema,
  type JsonObject,
  type JwtHeader,
} from './jwtHeader.schema.js';
export {
  JwkMetadataSchema,
  JwksDocumentSchema,
  RsaPrivateJwkSchema,
  RsaPrivateMembersSchema,
  RsaPublicJwkSchema,
  RsaPublicMembersSchema,
  type JwkJson,
  type JwkMetadata,
  type RsaPrivateJwk,
  type RsaPrivateMembers,
  type RsaPublicJwk,
  type RsaPublicMembers,
} from './jwk.schema.js';

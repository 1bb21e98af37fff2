import { z } from 'zod';

/**
 * Registered claim names (RFC 7519 §4.1). Other claims pass through untouched.
 */
export const RegisteredClaimsSchema = z.looseObject({
  iss: z.string().optional(),
  sub: z.string().optional(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  exp: z.number().optional(),
  nbf: z.number().optional(),
  iat: z.number().optional(),
  jti: z.string().optional(),
});

export type RegisteredClaims = z.infer<typeof RegisteredClaimsSchema>;

const StringOrStringsSchema = z.union([z.string(), z.array(z.string()).min(1)]);

export const ClaimsValidationOptionsSchema = z.object({
  issuer: StringOrStringsSchema.optional().describe('Accepted iss value(s)'),
  audience: StringOrStringsSchema.optional().describe('Accepted aud value(s)'),
  leewaySeconds: z.number().nonnegative().optional(),
  clock: z
    .custom<() => number>((value) => typeof value === 'function')
    .optional()
    .describe('Current time in epoch seconds'),
  requiredClaims: z.array(z.string().min(1)).optional(),
});

export type ClaimsValidationOptions = z.infer<typeof ClaimsValidationOptionsSchema>;

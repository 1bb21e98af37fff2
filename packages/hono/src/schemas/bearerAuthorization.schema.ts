import { z } from 'zod';

/**
 * Zod schema for an `Authorization: Bearer <token>` header value.
 * Parses to the bare token.
 */
export const BearerAuthorizationSchema = z
  .string()
  .regex(/^Bearer +[A-Za-z0-9\-_.]+$/i)
  .transform((value) => value.replace(/^Bearer +/i, ''));

/**
 * Type representing a bearer token taken from a request.
 */
export type BearerAuthorization = z.infer<typeof BearerAuthorizationSchema>;

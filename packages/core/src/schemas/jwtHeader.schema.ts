import { z } from 'zod';

/**
 * JOSE header of a signed JWT. Unknown members are ignored on decode.
 */
export const JwtHeaderSchema = z.object({
  alg: z.string().min(1),
  typ: z.string().optional(),
  kid: z.string().optional(),
  enc: z.string().optional(),
  cty: z.string().optional(),
});

export type JwtHeader = z.infer<typeof JwtHeaderSchema>;

/** Default payload shape: any JSON object */
export const JsonObjectSchema = z.record(z.string(), z.unknown());

export type JsonObject = z.infer<typeof JsonObjectSchema>;

import { JwtError } from '../errors/jwtError.js';
import {
  type ClaimsValidationOptions,
  ClaimsValidationOptionsSchema,
  type RegisteredClaims,
  RegisteredClaimsSchema,
} from '../schemas/jwtClaims.schema.js';

const epochSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * Validates the registered claims of a decoded payload. Runs after signature
 * verification; the codec itself never looks at claims.
 *
 * @param payload - Decoded JWT payload
 * @param options - Expected issuer/audience, clock leeway and required claims
 * @returns The payload typed with its registered claims
 * @throws {JwtError} `Expired` past `exp`, `Early` before `nbf`, `Payload` for a
 * missing claim, a claim of the wrong type, or an unexpected issuer or audience
 *
 * @example
 * ```typescript
 * validateClaims(jwt.payload, {
 *   issuer: 'https://issuer.example.com',
 *   audience: 'api',
 *   leewaySeconds: 30,
 * });
 * ```
 */
export function validateClaims(
  payload: unknown,
  options: ClaimsValidationOptions = {},
): RegisteredClaims {
  const parsedOptions = ClaimsValidationOptionsSchema.safeParse(options);
  if (!parsedOptions.success) {
    throw new JwtError('Invalid', 'Invalid claims validation options');
  }
  const { issuer, audience, requiredClaims = [] } = parsedOptions.data;
  const leeway = parsedOptions.data.leewaySeconds ?? 0;
  const clock = parsedOptions.data.clock ?? epochSeconds;

  const result = RegisteredClaimsSchema.safeParse(payload);
  if (!result.success) {
    throw new JwtError('Payload', 'Invalid claim type');
  }
  const claims = result.data;

  for (const name of requiredClaims) {
    if (claims[name] === undefined) {
      throw new JwtError('Payload', 'Missing required claim');
    }
  }

  const now = clock();
  if (claims.exp !== undefined && now - leeway >= claims.exp) {
    throw new JwtError('Expired', 'Token has expired');
  }
  if (claims.nbf !== undefined && now + leeway < claims.nbf) {
    throw new JwtError('Early', 'Token is not yet valid');
  }

  if (
    issuer !== undefined &&
    (claims.iss === undefined || !toArray(issuer).includes(claims.iss))
  ) {
    throw new JwtError('Payload', 'Invalid issuer');
  }
  if (audience !== undefined) {
    const expected = toArray(audience);
    const actual = claims.aud === undefined ? [] : toArray(claims.aud);
    if (!actual.some((aud) => expected.includes(aud))) {
      throw new JwtError('Payload', 'Invalid audience');
    }
  }

  return claims;
}

function toArray(value: string | string[]): string[] {
  return Array.isArray(value) ? value : [value];
}

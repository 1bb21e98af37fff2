import { JwtError } from '../errors/jwtError.js';
import type { Jwk } from '../jwk.js';

/**
 * Picks the key a token names by `kid`. A token without `kid` is accepted only
 * when there is exactly one key to choose from.
 *
 * @throws {JwtError} `Key` when no key matches
 */
export function selectKey(keys: readonly Jwk[], kid?: string): Jwk {
  if (kid === undefined) {
    if (keys.length === 1) {
      return keys[0];
    }
    throw new JwtError('Key', 'No key matches kid');
  }
  const match = keys.find((key) => key.kid === kid);
  if (!match) {
    throw new JwtError('Key', 'No key matches kid');
  }
  return match;
}

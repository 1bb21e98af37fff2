import type { Jwk } from '../jwk.js';

/**
 * A named collection of JWKs, selected by key id.
 * Implement this interface to back key selection with any source (memory, a remote
 * JWKS endpoint, a secrets manager, etc.).
 */
export interface KeySet {
  /**
   * Returns the key whose `kid` matches. Without a `kid`, returns the only key of a
   * single-key set.
   *
   * @throws {JwtError} `Key` when no key matches
   */
  select(kid?: string): Jwk;

  /**
   * Reloads the set. Readers never observe a partially updated set.
   *
   * @throws {JwtError} `Connection` when the source cannot be loaded
   */
  refresh(): Promise<void>;

  /** Snapshot of the keys currently held. */
  keys(): readonly Jwk[];
}

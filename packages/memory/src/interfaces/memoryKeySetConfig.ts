import type { Jwk, JwkJson } from '@rsajwt/core';
import type { BaseLogger } from 'pino';

/**
 * Configuration for {@link MemoryKeySet}.
 */
export interface MemoryKeySetConfig {
  /** Where the set comes from; only used to label log lines */
  url?: string;

  /** Keys held before the first refresh */
  keys?: Array<Jwk | JwkJson>;

  /**
   * Produces a JWKS document (`{ keys: [...] }`, as an object or a JSON string).
   * Without a loader, `refresh()` keeps the current keys.
   */
  loader?: () => Promise<unknown>;

  /** Optional pino logger */
  logger?: BaseLogger;
}

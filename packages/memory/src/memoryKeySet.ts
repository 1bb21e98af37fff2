import {
  formatError,
  Jwk,
  JwtError,
  type KeySet,
  parseJwks,
  selectKey,
} from '@rsajwt/core';
import { type BaseLogger, pino } from 'pino';

import type { MemoryKeySetConfig } from './interfaces/memoryKeySetConfig.js';

/**
 * In-memory key set.
 *
 * Holds the keys it was built with and, when given a loader, replaces them on
 * `refresh()`. The replacement is a single assignment of a frozen array, so callers of
 * `select()` see either the old set or the new one, never a mix.
 *
 * How the loader obtains the document (HTTP, file, secrets manager) and when
 * `refresh()` is called are up to the caller.
 *
 * @example
 * ```typescript
 * const keySet = new MemoryKeySet({
 *   url: 'https://issuer.example.com/.well-known/jwks.json',
 *   loader: async () => (await fetch(jwksUrl)).json(),
 * });
 * await keySet.refresh();
 * const jwt = verifyToken(token, keySet);
 * ```
 */
export class MemoryKeySet implements KeySet {
  private current: readonly Jwk[];
  private pending?: Promise<void>;
  private logger: BaseLogger;

  constructor(private config: MemoryKeySetConfig = {}) {
    this.logger = config.logger ?? pino({ enabled: false });
    this.current = Object.freeze((config.keys ?? []).map((key) => Jwk.from(key)));
  }

  select(kid?: string): Jwk {
    return selectKey(this.current, kid);
  }

  keys(): readonly Jwk[] {
    return this.current;
  }

  /**
   * Reloads the set through the loader. Concurrent calls share one load.
   *
   * @throws {JwtError} `Connection` when the loader fails, `Invalid` when the document
   * is not a valid JWKS; the current keys are kept in both cases
   */
  refresh(): Promise<void> {
    const { loader } = this.config;
    if (!loader) {
      return Promise.resolve();
    }
    this.pending ??= this.load(loader).finally(() => {
      this.pending = undefined;
    });
    return this.pending;
  }

  private async load(loader: () => Promise<unknown>): Promise<void> {
    const { url } = this.config;

    let document: unknown;
    try {
      document = await loader();
    } catch (error) {
      this.logger.warn({ url, error: formatError(error) }, 'key set load failed');
      throw new JwtError('Connection', 'Failed to load key set');
    }

    let keys: Jwk[];
    try {
      keys = parseJwks(document);
    } catch (error) {
      this.logger.warn({ url, error: formatError(error) }, 'key set rejected');
      throw error;
    }

    this.current = Object.freeze(keys);
    this.logger.info({ url, keyCount: keys.length }, 'key set refreshed');
  }
}

import { JwtError } from '../errors/jwtError.js';

/**
 * Formats an unknown thrown value into a single log-friendly line.
 * A {@link JwtError} renders as `<kind>: <msg>`.
 *
 * @example
 * ```typescript
 * try {
 *   await keySet.refresh();
 * } catch (error) {
 *   logger.warn({ error: formatError(error) }, 'key set refresh failed');
 * }
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof JwtError) {
    return `${error.kind}: ${error.msg}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

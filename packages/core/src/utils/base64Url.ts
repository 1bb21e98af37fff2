import { JwtError } from '../errors/jwtError.js';

const BASE64URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

/**
 * Encodes bytes (or a UTF-8 string) as unpadded Base64URL (RFC 4648 §5).
 */
export function base64UrlEncode(input: Uint8Array | string): string {
  const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    'base64url',
  );
}

/**
 * Decodes unpadded Base64URL.
 *
 * Only the canonical encoding is accepted: unused low bits of the last character
 * must be zero, so every byte string has exactly one accepted spelling.
 *
 * @throws {JwtError} `Invalid` when the input has a character outside the URL-safe
 * alphabet (padding included) or is not the canonical encoding of its bytes
 */
export function base64UrlDecode(input: string): Buffer {
  const decoded = decodeCanonical(input);
  if (!decoded) {
    throw new JwtError('Invalid', 'Invalid base64url input');
  }
  return decoded;
}

/**
 * Returns true when the string is canonical unpadded Base64URL.
 */
export function isBase64Url(input: string): boolean {
  return decodeCanonical(input) !== undefined;
}

function decodeCanonical(input: string): Buffer | undefined {
  if (!BASE64URL_ALPHABET.test(input)) {
    return undefined;
  }
  const decoded = Buffer.from(input, 'base64url');
  return decoded.toString('base64url') === input ? decoded : undefined;
}

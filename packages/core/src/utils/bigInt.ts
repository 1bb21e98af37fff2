import { base64UrlDecode, base64UrlEncode } from './base64Url.js';

/** Reads an unsigned big-endian integer. Leading zero bytes are accepted. */
export function bigIntFromBase64Url(input: string): bigint {
  const hex = base64UrlDecode(input).toString('hex');
  return hex.length === 0 ? 0n : BigInt(`0x${hex}`);
}

/** Writes an unsigned integer as minimal-length big-endian Base64URL. */
export function bigIntToBase64Url(value: bigint): string {
  if (value < 0n) {
    throw new RangeError('negative integers have no JWK encoding');
  }
  let hex = value.toString(16);
  if (hex.length % 2 === 1) {
    hex = `0${hex}`;
  }
  return base64UrlEncode(Buffer.from(hex, 'hex'));
}

/** Non-negative remainder of `a mod m`. */
export function mod(a: bigint, m: bigint): bigint {
  const r = a % m;
  return r < 0n ? r + m : r;
}

/**
 * Multiplicative inverse of `a` modulo `m` (extended Euclid).
 *
 * @throws {RangeError} when `a` and `m` are not coprime
 */
export function modInverse(a: bigint, m: bigint): bigint {
  let [oldR, r] = [mod(a, m), m];
  let [oldS, s] = [1n, 0n];
  while (r !== 0n) {
    const quotient = oldR / r;
    [oldR, r] = [r, oldR - quotient * r];
    [oldS, s] = [s, oldS - quotient * s];
  }
  if (oldR !== 1n) {
    throw new RangeError('value is not invertible');
  }
  return mod(oldS, m);
}

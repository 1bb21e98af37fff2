/**
 * Checks a signature over a message.
 * Implementations throw a `Certificate` JwtError on any mismatch and never return false.
 */
export interface Verifier {
  verify(message: Uint8Array, signature: Uint8Array): void;
}

/**
 * Produces a signature over a message.
 */
export interface Signer {
  sign(message: Uint8Array): Buffer;
}

/**
 * Caller-provided payload decoder. Any zod schema satisfies it.
 */
export interface PayloadCodec<T> {
  parse(value: unknown): T;
}

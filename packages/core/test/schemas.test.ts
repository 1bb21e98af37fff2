import { describe, expect, it } from 'vitest';

import {
  ClaimsValidationOptionsSchema,
  JwkMetadataSchema,
  JwtHeaderSchema,
  RsaPrivateJwkSchema,
  RsaPublicJwkSchema,
} from '../src/schemas/index.js';

import { privateKeyObject, publicKeyObject } from './helpers/fixtures.js';

describe('Schema Validation Tests', () => {
  describe('JwtHeaderSchema', () => {
    it('validates a minimal header', () => {
      expect(JwtHeaderSchema.parse({ alg: 'RS256' })).toEqual({ alg: 'RS256' });
    });

    it('drops unknown members', () => {
      expect(
        JwtHeaderSchema.parse({ alg: 'RS256', typ: 'JWT', kid: 'k1', x5u: 'https://x' }),
      ).toEqual({ alg: 'RS256', typ: 'JWT', kid: 'k1' });
    });

    it('rejects an empty alg', () => {
      expect(() => JwtHeaderSchema.parse({ alg: '' })).toThrow();
    });

    it('rejects non-string members', () => {
      expect(() => JwtHeaderSchema.parse({ alg: 'RS256', kid: 7 })).toThrow();
    });
  });

  describe('JwkMetadataSchema', () => {
    it('accepts x5c as a string or an array', () => {
      expect(() => JwkMetadataSchema.parse({ kty: 'RSA', x5c: 'MIIB' })).not.toThrow();
      expect(() => JwkMetadataSchema.parse({ kty: 'RSA', x5c: ['MIIB'] })).not.toThrow();
    });

    it('accepts RS256 as the only alg', () => {
      expect(JwkMetadataSchema.parse({ kty: 'RSA', alg: 'RS256' })).toEqual({
        kty: 'RSA',
        alg: 'RS256',
      });
      expect(() => JwkMetadataSchema.parse({ kty: 'RSA', alg: 'RS384' })).toThrow();
    });

    it('rejects other key types', () => {
      expect(() => JwkMetadataSchema.parse({ kty: 'oct' })).toThrow();
    });
  });

  describe('RSA key schemas', () => {
    it('validates the fixture keys', () => {
      expect(() => RsaPrivateJwkSchema.parse(privateKeyObject())).not.toThrow();
      expect(() => RsaPublicJwkSchema.parse(publicKeyObject())).not.toThrow();
    });

    it('requires the private members of a private key', () => {
      expect(() => RsaPrivateJwkSchema.parse(publicKeyObject())).toThrow();
    });

    it('rejects empty integers', () => {
      expect(() => RsaPublicJwkSchema.parse({ kty: 'RSA', n: '', e: 'AQAB' })).toThrow();
    });
  });

  describe('ClaimsValidationOptionsSchema', () => {
    it('accepts a clock function', () => {
      expect(() => ClaimsValidationOptionsSchema.parse({ clock: () => 0 })).not.toThrow();
    });

    it('rejects a clock that is not a function', () => {
      expect(() => ClaimsValidationOptionsSchema.parse({ clock: 0 })).toThrow();
    });

    it('rejects an empty audience list', () => {
      expect(() => ClaimsValidationOptionsSchema.parse({ audience: [] })).toThrow();
    });
  });
});

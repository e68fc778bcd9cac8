/**
 * Security policy tests
 */

import { describe, it, expect } from 'vitest';
import { SecuritySettingsSchema, defaultSecuritySettings } from '@openassoc/core';
import {
  SessionType,
  SignatureAlgorithm,
  V11,
  V20,
  parseSessionType,
  parseSignatureAlgorithm,
} from '@openassoc/protocol';
import {
  bestAcceptableFallback,
  evaluatePolicy,
  explainRejection,
  isAcceptable,
  preferredSessionTypes,
} from '../src/index.js';

const { HmacSha1, HmacSha256 } = SignatureAlgorithm;
const { None, DhSha1, DhSha256 } = SessionType;

describe('isAcceptable', () => {
  const defaults = defaultSecuritySettings();

  it('should accept matching Diffie-Hellman sessions over any transport', () => {
    expect(isAcceptable(defaults, HmacSha256, DhSha256, false)).toBe(true);
    expect(isAcceptable(defaults, HmacSha1, DhSha1, false)).toBe(true);
    expect(isAcceptable(defaults, HmacSha1, DhSha1, true)).toBe(true);
  });

  it('should allow unencrypted sessions only over a secure transport', () => {
    expect(isAcceptable(defaults, HmacSha256, None, true)).toBe(true);
    expect(evaluatePolicy(defaults, HmacSha256, None, false)).toEqual({
      acceptable: false,
      reason: 'unencrypted_over_insecure_transport',
    });
  });

  it('should enforce hash bit length bounds', () => {
    const max160 = SecuritySettingsSchema.parse({ maximum_hash_bit_length: 160 });
    const min256 = SecuritySettingsSchema.parse({ minimum_hash_bit_length: 256 });

    expect(evaluatePolicy(max160, HmacSha256, DhSha256, false)).toEqual({
      acceptable: false,
      reason: 'hash_too_long',
    });
    expect(evaluatePolicy(min256, HmacSha1, DhSha1, false)).toEqual({
      acceptable: false,
      reason: 'hash_too_short',
    });
  });

  it('should refuse unencrypted sessions when association security is required', () => {
    const settings = SecuritySettingsSchema.parse({ require_association_security: true });

    expect(isAcceptable(settings, HmacSha256, None, true)).toBe(false);
    expect(isAcceptable(settings, HmacSha256, DhSha256, true)).toBe(true);
  });

  it('should refuse Diffie-Hellman over a secure transport when disabled', () => {
    const settings = SecuritySettingsSchema.parse({ allow_dh_over_secure_transport: false });

    expect(isAcceptable(settings, HmacSha256, DhSha256, true)).toBe(false);
    expect(isAcceptable(settings, HmacSha256, DhSha256, false)).toBe(true);
  });

  it('should refuse sessions whose digest differs from the signature algorithm', () => {
    expect(isAcceptable(defaults, HmacSha256, DhSha1, false)).toBe(false);
    expect(isAcceptable(defaults, HmacSha1, DhSha256, false)).toBe(false);
  });

  it('should refuse unrecognized tokens', () => {
    expect(isAcceptable(defaults, parseSignatureAlgorithm(V20, 'HMAC-UNKNOWN'), DhSha1, false)).toBe(
      false
    );
    expect(isAcceptable(defaults, HmacSha1, parseSessionType(V20, 'DH-UNKNOWN'), false)).toBe(false);
    expect(isAcceptable(defaults, parseSignatureAlgorithm(V11, 'HMAC-SHA256'), None, true)).toBe(
      false
    );
  });
});

describe('explainRejection', () => {
  const defaults = defaultSecuritySettings();

  it('should describe why a pair was refused', () => {
    expect(explainRejection(defaults, HmacSha1, None, false)).toBe(
      'unencrypted sessions require a secure transport'
    );
    expect(explainRejection(defaults, HmacSha256, DhSha1, false)).toBe(
      'session digest size does not match the signature algorithm'
    );
  });

  it('should return null for an acceptable pair', () => {
    expect(explainRejection(defaults, HmacSha1, DhSha1, false)).toBeNull();
  });
});

describe('preferredSessionTypes', () => {
  it('should put no-encryption first over a secure transport', () => {
    expect(preferredSessionTypes(V20, HmacSha1, true)).toEqual([None, DhSha1, DhSha256]);
  });

  it('should put the matching Diffie-Hellman type first over an insecure transport', () => {
    expect(preferredSessionTypes(V20, HmacSha256, false)).toEqual([DhSha256, DhSha1]);
    expect(preferredSessionTypes(V11, HmacSha1, false)).toEqual([DhSha1]);
  });
});

describe('bestAcceptableFallback', () => {
  const defaults = defaultSecuritySettings();

  it('should prefer the strongest algorithm with a matching Diffie-Hellman session', () => {
    expect(bestAcceptableFallback(defaults, V20, false)).toEqual({
      signatureAlgorithm: HmacSha256,
      sessionType: DhSha256,
    });
    expect(bestAcceptableFallback(defaults, V11, false)).toEqual({
      signatureAlgorithm: HmacSha1,
      sessionType: DhSha1,
    });
  });

  it('should prefer no-encryption over a secure transport', () => {
    expect(bestAcceptableFallback(defaults, V20, true)).toEqual({
      signatureAlgorithm: HmacSha256,
      sessionType: None,
    });
  });

  it('should respect the maximum hash bit length', () => {
    const settings = SecuritySettingsSchema.parse({ maximum_hash_bit_length: 160 });

    expect(bestAcceptableFallback(settings, V20, false)).toEqual({
      signatureAlgorithm: HmacSha1,
      sessionType: DhSha1,
    });
  });

  it('should fall back to Diffie-Hellman when unencrypted sessions are refused', () => {
    const settings = SecuritySettingsSchema.parse({ require_association_security: true });

    expect(bestAcceptableFallback(settings, V20, true)).toEqual({
      signatureAlgorithm: HmacSha256,
      sessionType: DhSha256,
    });
  });

  it('should return null when the version offers nothing acceptable', () => {
    const min256 = SecuritySettingsSchema.parse({ minimum_hash_bit_length: 256 });
    const locked = SecuritySettingsSchema.parse({
      require_association_security: true,
      allow_dh_over_secure_transport: false,
    });

    expect(bestAcceptableFallback(min256, V11, false)).toBeNull();
    expect(bestAcceptableFallback(locked, V20, true)).toBeNull();
  });
});

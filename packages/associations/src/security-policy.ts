/**
 * Security policy
 *
 * Decides whether an association/session type pair is acceptable under the
 * local settings and the transport, and what to offer instead when it is not.
 * Each side applies its own settings; nothing here is negotiated.
 */

import type { SecuritySettings } from '@openassoc/core';
import {
  isDiffieHellman,
  isUnrecognized,
  supportedSessionTypes,
  supportedSignatureAlgorithms,
  type ParsedSessionType,
  type ParsedSignatureAlgorithm,
  type ProtocolVersion,
  type SessionType,
  type SignatureAlgorithm,
} from '@openassoc/protocol';

export type RejectionReason =
  | 'unrecognized_signature_algorithm'
  | 'unrecognized_session_type'
  | 'hash_too_short'
  | 'hash_too_long'
  | 'unencrypted_over_insecure_transport'
  | 'association_security_required'
  | 'diffie_hellman_over_secure_transport'
  | 'digest_size_mismatch';

export type PolicyDecision = { acceptable: true } | { acceptable: false; reason: RejectionReason };

export interface AssociationPair {
  signatureAlgorithm: SignatureAlgorithm;
  sessionType: SessionType;
}

export function evaluatePolicy(
  settings: SecuritySettings,
  signatureAlgorithm: ParsedSignatureAlgorithm,
  sessionType: ParsedSessionType,
  transportIsSecure: boolean
): PolicyDecision {
  if (isUnrecognized(signatureAlgorithm)) {
    return { acceptable: false, reason: 'unrecognized_signature_algorithm' };
  }
  if (isUnrecognized(sessionType)) {
    return { acceptable: false, reason: 'unrecognized_session_type' };
  }
  if (signatureAlgorithm.digestBits < settings.minimumHashBitLength) {
    return { acceptable: false, reason: 'hash_too_short' };
  }
  if (signatureAlgorithm.digestBits > settings.maximumHashBitLength) {
    return { acceptable: false, reason: 'hash_too_long' };
  }

  if (!isDiffieHellman(sessionType)) {
    if (!transportIsSecure) {
      return { acceptable: false, reason: 'unencrypted_over_insecure_transport' };
    }
    if (settings.requireAssociationSecurity) {
      return { acceptable: false, reason: 'association_security_required' };
    }
    return { acceptable: true };
  }

  if (transportIsSecure && !settings.allowDiffieHellmanOverSecureTransport) {
    return { acceptable: false, reason: 'diffie_hellman_over_secure_transport' };
  }
  if (sessionType.digestBits !== signatureAlgorithm.digestBits) {
    return { acceptable: false, reason: 'digest_size_mismatch' };
  }
  return { acceptable: true };
}

export function isAcceptable(
  settings: SecuritySettings,
  signatureAlgorithm: ParsedSignatureAlgorithm,
  sessionType: ParsedSessionType,
  transportIsSecure: boolean
): boolean {
  return evaluatePolicy(settings, signatureAlgorithm, sessionType, transportIsSecure).acceptable;
}

const REJECTION_MESSAGES: Record<RejectionReason, string> = {
  unrecognized_signature_algorithm: 'association type is not recognized',
  unrecognized_session_type: 'session type is not recognized',
  hash_too_short: 'signature algorithm is weaker than the minimum hash bit length',
  hash_too_long: 'signature algorithm exceeds the maximum hash bit length',
  unencrypted_over_insecure_transport: 'unencrypted sessions require a secure transport',
  association_security_required: 'unencrypted sessions are disabled',
  diffie_hellman_over_secure_transport: 'Diffie-Hellman sessions are disabled over a secure transport',
  digest_size_mismatch: 'session digest size does not match the signature algorithm',
};

/**
 * Human-readable reason for a rejection, or null when the pair is acceptable
 */
export function explainRejection(
  settings: SecuritySettings,
  signatureAlgorithm: ParsedSignatureAlgorithm,
  sessionType: ParsedSessionType,
  transportIsSecure: boolean
): string | null {
  const decision = evaluatePolicy(settings, signatureAlgorithm, sessionType, transportIsSecure);
  return decision.acceptable ? null : REJECTION_MESSAGES[decision.reason];
}

/**
 * Session types to try with an algorithm, most preferred first: no-encryption
 * over a secure transport, then the DH type matching the algorithm's digest,
 * then the remaining DH types strongest first.
 */
export function preferredSessionTypes(
  version: ProtocolVersion,
  signatureAlgorithm: SignatureAlgorithm,
  transportIsSecure: boolean
): SessionType[] {
  const available = supportedSessionTypes(version);
  const diffieHellman = available.filter(isDiffieHellman);
  const matching = diffieHellman.filter(s => s.digestBits === signatureAlgorithm.digestBits);
  const others = diffieHellman
    .filter(s => s.digestBits !== signatureAlgorithm.digestBits)
    .sort((a, b) => b.digestBits - a.digestBits);

  const ordered: SessionType[] = [];
  if (transportIsSecure) {
    ordered.push(...available.filter(s => !isDiffieHellman(s)));
  }
  ordered.push(...matching, ...others);
  return ordered;
}

/**
 * Strongest pair the settings accept for this version and transport
 */
export function bestAcceptableFallback(
  settings: SecuritySettings,
  version: ProtocolVersion,
  transportIsSecure: boolean
): AssociationPair | null {
  for (const signatureAlgorithm of supportedSignatureAlgorithms(version)) {
    for (const sessionType of preferredSessionTypes(version, signatureAlgorithm, transportIsSecure)) {
      if (isAcceptable(settings, signatureAlgorithm, sessionType, transportIsSecure)) {
        return { signatureAlgorithm, sessionType };
      }
    }
  }
  return null;
}

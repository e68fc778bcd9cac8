/**
 * Association vocabulary
 *
 * Logical signature algorithms and session types, and the per-version mapping
 * between them and their wire tokens. Parsing never throws: a token the
 * version does not define comes back as an UnrecognizedToken so the caller
 * can decide how quietly to refuse it.
 */

import type { ProtocolVersion } from './version.js';

export type HashAlgorithm = 'sha1' | 'sha256';

export const SignatureAlgorithm = {
  HmacSha1: {
    kind: 'signature_algorithm',
    name: 'HmacSha1',
    digestBits: 160,
    hashAlgorithm: 'sha1',
  },
  HmacSha256: {
    kind: 'signature_algorithm',
    name: 'HmacSha256',
    digestBits: 256,
    hashAlgorithm: 'sha256',
  },
} as const;

export type SignatureAlgorithm = (typeof SignatureAlgorithm)[keyof typeof SignatureAlgorithm];
export type SignatureAlgorithmName = SignatureAlgorithm['name'];

export const SessionType = {
  /** MAC key sent in the clear; only legal over a secure transport */
  None: {
    kind: 'session_type',
    name: 'None',
    encrypted: false,
  },
  DhSha1: {
    kind: 'session_type',
    name: 'DhSha1',
    encrypted: true,
    digestBits: 160,
    hashAlgorithm: 'sha1',
  },
  DhSha256: {
    kind: 'session_type',
    name: 'DhSha256',
    encrypted: true,
    digestBits: 256,
    hashAlgorithm: 'sha256',
  },
} as const;

export type SessionType = (typeof SessionType)[keyof typeof SessionType];
export type SessionTypeName = SessionType['name'];
export type DiffieHellmanSessionType = Extract<SessionType, { encrypted: true }>;

/**
 * A wire token the protocol version does not define
 */
export interface UnrecognizedToken {
  readonly kind: 'unrecognized';
  readonly token: string;
}

export type ParsedSignatureAlgorithm = SignatureAlgorithm | UnrecognizedToken;
export type ParsedSessionType = SessionType | UnrecognizedToken;

/**
 * Token tables owned by a protocol version
 */
export interface Vocabulary {
  readonly signatureAlgorithms: ReadonlyMap<SignatureAlgorithmName, string>;
  readonly sessionTypes: ReadonlyMap<SessionTypeName, string>;
}

export function unrecognized(token: string): UnrecognizedToken {
  return Object.freeze({ kind: 'unrecognized', token });
}

export function isUnrecognized(
  value: ParsedSignatureAlgorithm | ParsedSessionType
): value is UnrecognizedToken {
  return value.kind === 'unrecognized';
}

export function isDiffieHellman(sessionType: SessionType): sessionType is DiffieHellmanSessionType {
  return sessionType.encrypted;
}

/** Strongest first */
const ALL_SIGNATURE_ALGORITHMS: readonly SignatureAlgorithm[] = [
  SignatureAlgorithm.HmacSha256,
  SignatureAlgorithm.HmacSha1,
];

const ALL_SESSION_TYPES: readonly SessionType[] = [
  SessionType.None,
  SessionType.DhSha256,
  SessionType.DhSha1,
];

export function signatureAlgorithmToken(
  version: ProtocolVersion,
  algorithm: SignatureAlgorithm
): string | undefined {
  return version.vocabulary.signatureAlgorithms.get(algorithm.name);
}

export function sessionTypeToken(
  version: ProtocolVersion,
  sessionType: SessionType
): string | undefined {
  return version.vocabulary.sessionTypes.get(sessionType.name);
}

export function parseSignatureAlgorithm(
  version: ProtocolVersion,
  token: string | undefined
): ParsedSignatureAlgorithm {
  const match = ALL_SIGNATURE_ALGORITHMS.find(
    algorithm => token !== undefined && signatureAlgorithmToken(version, algorithm) === token
  );
  return match ?? unrecognized(token ?? '');
}

/**
 * Parse a session type token. Versions whose no-encryption token is the empty
 * string also treat an absent token as no-encryption.
 */
export function parseSessionType(
  version: ProtocolVersion,
  token: string | undefined
): ParsedSessionType {
  const effective = token ?? (sessionTypeToken(version, SessionType.None) === '' ? '' : undefined);
  const match = ALL_SESSION_TYPES.find(
    sessionType => effective !== undefined && sessionTypeToken(version, sessionType) === effective
  );
  return match ?? unrecognized(token ?? '');
}

/**
 * Signature algorithms the version exposes, strongest first
 */
export function supportedSignatureAlgorithms(version: ProtocolVersion): SignatureAlgorithm[] {
  return ALL_SIGNATURE_ALGORITHMS.filter(
    algorithm => signatureAlgorithmToken(version, algorithm) !== undefined
  );
}

/**
 * Session types the version exposes: no-encryption first, then DH strongest first
 */
export function supportedSessionTypes(version: ProtocolVersion): SessionType[] {
  return ALL_SESSION_TYPES.filter(sessionType => sessionTypeToken(version, sessionType) !== undefined);
}

/**
 * Protocol versions
 *
 * Each registered version is a singleton owning its vocabulary. Versions order
 * totally on (major, minor).
 */

import {
  SessionType,
  SignatureAlgorithm,
  type SessionTypeName,
  type SignatureAlgorithmName,
  type Vocabulary,
} from './vocabulary.js';

export const OPENID2_NAMESPACE = 'http://specs.openid.net/auth/2.0';

export class ProtocolVersion {
  constructor(
    public readonly major: number,
    public readonly minor: number,
    public readonly vocabulary: Vocabulary,
    /** Namespace URI carried in `ns`; undefined for versions that predate it */
    public readonly namespace?: string
  ) {
    Object.freeze(this);
  }

  equals(other: ProtocolVersion): boolean {
    return compareVersions(this, other) === 0;
  }

  /**
   * True when messages of both versions are indistinguishable on the wire
   * (1.0 and 1.1 both omit the namespace).
   */
  sharesWireFormatWith(other: ProtocolVersion): boolean {
    return this.namespace === other.namespace;
  }

  toString(): string {
    return `${this.major}.${this.minor}`;
  }
}

export function compareVersions(a: ProtocolVersion, b: ProtocolVersion): number {
  if (a.major !== b.major) {
    return a.major < b.major ? -1 : 1;
  }
  if (a.minor !== b.minor) {
    return a.minor < b.minor ? -1 : 1;
  }
  return 0;
}

function vocabulary(
  signatureAlgorithms: [SignatureAlgorithmName, string][],
  sessionTypes: [SessionTypeName, string][]
): Vocabulary {
  return Object.freeze({
    signatureAlgorithms: new Map(signatureAlgorithms),
    sessionTypes: new Map(sessionTypes),
  });
}

const VOCABULARY_V1 = vocabulary(
  [[SignatureAlgorithm.HmacSha1.name, 'HMAC-SHA1']],
  [
    [SessionType.None.name, ''],
    [SessionType.DhSha1.name, 'DH-SHA1'],
  ]
);

const VOCABULARY_V2 = vocabulary(
  [
    [SignatureAlgorithm.HmacSha1.name, 'HMAC-SHA1'],
    [SignatureAlgorithm.HmacSha256.name, 'HMAC-SHA256'],
  ],
  [
    [SessionType.None.name, 'no-encryption'],
    [SessionType.DhSha1.name, 'DH-SHA1'],
    [SessionType.DhSha256.name, 'DH-SHA256'],
  ]
);

export const V10 = new ProtocolVersion(1, 0, VOCABULARY_V1);
export const V11 = new ProtocolVersion(1, 1, VOCABULARY_V1);
export const V20 = new ProtocolVersion(2, 0, VOCABULARY_V2, OPENID2_NAMESPACE);

/** Oldest first */
export const ALL_VERSIONS: readonly ProtocolVersion[] = [V10, V11, V20];

export function lookupVersion(text: string): ProtocolVersion | undefined {
  return ALL_VERSIONS.find(version => version.toString() === text);
}

/**
 * Version a message claims through its namespace field. Messages without a
 * namespace are taken as the newest version that predates namespaces.
 */
export function versionForNamespace(namespace: string | undefined): ProtocolVersion | undefined {
  if (namespace === undefined) {
    return V11;
  }
  return ALL_VERSIONS.find(version => version.namespace === namespace);
}

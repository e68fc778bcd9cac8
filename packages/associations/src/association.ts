/**
 * Association entity
 *
 * The shared secret agreed by a relying party and a provider. Each side holds
 * its own Association instance with its own copy of the secret.
 */

import { randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { MalformedHandshakeError, OpenAssocError } from '@openassoc/core';
import {
  SignatureAlgorithm,
  signatureAlgorithmToken,
  type ProtocolVersion,
  type SignatureAlgorithmName,
} from '@openassoc/protocol';

export interface AssociationInit {
  handle: string;
  secretKey: Buffer;
  signatureAlgorithm: SignatureAlgorithm;
  issued: Date;
  expiresAt: Date;
}

/**
 * Persisted form of an association (secret base64-encoded)
 */
export interface SerializedAssociation {
  handle: string;
  signature_algorithm: SignatureAlgorithmName;
  secret: string;
  issued: string;
  expires_at: string;
}

const HANDLE_PATTERN = /^[\x21-\x7e]{1,255}$/;

const SerializedAssociationSchema = z.object({
  handle: z.string().regex(HANDLE_PATTERN),
  signature_algorithm: z.enum(['HmacSha1', 'HmacSha256']),
  secret: z.string().min(1),
  issued: z.string().datetime(),
  expires_at: z.string().datetime(),
});

export class Association {
  readonly handle: string;
  readonly secretKey: Buffer;
  readonly signatureAlgorithm: SignatureAlgorithm;
  readonly issued: Date;
  readonly expiresAt: Date;

  constructor(init: AssociationInit) {
    if (!HANDLE_PATTERN.test(init.handle)) {
      throw new MalformedHandshakeError('Association handle must be 1-255 printable ASCII characters');
    }
    const expectedLength = init.signatureAlgorithm.digestBits / 8;
    if (init.secretKey.length !== expectedLength) {
      throw new MalformedHandshakeError(
        `Secret must be ${expectedLength} bytes for ${init.signatureAlgorithm.name}, got ${init.secretKey.length}`,
        { handle: init.handle }
      );
    }
    if (!Number.isFinite(init.issued.getTime()) || !Number.isFinite(init.expiresAt.getTime())) {
      throw new MalformedHandshakeError('Association issue and expiry must be valid dates', {
        handle: init.handle,
      });
    }
    if (init.expiresAt.getTime() <= init.issued.getTime()) {
      throw new MalformedHandshakeError('Association must expire after it is issued', {
        handle: init.handle,
      });
    }

    this.handle = init.handle;
    this.secretKey = Buffer.from(init.secretKey);
    this.signatureAlgorithm = init.signatureAlgorithm;
    this.issued = new Date(init.issued.getTime());
    this.expiresAt = new Date(init.expiresAt.getTime());
  }

  isExpired(now: Date = new Date()): boolean {
    return now.getTime() >= this.expiresAt.getTime();
  }

  secondsTillExpiration(now: Date = new Date()): number {
    return Math.max(0, Math.floor((this.expiresAt.getTime() - now.getTime()) / 1000));
  }

  /**
   * Wire token of this association's type, or undefined if the version lacks it
   */
  associationType(version: ProtocolVersion): string | undefined {
    return signatureAlgorithmToken(version, this.signatureAlgorithm);
  }

  serialize(): SerializedAssociation {
    return {
      handle: this.handle,
      signature_algorithm: this.signatureAlgorithm.name,
      secret: this.secretKey.toString('base64'),
      issued: this.issued.toISOString(),
      expires_at: this.expiresAt.toISOString(),
    };
  }

  static deserialize(record: unknown): Association {
    const result = SerializedAssociationSchema.safeParse(record);
    if (!result.success) {
      throw new OpenAssocError('Invalid association record', 'invalid_association_record', {
        issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    const data = result.data;
    return new Association({
      handle: data.handle,
      secretKey: Buffer.from(data.secret, 'base64'),
      signatureAlgorithm: SignatureAlgorithm[data.signature_algorithm],
      issued: new Date(data.issued),
      expiresAt: new Date(data.expires_at),
    });
  }
}

export interface CreateAssociationOptions {
  signatureAlgorithm: SignatureAlgorithm;
  /** Generated when omitted */
  secret?: Buffer;
  lifetimeSeconds: number;
  now?: Date;
}

/**
 * Create an association with a fresh handle
 */
export function createAssociation(options: CreateAssociationOptions): Association {
  const issued = options.now ?? new Date();
  const secret = options.secret ?? generateSecret(options.signatureAlgorithm);
  return new Association({
    handle: generateHandle(options.signatureAlgorithm, issued),
    secretKey: secret,
    signatureAlgorithm: options.signatureAlgorithm,
    issued,
    expiresAt: new Date(issued.getTime() + options.lifetimeSeconds * 1000),
  });
}

/**
 * Random MAC key sized for the algorithm
 */
export function generateSecret(signatureAlgorithm: SignatureAlgorithm): Buffer {
  return randomBytes(signatureAlgorithm.digestBits / 8);
}

/**
 * Handle format: {algorithm}{issued seconds, hex}{uuid v4}
 */
export function generateHandle(signatureAlgorithm: SignatureAlgorithm, issued: Date): string {
  const issuedHex = Math.floor(issued.getTime() / 1000).toString(16);
  return `{${signatureAlgorithm.name}}{${issuedHex}}{${uuidv4()}}`;
}

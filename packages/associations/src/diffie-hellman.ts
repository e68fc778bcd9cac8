/**
 * Diffie-Hellman exchange for associate sessions
 *
 * Only the public values and the XOR-masked MAC key cross the wire:
 *
 *   kek          = H(btwoc(g^(xy) mod p))      H = SHA-1 or SHA-256 per session type
 *   enc_mac_key  = mac_key XOR kek
 *
 * Integers travel as btwoc: big-endian two's complement, shortest form, with a
 * leading zero byte when the high bit would otherwise be set.
 */

import { createDiffieHellman, createHash, type DiffieHellman } from 'crypto';
import { MalformedHandshakeError } from '@openassoc/core';
import {
  isDiffieHellman,
  type DiffieHellmanSessionType,
  type SessionType,
} from '@openassoc/protocol';

export interface DiffieHellmanGroup {
  modulus: Buffer;
  generator: Buffer;
}

/** Protocol default 1024-bit modulus */
export const DEFAULT_DH_MODULUS = Buffer.from(
  'DCF93A0B883972EC0E19989AC5A2CE310E1D37717E8D9571BB7623731866E61EF75A2E27898B057F9891C2E27A639C3F29B60814581CD3B2CA3986D2683705577D45C2E7E52DC81C7A171876E5CEA74B1448BFDFAF18828EFD2519F14E45E3826634AF1949E5B535CC829A483B8A76223E5D490A257F05BDFF16F2FB22C583AB',
  'hex'
);

export const DEFAULT_DH_GENERATOR = Buffer.from([2]);

export const DEFAULT_DH_GROUP: DiffieHellmanGroup = Object.freeze({
  modulus: bigIntToBtwoc(btwocToBigInt(DEFAULT_DH_MODULUS)),
  generator: DEFAULT_DH_GENERATOR,
});

/**
 * One party's ephemeral key pair for a single handshake attempt
 */
export class DiffieHellmanExchange {
  private keyPair: DiffieHellman | null;
  private readonly modulusValue: bigint;

  private constructor(
    readonly sessionType: DiffieHellmanSessionType,
    readonly group: DiffieHellmanGroup,
    keyPair: DiffieHellman
  ) {
    this.keyPair = keyPair;
    this.modulusValue = btwocToBigInt(group.modulus);
  }

  /**
   * Generate a key pair over the given group (default: protocol group)
   *
   * @throws MalformedHandshakeError if the group is unusable
   */
  static generate(
    sessionType: SessionType,
    group: DiffieHellmanGroup = DEFAULT_DH_GROUP
  ): DiffieHellmanExchange {
    if (!isDiffieHellman(sessionType)) {
      throw new Error(`Session type ${sessionType.name} does not use Diffie-Hellman`);
    }

    const modulus = btwocToBigInt(group.modulus);
    const generator = btwocToBigInt(group.generator);
    if (modulus <= 3n || generator <= 1n || generator >= modulus) {
      throw new MalformedHandshakeError('Unusable Diffie-Hellman group');
    }

    let keyPair: DiffieHellman;
    try {
      keyPair = createDiffieHellman(toUnsigned(modulus), toUnsigned(generator));
      keyPair.generateKeys();
    } catch (err) {
      throw new MalformedHandshakeError(
        `Cannot generate Diffie-Hellman keys: ${err instanceof Error ? err.message : 'unknown'}`
      );
    }

    return new DiffieHellmanExchange(
      sessionType,
      { modulus: bigIntToBtwoc(modulus), generator: bigIntToBtwoc(generator) },
      keyPair
    );
  }

  /**
   * Public value, btwoc-encoded
   */
  get publicValue(): Buffer {
    return bigIntToBtwoc(unsignedToBigInt(this.requireKeyPair().getPublicKey()));
  }

  /**
   * Derive the key-encryption key from the peer's public value.
   * The caller should zero the result once the MAC key is masked/unmasked.
   *
   * @throws MalformedHandshakeError if the peer value is out of range
   */
  deriveKeyEncryptionKey(peerPublicValue: Buffer): Buffer {
    const keyPair = this.requireKeyPair();
    const peer = btwocToBigInt(peerPublicValue);
    // Rejects 0, 1, p-1 and anything >= p (including multiples of p)
    if (peer <= 1n || peer >= this.modulusValue - 1n) {
      throw new MalformedHandshakeError('Diffie-Hellman public value out of range');
    }

    let shared: Buffer;
    try {
      shared = keyPair.computeSecret(toUnsigned(peer));
    } catch (err) {
      throw new MalformedHandshakeError(
        `Diffie-Hellman agreement failed: ${err instanceof Error ? err.message : 'unknown'}`
      );
    }

    const encoded = bigIntToBtwoc(unsignedToBigInt(shared));
    shared.fill(0);
    const kek = createHash(this.sessionType.hashAlgorithm).update(encoded).digest();
    encoded.fill(0);
    return kek;
  }

  /**
   * Release the private key. The exchange cannot be used afterwards.
   */
  dispose(): void {
    // The private key lives inside OpenSSL; dropping the handle is all we can do
    this.keyPair = null;
  }

  private requireKeyPair(): DiffieHellman {
    if (!this.keyPair) {
      throw new Error('Diffie-Hellman exchange already disposed');
    }
    return this.keyPair;
  }
}

/**
 * XOR data with the key, repeating or truncating the key to data's length.
 * Symmetric: the same call masks and unmasks.
 */
export function xorMacKey(kek: Buffer, data: Buffer): Buffer {
  if (kek.length === 0) {
    throw new MalformedHandshakeError('Key-encryption key is empty');
  }
  const out = Buffer.alloc(data.length);
  data.forEach((byte, index) => {
    out[index] = byte ^ (kek[index % kek.length] ?? 0);
  });
  return out;
}

export const encryptMacKey = xorMacKey;
export const decryptMacKey = xorMacKey;

// ===== btwoc helpers =====

export function bigIntToBtwoc(value: bigint): Buffer {
  if (value < 0n) {
    throw new RangeError('btwoc encoding of negative values is not supported');
  }
  let hex = value.toString(16);
  if (hex.length % 2 === 1) {
    hex = `0${hex}`;
  }
  const bytes = Buffer.from(hex, 'hex');
  if ((bytes[0] ?? 0) & 0x80) {
    return Buffer.concat([Buffer.from([0]), bytes]);
  }
  return bytes;
}

/**
 * Decode a btwoc value. Protocol integers are never negative, so the bytes
 * are read as a magnitude.
 */
export function btwocToBigInt(bytes: Buffer): bigint {
  return unsignedToBigInt(bytes);
}

function unsignedToBigInt(bytes: Buffer): bigint {
  if (bytes.length === 0) {
    return 0n;
  }
  return BigInt(`0x${bytes.toString('hex')}`);
}

function toUnsigned(value: bigint): Buffer {
  let hex = value.toString(16);
  if (hex.length % 2 === 1) {
    hex = `0${hex}`;
  }
  return Buffer.from(hex, 'hex');
}

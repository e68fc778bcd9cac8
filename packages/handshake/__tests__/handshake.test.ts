/**
 * End-to-end association handshake tests
 *
 * A relying party and a provider talk through an in-process channel that
 * carries every message through the wire encoding.
 */

import { describe, it, expect } from 'vitest';
import { V10, V11, V20, type ProtocolVersion } from '@openassoc/protocol';
import { createProviderStore, createRelyingPartyStore } from '@openassoc/associations';
import {
  ProviderAssociationHandler,
  RelyingPartyAssociationManager,
  type ProviderEndpoint,
} from '../src/index.js';
import { connectTo, makeConfig } from './helpers.js';

function setup(raw: Record<string, unknown> = {}) {
  const config = makeConfig(raw);
  const opStore = createProviderStore();
  const rpStore = createRelyingPartyStore();
  const provider = new ProviderAssociationHandler({ store: opStore, config: config.provider });
  const channel = connectTo(provider);
  const manager = new RelyingPartyAssociationManager({
    channel,
    store: rpStore,
    config: config.relying_party,
  });
  return { opStore, rpStore, channel, manager };
}

describe('association handshake', () => {
  it.each([
    [V10, 'https://op.example.com/server', 'HMAC-SHA1'],
    [V11, 'https://op.example.com/server', 'HMAC-SHA1'],
    [V20, 'https://op.example.com/server', 'HMAC-SHA256'],
    [V10, 'http://op.example.com/server', 'HMAC-SHA1'],
    [V11, 'http://op.example.com/server', 'HMAC-SHA1'],
    [V20, 'http://op.example.com/server', 'HMAC-SHA256'],
  ])(
    'should agree on one association for %s at %s',
    async (version: ProtocolVersion, uri: string, expectedType: string) => {
      const { opStore, rpStore, channel, manager } = setup();
      const endpoint: ProviderEndpoint = { uri, version };
      const secure = uri.startsWith('https:');

      const rpAssociation = await manager.getOrCreateAssociation(endpoint);

      expect(rpAssociation).not.toBeNull();
      if (!rpAssociation) return;
      expect(await rpStore.lookup(uri, rpAssociation.handle)).toBe(rpAssociation);
      const opAssociation = await opStore.lookup('smart', rpAssociation.handle);
      expect(opAssociation).not.toBeNull();
      if (!opAssociation) return;

      expect(opAssociation).not.toBe(rpAssociation);
      expect(rpAssociation.associationType(version)).toBe(expectedType);
      expect(opAssociation.associationType(version)).toBe(expectedType);
      expect(opAssociation.secretKey.equals(rpAssociation.secretKey)).toBe(true);
      expect(
        Math.abs(opAssociation.secondsTillExpiration() - rpAssociation.secondsTillExpiration())
      ).toBeLessThan(60);

      expect(channel.roundTrips).toBe(1);
      const response = channel.responses[0];
      expect(response?.version.sharesWireFormatWith(version)).toBe(true);
      if (response?.kind !== 'associate_success') {
        throw new Error('Expected a successful associate response');
      }
      if (secure) {
        expect(response.macKey?.equals(rpAssociation.secretKey)).toBe(true);
        expect(response.encMacKey).toBeUndefined();
      } else {
        expect(response.macKey).toBeUndefined();
        expect(response.encMacKey?.equals(rpAssociation.secretKey)).toBe(false);
      }
    }
  );

  it('should never request an unencrypted session over an insecure transport', async () => {
    const { channel, manager } = setup();

    await manager.getOrCreateAssociation({ uri: 'http://op.example.com/server', version: V20 });
    await manager.getOrCreateAssociation({ uri: 'http://op.example.com/other', version: V11 });

    expect(channel.requests[0]?.['openid.session_type']).toBe('DH-SHA256');
    expect(channel.requests[1]?.['openid.session_type']).toBe('DH-SHA1');
  });

  it('should request an unencrypted session over a secure transport', async () => {
    const { channel, manager } = setup();

    await manager.getOrCreateAssociation({ uri: 'https://op.example.com/server', version: V20 });
    await manager.getOrCreateAssociation({ uri: 'https://op.example.com/other', version: V11 });

    expect(channel.requests[0]?.['openid.session_type']).toBe('no-encryption');
    expect(channel.requests[1]).toEqual({
      'openid.mode': 'associate',
      'openid.assoc_type': 'HMAC-SHA1',
    });
  });

  it('should renegotiate down to HMAC-SHA1 when the provider caps the hash length', async () => {
    const { opStore, channel, manager } = setup({
      provider: { security: { maximum_hash_bit_length: 160 } },
    });

    const association = await manager.getOrCreateAssociation({
      uri: 'http://op.example.com/server',
      version: V20,
    });

    expect(association?.associationType(V20)).toBe('HMAC-SHA1');
    expect(channel.roundTrips).toBe(2);
    expect(channel.requests[0]?.['openid.assoc_type']).toBe('HMAC-SHA256');
    expect(channel.responses[0]).toMatchObject({
      kind: 'associate_error',
      associationType: 'HMAC-SHA1',
      sessionType: 'DH-SHA1',
    });
    expect(channel.requests[1]?.['openid.assoc_type']).toBe('HMAC-SHA1');
    expect(channel.requests[1]?.['openid.session_type']).toBe('DH-SHA1');
    expect(channel.responses[1]?.kind).toBe('associate_success');
    expect(opStore.size).toBe(1);
  });

  it('should give up after one exchange when the suggestion breaks relying party settings', async () => {
    const { opStore, rpStore, channel, manager } = setup({
      relying_party: { security: { minimum_hash_bit_length: 256 } },
      provider: { security: { maximum_hash_bit_length: 160 } },
    });
    const uri = 'http://op.example.com/server';

    const association = await manager.getOrCreateAssociation({ uri, version: V20 });

    expect(association).toBeNull();
    expect(channel.roundTrips).toBe(1);
    expect(await rpStore.lookup(uri)).toBeNull();
    expect(await opStore.lookup('smart')).toBeNull();
  });
});

describe('RelyingPartyAssociationManager', () => {
  const endpoint: ProviderEndpoint = { uri: 'https://op.example.com/server', version: V20 };

  it('should reuse a stored association', async () => {
    const { channel, manager } = setup();

    const first = await manager.getOrCreateAssociation(endpoint);
    const second = await manager.getOrCreateAssociation(endpoint);

    expect(second).toBe(first);
    expect(channel.roundTrips).toBe(1);
  });

  it('should not hand a 2.0-only association to a 1.x caller', async () => {
    const { channel, manager } = setup();

    const modern = await manager.getOrCreateAssociation(endpoint);
    const legacy = await manager.getOrCreateAssociation({ uri: endpoint.uri, version: V11 });

    expect(modern?.associationType(V20)).toBe('HMAC-SHA256');
    expect(legacy?.associationType(V11)).toBe('HMAC-SHA1');
    expect(channel.roundTrips).toBe(2);
  });

  it('should always handshake when asked for a new association', async () => {
    const { channel, manager } = setup();

    const first = await manager.createNewAssociation(endpoint);
    const second = await manager.createNewAssociation(endpoint);

    expect(second?.handle).not.toBe(first?.handle);
    expect(channel.roundTrips).toBe(2);
  });

  it('should share one handshake between concurrent callers', async () => {
    const { channel, manager } = setup();

    const [first, second] = await Promise.all([
      manager.getOrCreateAssociation(endpoint),
      manager.getOrCreateAssociation(endpoint),
    ]);

    expect(first).not.toBeNull();
    expect(second).toBe(first);
    expect(channel.roundTrips).toBe(1);
  });

  it('should handshake again once the stored association expires', async () => {
    let now = new Date('2026-05-01T00:00:00.000Z');
    const clock = () => now;
    const config = makeConfig({ provider: { smart_association_lifetime_seconds: 60 } });
    const provider = new ProviderAssociationHandler({
      store: createProviderStore({ clock }),
      config: config.provider,
      clock,
    });
    const channel = connectTo(provider);
    const manager = new RelyingPartyAssociationManager({
      channel,
      store: createRelyingPartyStore({ clock }),
      config: config.relying_party,
      clock,
    });

    const first = await manager.getOrCreateAssociation(endpoint);
    now = new Date(now.getTime() + 61_000);
    const second = await manager.getOrCreateAssociation(endpoint);

    expect(first?.expiresAt.toISOString()).toBe('2026-05-01T00:01:00.000Z');
    expect(second).not.toBe(first);
    expect(channel.roundTrips).toBe(2);
  });
});

/**
 * Wiring from configuration
 *
 * Builds each side's store (with the configured sweep) and engine from a
 * parsed configuration. Call `store.stopSweeping()` on shutdown.
 */

import type { OpenAssocConfig } from '@openassoc/core';
import type { MessageChannel } from '@openassoc/protocol';
import {
  createProviderStore,
  createRelyingPartyStore,
  type AssociationRelyingPartyType,
  type KeyedAssociationStore,
} from '@openassoc/associations';
import { ProviderAssociationHandler } from './provider.js';
import { RelyingPartyAssociationManager } from './relying-party.js';

export interface SetupOptions {
  clock?: () => Date;
}

export interface RelyingPartySetup {
  manager: RelyingPartyAssociationManager;
  store: KeyedAssociationStore<string>;
}

export interface ProviderSetup {
  handler: ProviderAssociationHandler;
  store: KeyedAssociationStore<AssociationRelyingPartyType>;
}

export function createRelyingParty(
  config: OpenAssocConfig,
  channel: MessageChannel,
  options: SetupOptions = {}
): RelyingPartySetup {
  const store = createRelyingPartyStore({
    clock: options.clock,
    sweepIntervalMs: config.store.sweep_interval_ms,
  });
  const manager = new RelyingPartyAssociationManager({
    channel,
    store,
    config: config.relying_party,
    clock: options.clock,
  });
  return { manager, store };
}

export function createProvider(config: OpenAssocConfig, options: SetupOptions = {}): ProviderSetup {
  const store = createProviderStore({
    clock: options.clock,
    sweepIntervalMs: config.store.sweep_interval_ms,
  });
  const handler = new ProviderAssociationHandler({
    store,
    config: config.provider,
    clock: options.clock,
  });
  return { handler, store };
}

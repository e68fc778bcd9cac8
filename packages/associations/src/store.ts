/**
 * Association stores
 *
 * One in-memory store implementation serves both roles. What differs is how a
 * scope becomes a key, supplied as a capability object at construction:
 *
 * - relying party: scope = provider endpoint URL
 * - provider: scope = relying party type ('smart' for handshake-established
 *   associations, 'dumb' for the shared stateless pool)
 *
 * Expired associations are never returned; they are removed lazily on lookup
 * or by the periodic sweep.
 */

import { DuplicateHandleError, OpenAssocError, logger } from '@openassoc/core';
import type { Association } from './association.js';

export type AssociationRelyingPartyType = 'smart' | 'dumb';

export type StoreRole = 'relying_party' | 'provider';

/**
 * Storage contract. Asynchronous so persistent backends can implement it.
 */
export interface AssociationStore<TScope> {
  /**
   * @throws DuplicateHandleError if the handle already exists in the scope
   */
  add(scope: TScope, association: Association): Promise<void>;

  /**
   * With a handle: that association. Without: the most recently issued one.
   * Expired associations are reported as missing.
   */
  lookup(scope: TScope, handle?: string): Promise<Association | null>;

  /** @returns true if an association was removed */
  remove(scope: TScope, handle: string): Promise<boolean>;

  /** @returns number of expired associations dropped */
  clearExpired(): Promise<number>;
}

/**
 * Role-specific key derivation
 */
export interface StoreCapabilities<TScope> {
  role: StoreRole;
  scopeKey(scope: TScope): string;
}

export interface KeyedAssociationStoreOptions {
  /** Time source (default: wall clock) */
  clock?: () => Date;
  /** Start a periodic sweep at this interval; 0 or absent disables it */
  sweepIntervalMs?: number;
}

export class KeyedAssociationStore<TScope> implements AssociationStore<TScope> {
  private readonly scopes = new Map<string, Map<string, Association>>();
  private readonly clock: () => Date;
  private sweepTimer?: NodeJS.Timeout;

  constructor(
    private readonly capabilities: StoreCapabilities<TScope>,
    options: KeyedAssociationStoreOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    if (options.sweepIntervalMs) {
      this.startSweeping(options.sweepIntervalMs);
    }
  }

  get role(): StoreRole {
    return this.capabilities.role;
  }

  // No await between the collision check and the insert.
  async add(scope: TScope, association: Association): Promise<void> {
    const key = this.capabilities.scopeKey(scope);
    let entries = this.scopes.get(key);
    if (!entries) {
      entries = new Map();
      this.scopes.set(key, entries);
    }

    if (entries.has(association.handle)) {
      throw new DuplicateHandleError(association.handle, { role: this.capabilities.role });
    }
    entries.set(association.handle, association);

    logger.debug(
      `[association-store] ${this.capabilities.role} stored ${association.handle} under ${key}`
    );
  }

  async lookup(scope: TScope, handle?: string): Promise<Association | null> {
    const key = this.capabilities.scopeKey(scope);
    const entries = this.scopes.get(key);
    if (!entries) {
      return null;
    }

    const now = this.clock();

    if (handle !== undefined) {
      const association = entries.get(handle);
      if (!association) {
        return null;
      }
      if (association.isExpired(now)) {
        entries.delete(handle);
        return null;
      }
      return association;
    }

    let newest: Association | null = null;
    for (const [entryHandle, association] of entries) {
      if (association.isExpired(now)) {
        entries.delete(entryHandle);
        continue;
      }
      if (!newest || association.issued.getTime() >= newest.issued.getTime()) {
        newest = association;
      }
    }
    if (entries.size === 0) {
      this.scopes.delete(key);
    }
    return newest;
  }

  async remove(scope: TScope, handle: string): Promise<boolean> {
    const key = this.capabilities.scopeKey(scope);
    const entries = this.scopes.get(key);
    if (!entries) {
      return false;
    }
    const removed = entries.delete(handle);
    if (entries.size === 0) {
      this.scopes.delete(key);
    }
    if (removed) {
      logger.debug(`[association-store] ${this.capabilities.role} removed ${handle}`);
    }
    return removed;
  }

  async clearExpired(): Promise<number> {
    const now = this.clock();
    let cleared = 0;
    for (const [key, entries] of this.scopes) {
      for (const [handle, association] of entries) {
        if (association.isExpired(now)) {
          entries.delete(handle);
          cleared++;
        }
      }
      if (entries.size === 0) {
        this.scopes.delete(key);
      }
    }
    return cleared;
  }

  /**
   * Number of stored associations, expired ones included until swept
   */
  get size(): number {
    let total = 0;
    for (const entries of this.scopes.values()) {
      total += entries.size;
    }
    return total;
  }

  /**
   * Start periodic removal of expired associations
   */
  startSweeping(intervalMs: number): void {
    if (this.sweepTimer || intervalMs <= 0) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      this.clearExpired()
        .then(cleared => {
          if (cleared > 0) {
            logger.debug(`[association-store] Swept ${cleared} expired associations`);
          }
        })
        .catch(err => {
          logger.error({ err }, '[association-store] Sweep error');
        });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeping(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }
}

/**
 * Normalise a provider endpoint so equivalent URLs share a scope
 */
export function normalizeEndpoint(endpointUri: string): string {
  try {
    const url = new URL(endpointUri);
    url.hash = '';
    return url.toString();
  } catch {
    throw new OpenAssocError(`Invalid provider endpoint: ${endpointUri}`, 'invalid_endpoint');
  }
}

export function createRelyingPartyStore(
  options: KeyedAssociationStoreOptions = {}
): KeyedAssociationStore<string> {
  return new KeyedAssociationStore<string>(
    { role: 'relying_party', scopeKey: normalizeEndpoint },
    options
  );
}

export function createProviderStore(
  options: KeyedAssociationStoreOptions = {}
): KeyedAssociationStore<AssociationRelyingPartyType> {
  return new KeyedAssociationStore<AssociationRelyingPartyType>(
    { role: 'provider', scopeKey: type => type },
    options
  );
}

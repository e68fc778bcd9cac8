/**
 * Provider endpoint description
 */

import type { ProtocolVersion } from '@openassoc/protocol';

export interface ProviderEndpoint {
  uri: string;
  version: ProtocolVersion;
}

/**
 * True when the endpoint's scheme already gives the channel confidentiality
 */
export function isTransportSecure(uri: string): boolean {
  try {
    return new URL(uri).protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Message channel contract
 *
 * The transport that carries associate requests to a provider endpoint and
 * returns its direct response. Implementations own serialisation and HTTP;
 * any rejection is treated as a transport failure by the handshake.
 */

import type { AssociateRequest, AssociateResponse } from './messages.js';

export interface ChannelRequestOptions {
  /** Aborted when the caller's timeout elapses */
  signal?: AbortSignal;
}

export interface MessageChannel {
  request(
    endpointUri: string,
    message: AssociateRequest,
    options?: ChannelRequestOptions
  ): Promise<AssociateResponse>;
}

/**
 * Associate message types
 *
 * Association and session types are carried as raw wire tokens so that a
 * peer's unknown token survives decoding and can be judged by the vocabulary.
 * Binary values are btwoc / raw bytes as they appear on the wire.
 */

import type { ProtocolVersion } from './version.js';

/** error_code naming an alternate association/session type pair */
export const UNSUPPORTED_TYPE_ERROR_CODE = 'unsupported-type';

export interface AssociateRequest {
  kind: 'associate_request';
  version: ProtocolVersion;
  associationType: string;
  sessionType: string;
  /** Present only when the requester uses a non-default group */
  dhModulus?: Buffer;
  dhGenerator?: Buffer;
  dhConsumerPublic?: Buffer;
}

export interface AssociateSuccessfulResponse {
  kind: 'associate_success';
  version: ProtocolVersion;
  associationType: string;
  sessionType: string;
  assocHandle: string;
  /** Seconds */
  expiresIn: number;
  /** Unencrypted sessions */
  macKey?: Buffer;
  /** Diffie-Hellman sessions */
  dhServerPublic?: Buffer;
  encMacKey?: Buffer;
}

export interface AssociateUnsuccessfulResponse {
  kind: 'associate_error';
  version: ProtocolVersion;
  error: string;
  errorCode?: string;
  /** Suggested alternative, present with errorCode 'unsupported-type' */
  associationType?: string;
  sessionType?: string;
}

export type AssociateResponse = AssociateSuccessfulResponse | AssociateUnsuccessfulResponse;

/**
 * True when an unsuccessful response names an alternate pair to retry with
 */
export function isRenegotiationSuggestion(
  response: AssociateUnsuccessfulResponse
): response is AssociateUnsuccessfulResponse & { associationType: string; sessionType: string } {
  return (
    response.errorCode === UNSUPPORTED_TYPE_ERROR_CODE &&
    response.associationType !== undefined &&
    response.sessionType !== undefined
  );
}

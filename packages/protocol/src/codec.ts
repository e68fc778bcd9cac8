/**
 * Associate message codec
 *
 * Maps associate messages to and from flat field maps: `openid.`-prefixed
 * keys for the indirect request, bare keys for the direct response. Decoding
 * validates with Zod and reports the version the fields themselves claim.
 */

import { z } from 'zod';
import { ProtocolMessageError } from '@openassoc/core';
import { versionForNamespace, type ProtocolVersion } from './version.js';
import type {
  AssociateRequest,
  AssociateResponse,
  AssociateSuccessfulResponse,
  AssociateUnsuccessfulResponse,
} from './messages.js';

const base64Value = z
  .string()
  .min(1)
  .regex(/^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/, 'must be base64')
  .transform(value => Buffer.from(value, 'base64'));

/** Printable ASCII, per the handle grammar */
const handleValue = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[\x21-\x7e]+$/, 'must be printable ASCII');

const RequestFieldsSchema = z.object({
  'openid.ns': z.string().optional(),
  'openid.mode': z.literal('associate'),
  'openid.assoc_type': z.string().min(1),
  'openid.session_type': z.string().optional(),
  'openid.dh_modulus': base64Value.optional(),
  'openid.dh_gen': base64Value.optional(),
  'openid.dh_consumer_public': base64Value.optional(),
});

const SuccessFieldsSchema = z.object({
  ns: z.string().optional(),
  assoc_type: z.string().min(1),
  session_type: z.string().optional(),
  assoc_handle: handleValue,
  expires_in: z
    .string()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform(value => Number(value)),
  mac_key: base64Value.optional(),
  dh_server_public: base64Value.optional(),
  enc_mac_key: base64Value.optional(),
});

const ErrorFieldsSchema = z.object({
  ns: z.string().optional(),
  error: z.string(),
  error_code: z.string().optional(),
  assoc_type: z.string().optional(),
  session_type: z.string().optional(),
});

// ===== Requests =====

export function encodeAssociateRequest(message: AssociateRequest): Record<string, string> {
  const fields: Record<string, string> = {};
  if (message.version.namespace) {
    fields['openid.ns'] = message.version.namespace;
  }
  fields['openid.mode'] = 'associate';
  fields['openid.assoc_type'] = message.associationType;
  if (message.sessionType !== '') {
    fields['openid.session_type'] = message.sessionType;
  }
  if (message.dhModulus) {
    fields['openid.dh_modulus'] = message.dhModulus.toString('base64');
  }
  if (message.dhGenerator) {
    fields['openid.dh_gen'] = message.dhGenerator.toString('base64');
  }
  if (message.dhConsumerPublic) {
    fields['openid.dh_consumer_public'] = message.dhConsumerPublic.toString('base64');
  }
  return fields;
}

/**
 * @throws ProtocolMessageError if the fields are not an associate request
 */
export function decodeAssociateRequest(fields: Record<string, string>): AssociateRequest {
  const parsed = parseFields(RequestFieldsSchema, fields, 'associate request');
  return {
    kind: 'associate_request',
    version: claimedVersion(parsed['openid.ns']),
    associationType: parsed['openid.assoc_type'],
    sessionType: parsed['openid.session_type'] ?? '',
    dhModulus: parsed['openid.dh_modulus'],
    dhGenerator: parsed['openid.dh_gen'],
    dhConsumerPublic: parsed['openid.dh_consumer_public'],
  };
}

// ===== Responses =====

export function encodeAssociateResponse(message: AssociateResponse): Record<string, string> {
  const fields: Record<string, string> = {};
  if (message.version.namespace) {
    fields.ns = message.version.namespace;
  }

  if (message.kind === 'associate_error') {
    fields.error = message.error;
    if (message.errorCode !== undefined) fields.error_code = message.errorCode;
    if (message.associationType !== undefined) fields.assoc_type = message.associationType;
    if (message.sessionType !== undefined) fields.session_type = message.sessionType;
    return fields;
  }

  fields.assoc_type = message.associationType;
  if (message.sessionType !== '') {
    fields.session_type = message.sessionType;
  }
  fields.assoc_handle = message.assocHandle;
  fields.expires_in = String(message.expiresIn);
  if (message.macKey) fields.mac_key = message.macKey.toString('base64');
  if (message.dhServerPublic) fields.dh_server_public = message.dhServerPublic.toString('base64');
  if (message.encMacKey) fields.enc_mac_key = message.encMacKey.toString('base64');
  return fields;
}

/**
 * A field map carrying `error` decodes as unsuccessful, anything else as
 * successful.
 *
 * @throws ProtocolMessageError if the fields match neither form
 */
export function decodeAssociateResponse(fields: Record<string, string>): AssociateResponse {
  if (Object.prototype.hasOwnProperty.call(fields, 'error')) {
    return decodeUnsuccessful(fields);
  }
  return decodeSuccessful(fields);
}

function decodeSuccessful(fields: Record<string, string>): AssociateSuccessfulResponse {
  const parsed = parseFields(SuccessFieldsSchema, fields, 'associate response');
  return {
    kind: 'associate_success',
    version: claimedVersion(parsed.ns),
    associationType: parsed.assoc_type,
    sessionType: parsed.session_type ?? '',
    assocHandle: parsed.assoc_handle,
    expiresIn: parsed.expires_in,
    macKey: parsed.mac_key,
    dhServerPublic: parsed.dh_server_public,
    encMacKey: parsed.enc_mac_key,
  };
}

function decodeUnsuccessful(fields: Record<string, string>): AssociateUnsuccessfulResponse {
  const parsed = parseFields(ErrorFieldsSchema, fields, 'associate error response');
  return {
    kind: 'associate_error',
    version: claimedVersion(parsed.ns),
    error: parsed.error,
    errorCode: parsed.error_code,
    associationType: parsed.assoc_type,
    sessionType: parsed.session_type,
  };
}

// ===== Helpers =====

function parseFields<T extends z.ZodTypeAny>(
  schema: T,
  fields: Record<string, string>,
  description: string
): z.output<T> {
  const result = schema.safeParse(fields);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ProtocolMessageError(`Invalid ${description}: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

function claimedVersion(namespace: string | undefined): ProtocolVersion {
  const version = versionForNamespace(namespace);
  if (!version) {
    throw new ProtocolMessageError(`Unknown protocol namespace: ${namespace ?? '(none)'}`);
  }
  return version;
}

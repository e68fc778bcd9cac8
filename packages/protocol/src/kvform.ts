/**
 * Key-value form encoding
 *
 * Direct responses travel as `key:value\n` lines.
 */

import { ProtocolMessageError } from '@openassoc/core';

export function encodeKeyValueForm(fields: Record<string, string>): string {
  let body = '';
  for (const [key, value] of Object.entries(fields)) {
    if (key.length === 0 || key.includes(':') || key.includes('\n')) {
      throw new ProtocolMessageError(`Invalid key-value form key: ${JSON.stringify(key)}`);
    }
    if (value.includes('\n')) {
      throw new ProtocolMessageError(`Value for '${key}' contains a newline`);
    }
    body += `${key}:${value}\n`;
  }
  return body;
}

export function decodeKeyValueForm(body: string): Record<string, string> {
  const fields: Record<string, string> = {};
  const lines = body.split('\n');
  // A well-formed body ends with a newline, leaving one empty trailing entry
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  lines.forEach((line, index) => {
    const separator = line.indexOf(':');
    if (separator <= 0) {
      throw new ProtocolMessageError(`Malformed key-value form line ${index + 1}`);
    }
    const key = line.slice(0, separator);
    if (Object.prototype.hasOwnProperty.call(fields, key)) {
      throw new ProtocolMessageError(`Duplicate key-value form key: ${key}`);
    }
    fields[key] = line.slice(separator + 1);
  });

  return fields;
}

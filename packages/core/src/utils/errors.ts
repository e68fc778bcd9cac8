/**
 * Custom error classes
 *
 * All handshake errors extend OpenAssocError so callers can tell an expected
 * protocol outcome apart from an internal fault.
 */

export class OpenAssocError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OpenAssocError';
  }
}

/**
 * Bad Diffie-Hellman public value, or response fields that are missing or
 * inconsistent with the request.
 */
export class MalformedHandshakeError extends OpenAssocError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'malformed_handshake', details);
    this.name = 'MalformedHandshakeError';
  }
}

/**
 * Local security settings refuse an association/session type pair.
 */
export class PolicyRejectedError extends OpenAssocError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'policy_rejected', details);
    this.name = 'PolicyRejectedError';
  }
}

/**
 * Association handle already present in the store scope.
 */
export class DuplicateHandleError extends OpenAssocError {
  constructor(handle: string, details?: Record<string, unknown>) {
    super(`Association handle already exists: ${handle}`, 'duplicate_handle', {
      handle,
      ...details,
    });
    this.name = 'DuplicateHandleError';
  }
}

/**
 * No response, unreachable peer, timeout or a response that cannot be used at
 * the transport level (e.g. a different protocol version).
 */
export class TransportFailureError extends OpenAssocError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'transport_failure', details);
    this.name = 'TransportFailureError';
  }
}

/**
 * Wire fields that do not decode into an associate message.
 */
export class ProtocolMessageError extends OpenAssocError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'invalid_message', details);
    this.name = 'ProtocolMessageError';
  }
}

export class ConfigurationError extends OpenAssocError {
  constructor(message: string, code = 'configuration_error', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Relying party association handshake
 *
 * One handshake per instance, driven through an explicit state:
 *
 *   idle -> request_sent(initial) -> accepted | renegotiating | failed
 *   renegotiating -> request_sent(renegotiated) -> accepted | failed
 *
 * Only an initial attempt can lead to renegotiating, so at most two round
 * trips happen. Every failure (provider misbehaviour, policy refusal,
 * transport trouble) ends in `failed` and run() resolves to null. Errors
 * outside the handshake taxonomy still propagate.
 */

import {
  DuplicateHandleError,
  MAX_ASSOCIATION_LIFETIME_SECONDS,
  MalformedHandshakeError,
  PolicyRejectedError,
  TransportFailureError,
  logger,
  type RelyingPartyConfig,
  type SecuritySettings,
} from '@openassoc/core';
import {
  isDiffieHellman,
  isRenegotiationSuggestion,
  isUnrecognized,
  parseSessionType,
  parseSignatureAlgorithm,
  sessionTypeToken,
  signatureAlgorithmToken,
  type AssociateRequest,
  type AssociateResponse,
  type AssociateSuccessfulResponse,
  type AssociateUnsuccessfulResponse,
  type MessageChannel,
} from '@openassoc/protocol';
import {
  Association,
  DiffieHellmanExchange,
  bestAcceptableFallback,
  decryptMacKey,
  explainRejection,
  normalizeEndpoint,
  type AssociationPair,
  type AssociationStore,
} from '@openassoc/associations';
import { isTransportSecure, type ProviderEndpoint } from './endpoint.js';

export type HandshakeAttempt = 'initial' | 'renegotiated';

export type HandshakeFailureKind =
  | 'no_acceptable_pair'
  | 'policy_rejected'
  | 'malformed_handshake'
  | 'transport_failure'
  | 'provider_error'
  | 'renegotiation_exhausted';

export interface HandshakeFailure {
  kind: HandshakeFailureKind;
  message: string;
}

interface RequestSentState {
  status: 'request_sent';
  attempt: HandshakeAttempt;
  pair: AssociationPair;
}

interface RenegotiatingState {
  status: 'renegotiating';
  pair: AssociationPair;
}

export type HandshakeState =
  | { status: 'idle' }
  | RequestSentState
  | RenegotiatingState
  | { status: 'accepted'; association: Association }
  | { status: 'failed'; failure: HandshakeFailure };

export interface RelyingPartyHandshakeOptions {
  endpoint: ProviderEndpoint;
  channel: MessageChannel;
  store: AssociationStore<string>;
  settings: SecuritySettings;
  requestTimeoutMs: number;
  clock?: () => Date;
}

export class RelyingPartyHandshake {
  private current: HandshakeState = { status: 'idle' };
  private exchanges = 0;
  private readonly transportIsSecure: boolean;
  private readonly clock: () => Date;

  constructor(private readonly options: RelyingPartyHandshakeOptions) {
    this.transportIsSecure = isTransportSecure(options.endpoint.uri);
    this.clock = options.clock ?? (() => new Date());
  }

  get state(): HandshakeState {
    return this.current;
  }

  /** Request/response exchanges performed so far */
  get roundTrips(): number {
    return this.exchanges;
  }

  /** Why the handshake failed, once it has */
  get failure(): HandshakeFailure | undefined {
    return this.current.status === 'failed' ? this.current.failure : undefined;
  }

  /**
   * Run the handshake to completion
   *
   * @returns the stored association, or null if none could be agreed
   */
  async run(): Promise<Association | null> {
    if (this.current.status !== 'idle') {
      throw new Error(`Handshake already ${this.current.status}`);
    }

    const { endpoint, settings } = this.options;
    const initial = bestAcceptableFallback(settings, endpoint.version, this.transportIsSecure);
    if (!initial) {
      this.current = failed(
        'no_acceptable_pair',
        `No association type acceptable for ${endpoint.version} over ${this.transportIsSecure ? 'secure' : 'insecure'} transport`
      );
    } else {
      this.current = { status: 'request_sent', attempt: 'initial', pair: initial };
    }

    while (this.current.status === 'request_sent' || this.current.status === 'renegotiating') {
      this.current =
        this.current.status === 'request_sent'
          ? await this.send(this.current)
          : { status: 'request_sent', attempt: 'renegotiated', pair: this.current.pair };
    }

    if (this.current.status === 'accepted') {
      const { association } = this.current;
      logger.info(
        `[rp-handshake] Associated with ${endpoint.uri} (${association.signatureAlgorithm.name}, handle ${association.handle})`
      );
      return association;
    }

    if (this.current.status === 'failed') {
      logger.warn(
        { endpoint: endpoint.uri, kind: this.current.failure.kind, roundTrips: this.exchanges },
        `[rp-handshake] No association: ${this.current.failure.message}`
      );
    }
    return null;
  }

  private async send(state: RequestSentState): Promise<HandshakeState> {
    const { endpoint } = this.options;
    let exchange: DiffieHellmanExchange | undefined;

    try {
      const request = this.buildRequest(state.pair);
      if (isDiffieHellman(state.pair.sessionType)) {
        exchange = DiffieHellmanExchange.generate(state.pair.sessionType);
        request.dhConsumerPublic = exchange.publicValue;
      }

      logger.debug(
        `[rp-handshake] Sending ${state.attempt} associate request to ${endpoint.uri}: ${request.associationType}/${request.sessionType || '(none)'}`
      );
      this.exchanges++;
      const response = await this.request(request);

      if (!response.version.sharesWireFormatWith(endpoint.version)) {
        throw new TransportFailureError(
          `Response version ${response.version} does not match request version ${endpoint.version}`
        );
      }

      if (response.kind === 'associate_error') {
        return this.renegotiate(state, response);
      }

      const association = this.accept(state.pair, request, response, exchange);
      await this.options.store.add(endpoint.uri, association);
      return { status: 'accepted', association };
    } catch (err) {
      return failedFrom(err);
    } finally {
      exchange?.dispose();
    }
  }

  private buildRequest(pair: AssociationPair): AssociateRequest {
    const { version } = this.options.endpoint;
    const associationType = signatureAlgorithmToken(version, pair.signatureAlgorithm);
    const sessionType = sessionTypeToken(version, pair.sessionType);
    if (associationType === undefined || sessionType === undefined) {
      throw new PolicyRejectedError(
        `${pair.signatureAlgorithm.name}/${pair.sessionType.name} is not available in ${version}`
      );
    }
    return { kind: 'associate_request', version, associationType, sessionType };
  }

  private async request(request: AssociateRequest): Promise<AssociateResponse> {
    const { channel, endpoint, requestTimeoutMs } = this.options;
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new TransportFailureError(`No response from ${endpoint.uri} within ${requestTimeoutMs}ms`));
      }, requestTimeoutMs);
    });

    try {
      return await Promise.race([
        channel.request(endpoint.uri, request, { signal: controller.signal }),
        timedOut,
      ]);
    } catch (err) {
      if (err instanceof TransportFailureError) {
        throw err;
      }
      throw new TransportFailureError(
        `Associate request to ${endpoint.uri} failed: ${err instanceof Error ? err.message : String(err)}`
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private renegotiate(
    state: RequestSentState,
    response: AssociateUnsuccessfulResponse
  ): HandshakeState {
    if (!isRenegotiationSuggestion(response)) {
      return failed('provider_error', `Provider refused association: ${response.error}`);
    }
    if (state.attempt === 'renegotiated') {
      return failed(
        'renegotiation_exhausted',
        `Provider suggested ${response.associationType}/${response.sessionType || '(none)'} after renegotiation`
      );
    }

    const { endpoint, settings } = this.options;
    const signatureAlgorithm = parseSignatureAlgorithm(endpoint.version, response.associationType);
    const sessionType = parseSessionType(endpoint.version, response.sessionType);
    const rejection = explainRejection(settings, signatureAlgorithm, sessionType, this.transportIsSecure);
    if (rejection !== null || isUnrecognized(signatureAlgorithm) || isUnrecognized(sessionType)) {
      return failed(
        'policy_rejected',
        `Refusing suggested ${response.associationType}/${response.sessionType || '(none)'}: ${rejection ?? 'unrecognized type'}`
      );
    }

    logger.info(
      `[rp-handshake] ${endpoint.uri} suggested ${response.associationType}/${response.sessionType || '(none)'}, retrying`
    );
    return { status: 'renegotiating', pair: { signatureAlgorithm, sessionType } };
  }

  private accept(
    pair: AssociationPair,
    request: AssociateRequest,
    response: AssociateSuccessfulResponse,
    exchange: DiffieHellmanExchange | undefined
  ): Association {
    if (
      response.associationType !== request.associationType ||
      response.sessionType !== request.sessionType
    ) {
      throw new MalformedHandshakeError(
        `Response ${response.associationType}/${response.sessionType || '(none)'} does not match request ${request.associationType}/${request.sessionType || '(none)'}`
      );
    }
    if (!Number.isSafeInteger(response.expiresIn) || response.expiresIn <= 0) {
      throw new MalformedHandshakeError('expires_in must be a positive number of seconds');
    }
    if (response.expiresIn > MAX_ASSOCIATION_LIFETIME_SECONDS) {
      throw new MalformedHandshakeError(
        `expires_in must not exceed ${MAX_ASSOCIATION_LIFETIME_SECONDS} seconds`
      );
    }

    const now = this.clock();
    const init = {
      handle: response.assocHandle,
      signatureAlgorithm: pair.signatureAlgorithm,
      issued: now,
      expiresAt: new Date(now.getTime() + response.expiresIn * 1000),
    };

    if (!exchange) {
      if (!response.macKey) {
        throw new MalformedHandshakeError('Unencrypted associate response lacks mac_key');
      }
      return new Association({ ...init, secretKey: response.macKey });
    }

    if (!response.dhServerPublic || !response.encMacKey) {
      throw new MalformedHandshakeError(
        'Diffie-Hellman associate response lacks dh_server_public or enc_mac_key'
      );
    }
    const kek = exchange.deriveKeyEncryptionKey(response.dhServerPublic);
    const secretKey = decryptMacKey(kek, response.encMacKey);
    kek.fill(0);
    try {
      return new Association({ ...init, secretKey });
    } finally {
      secretKey.fill(0);
    }
  }
}

function failed(kind: HandshakeFailureKind, message: string): HandshakeState {
  return { status: 'failed', failure: { kind, message } };
}

function failedFrom(err: unknown): HandshakeState {
  if (err instanceof TransportFailureError) {
    return failed('transport_failure', err.message);
  }
  if (err instanceof PolicyRejectedError) {
    return failed('policy_rejected', err.message);
  }
  // A reused handle means the provider handed out the same association twice
  if (err instanceof MalformedHandshakeError || err instanceof DuplicateHandleError) {
    return failed('malformed_handshake', err.message);
  }
  throw err;
}

export interface RelyingPartyAssociationManagerOptions {
  channel: MessageChannel;
  store: AssociationStore<string>;
  config: RelyingPartyConfig;
  clock?: () => Date;
}

/**
 * Entry point for relying parties: reuses stored associations and runs
 * handshakes when none is usable.
 */
export class RelyingPartyAssociationManager {
  private readonly inFlight = new Map<string, Promise<Association | null>>();

  constructor(private readonly options: RelyingPartyAssociationManagerOptions) {}

  /**
   * Stored non-expired association for the endpoint, or a new one. A stored
   * association whose algorithm the endpoint's version cannot name is skipped.
   */
  async getOrCreateAssociation(endpoint: ProviderEndpoint): Promise<Association | null> {
    const existing = await this.options.store.lookup(endpoint.uri);
    if (existing && existing.associationType(endpoint.version) !== undefined) {
      return existing;
    }
    return this.createNewAssociation(endpoint);
  }

  /**
   * Always handshake. Concurrent calls for one endpoint share the handshake.
   */
  createNewAssociation(endpoint: ProviderEndpoint): Promise<Association | null> {
    const key = `${endpoint.version}|${normalizeEndpoint(endpoint.uri)}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const handshake = new RelyingPartyHandshake({
      endpoint,
      channel: this.options.channel,
      store: this.options.store,
      settings: this.options.config.security,
      requestTimeoutMs: this.options.config.request_timeout_ms,
      clock: this.options.clock,
    });
    const run = handshake.run().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }
}

/**
 * Provider association handler
 *
 * Answers associate requests against the provider's own security settings.
 * The provider never retries: an unacceptable request gets an error response
 * naming the pair it would accept, and renegotiation is left to the relying
 * party.
 */

import {
  DuplicateHandleError,
  MalformedHandshakeError,
  ProtocolMessageError,
  logger,
  type ProviderConfig,
} from '@openassoc/core';
import {
  UNSUPPORTED_TYPE_ERROR_CODE,
  V20,
  decodeAssociateRequest,
  isDiffieHellman,
  isUnrecognized,
  parseSessionType,
  parseSignatureAlgorithm,
  sessionTypeToken,
  signatureAlgorithmToken,
  versionForNamespace,
  type AssociateRequest,
  type AssociateResponse,
  type AssociateSuccessfulResponse,
  type AssociateUnsuccessfulResponse,
  type DiffieHellmanSessionType,
  type ProtocolVersion,
  type SignatureAlgorithm,
} from '@openassoc/protocol';
import {
  DEFAULT_DH_GROUP,
  DiffieHellmanExchange,
  bestAcceptableFallback,
  createAssociation,
  encryptMacKey,
  explainRejection,
  type Association,
  type AssociationRelyingPartyType,
  type AssociationStore,
  type DiffieHellmanGroup,
} from '@openassoc/associations';

export interface ProviderAssociationHandlerOptions {
  store: AssociationStore<AssociationRelyingPartyType>;
  config: ProviderConfig;
  clock?: () => Date;
}

interface SessionKeys {
  dhServerPublic: Buffer;
  kek: Buffer;
}

export class ProviderAssociationHandler {
  private readonly clock: () => Date;

  constructor(private readonly options: ProviderAssociationHandlerOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Decode and answer a request's raw fields. Fields that are not an
   * associate request get a plain error response.
   */
  async handleAssociateFields(
    fields: Record<string, string>,
    transportIsSecure: boolean
  ): Promise<AssociateResponse> {
    let request: AssociateRequest;
    try {
      request = decodeAssociateRequest(fields);
    } catch (err) {
      if (!(err instanceof ProtocolMessageError)) {
        throw err;
      }
      logger.warn(`[op-associate] Undecodable associate request: ${err.message}`);
      return errorResponse(versionForNamespace(fields['openid.ns']) ?? V20, err.message);
    }
    return this.handleAssociateRequest(request, transportIsSecure);
  }

  /**
   * @throws DuplicateHandleError if every generated handle collided
   */
  async handleAssociateRequest(
    request: AssociateRequest,
    transportIsSecure: boolean
  ): Promise<AssociateResponse> {
    const { version } = request;
    const { security } = this.options.config;
    const signatureAlgorithm = parseSignatureAlgorithm(version, request.associationType);
    const sessionType = parseSessionType(version, request.sessionType);

    const rejection = explainRejection(security, signatureAlgorithm, sessionType, transportIsSecure);
    if (rejection !== null || isUnrecognized(signatureAlgorithm) || isUnrecognized(sessionType)) {
      return this.suggestAlternative(request, rejection ?? 'unrecognized type', transportIsSecure);
    }

    let keys: SessionKeys | undefined;
    if (isDiffieHellman(sessionType)) {
      if (!request.dhConsumerPublic) {
        return errorResponse(version, 'Missing dh_consumer_public');
      }
      try {
        keys = this.agreeKeys(sessionType, request.dhConsumerPublic, requestedGroup(request));
      } catch (err) {
        if (!(err instanceof MalformedHandshakeError)) {
          throw err;
        }
        logger.warn(`[op-associate] Rejected Diffie-Hellman parameters: ${err.message}`);
        return errorResponse(version, err.message);
      }
    }

    const lifetimeSeconds = this.options.config.smart_association_lifetime_seconds;
    let association: Association;
    try {
      association = await this.storeNew('smart', signatureAlgorithm, lifetimeSeconds);
    } catch (err) {
      keys?.kek.fill(0);
      throw err;
    }

    const response: AssociateSuccessfulResponse = {
      kind: 'associate_success',
      version,
      associationType: request.associationType,
      sessionType: request.sessionType,
      assocHandle: association.handle,
      expiresIn: lifetimeSeconds,
    };
    if (keys) {
      response.dhServerPublic = keys.dhServerPublic;
      response.encMacKey = encryptMacKey(keys.kek, association.secretKey);
      keys.kek.fill(0);
    } else {
      response.macKey = Buffer.from(association.secretKey);
    }

    logger.info(
      `[op-associate] Issued ${request.associationType}/${request.sessionType || '(none)'} association ${association.handle}`
    );
    return response;
  }

  /**
   * Association for relying parties that cannot associate, kept in the shared
   * dumb pool.
   */
  async createDumbAssociation(signatureAlgorithm: SignatureAlgorithm): Promise<Association> {
    return this.storeNew(
      'dumb',
      signatureAlgorithm,
      this.options.config.dumb_association_lifetime_seconds
    );
  }

  /**
   * @returns true if the association existed
   */
  async invalidateAssociation(
    type: AssociationRelyingPartyType,
    handle: string
  ): Promise<boolean> {
    const removed = await this.options.store.remove(type, handle);
    if (removed) {
      logger.info(`[op-associate] Invalidated ${type} association ${handle}`);
    }
    return removed;
  }

  private suggestAlternative(
    request: AssociateRequest,
    reason: string,
    transportIsSecure: boolean
  ): AssociateUnsuccessfulResponse {
    const { version } = request;
    const requested = `${request.associationType}/${request.sessionType || '(none)'}`;
    const fallback = bestAcceptableFallback(this.options.config.security, version, transportIsSecure);

    if (!fallback) {
      logger.warn(`[op-associate] Refused ${requested} with nothing to suggest: ${reason}`);
      return errorResponse(version, `Unsupported association: ${reason}`);
    }

    const associationType = signatureAlgorithmToken(version, fallback.signatureAlgorithm);
    const sessionType = sessionTypeToken(version, fallback.sessionType);
    logger.info(
      `[op-associate] Refused ${requested} (${reason}), suggesting ${associationType}/${sessionType || '(none)'}`
    );
    return {
      kind: 'associate_error',
      version,
      error: `Unsupported association: ${reason}`,
      errorCode: UNSUPPORTED_TYPE_ERROR_CODE,
      associationType,
      sessionType,
    };
  }

  private agreeKeys(
    sessionType: DiffieHellmanSessionType,
    consumerPublic: Buffer,
    group: DiffieHellmanGroup
  ): SessionKeys {
    const exchange = DiffieHellmanExchange.generate(sessionType, group);
    try {
      return {
        kek: exchange.deriveKeyEncryptionKey(consumerPublic),
        dhServerPublic: exchange.publicValue,
      };
    } finally {
      exchange.dispose();
    }
  }

  private async storeNew(
    type: AssociationRelyingPartyType,
    signatureAlgorithm: SignatureAlgorithm,
    lifetimeSeconds: number
  ): Promise<Association> {
    const limit = this.options.config.handle_retry_limit;
    for (let attempt = 1; ; attempt++) {
      const association = createAssociation({
        signatureAlgorithm,
        lifetimeSeconds,
        now: this.clock(),
      });
      try {
        await this.options.store.add(type, association);
        return association;
      } catch (err) {
        if (!(err instanceof DuplicateHandleError) || attempt >= limit) {
          throw err;
        }
        logger.warn(
          `[op-associate] Handle collision on ${association.handle}, regenerating (attempt ${attempt}/${limit})`
        );
      }
    }
  }
}

function requestedGroup(request: AssociateRequest): DiffieHellmanGroup {
  if (!request.dhModulus && !request.dhGenerator) {
    return DEFAULT_DH_GROUP;
  }
  return {
    modulus: request.dhModulus ?? DEFAULT_DH_GROUP.modulus,
    generator: request.dhGenerator ?? DEFAULT_DH_GROUP.generator,
  };
}

function errorResponse(version: ProtocolVersion, error: string): AssociateUnsuccessfulResponse {
  return { kind: 'associate_error', version, error };
}

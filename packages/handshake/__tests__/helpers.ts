import {
  OpenAssocConfigSchema,
  type OpenAssocConfig,
} from '@openassoc/core'
import {
  decodeAssociateResponse,
  decodeKeyValueForm,
  encodeAssociateRequest,
  encodeAssociateResponse,
  encodeKeyValueForm,
  type AssociateRequest,
  type AssociateResponse,
  type ChannelRequestOptions,
  type MessageChannel,
} from '@openassoc/protocol'
import type { ProviderAssociationHandler } from '../src/index.js'
import { isTransportSecure } from '../src/index.js'

export type Fields = Record<string, string>

export type Responder = (
  fields: Fields,
  roundTrip: number,
  transportIsSecure: boolean
) => Fields | Promise<Fields>

/**
 * Channel that passes messages through the wire encoding without a network
 */
export class InProcessChannel implements MessageChannel {
  roundTrips = 0
  readonly requests: Fields[] = []
  readonly responses: AssociateResponse[] = []
  lastSignal?: AbortSignal

  constructor(private readonly respond: Responder) {}

  async request(
    endpointUri: string,
    message: AssociateRequest,
    options?: ChannelRequestOptions
  ): Promise<AssociateResponse> {
    this.roundTrips++
    this.lastSignal = options?.signal
    const fields = encodeAssociateRequest(message)
    this.requests.push(fields)

    const answer = await this.respond(fields, this.roundTrips, isTransportSecure(endpointUri))
    const response = decodeAssociateResponse(decodeKeyValueForm(encodeKeyValueForm(answer)))
    this.responses.push(response)
    return response
  }
}

/**
 * Channel backed by a provider handler, optionally tampering with its answers
 */
export function connectTo(
  provider: ProviderAssociationHandler,
  rewrite: (fields: Fields, roundTrip: number) => Fields = fields => fields
): InProcessChannel {
  return new InProcessChannel(async (fields, roundTrip, transportIsSecure) => {
    const response = await provider.handleAssociateFields(fields, transportIsSecure)
    return rewrite(encodeAssociateResponse(response), roundTrip)
  })
}

export function makeConfig(raw: Record<string, unknown> = {}): OpenAssocConfig {
  return OpenAssocConfigSchema.parse(raw)
}

export function suggestion(assocType: string, sessionType: string, ns?: string): Fields {
  const fields: Fields = {
    error: 'Unsupported association type',
    error_code: 'unsupported-type',
    assoc_type: assocType,
    session_type: sessionType,
  }
  return ns ? { ns, ...fields } : fields
}

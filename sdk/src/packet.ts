import type { PayloadCodec } from './codec.js'
import { EncodeError, MalformedMessageError } from './errors.js'
import type { Envelope } from './types/envelope.js'

/**
 * Caller-facing message.
 *
 * On send, `service` is the destination; on receive it is the source.
 */
export interface Packet<T> {
  readonly service: string
  /** Optional message type tag; sent as an empty string when absent */
  readonly kind?: string
  readonly data: T
}

/**
 * Build the outbound envelope for a packet.
 *
 * @throws EncodeError if the destination service is empty or the codec rejects `data`
 */
export function packetToEnvelope<T>(packet: Packet<T>, codec: PayloadCodec<T>): Envelope {
  if (packet.service === '') {
    throw new EncodeError('packet has no destination service')
  }
  return {
    messageType: packet.kind ?? '',
    destinationService: packet.service,
    payload: {
      typeUrl: codec.typeUrl ?? '',
      value: codec.encode(packet.data)
    }
  }
}

/**
 * Turn an inbound envelope into a packet.
 *
 * A missing source service is a hard failure, never a defaulted value.
 * A missing payload yields `codec.empty()`.
 *
 * @throws MalformedMessageError if the envelope has no source service
 * @throws DecodeError if the payload does not decode under `codec`
 */
export function packetFromEnvelope<T>(envelope: Envelope, codec: PayloadCodec<T>): Packet<T> {
  const service = envelope.sourceService
  if (service === undefined || service === '') {
    throw new MalformedMessageError('missing source address')
  }

  const data = envelope.payload === undefined ? codec.empty() : codec.decode(envelope.payload.value)

  return {
    service,
    ...(envelope.messageType !== '' && { kind: envelope.messageType }),
    data
  }
}

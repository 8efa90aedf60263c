/**
 * Wire-level envelope types.
 *
 * The envelope is the routing wrapper around every frame exchanged with the
 * supervising daemon. Only the fields the connector reads or writes are
 * modelled here.
 */

/** Service name of the daemon itself. */
export const SYSTEM_SERVICE = 'system' as const

/** Message type of the liveness signal. */
export const HEARTBEAT_MESSAGE_TYPE = 'Heartbeat' as const

/** Message type of the one-time startup report. */
export const STARTUP_MESSAGE_TYPE = 'StartupData' as const

/** Prefix of protobuf `Any` type URLs. */
export const TYPE_URL_PREFIX = 'type.googleapis.com' as const

/**
 * Opaque payload carried by an envelope.
 */
export interface EnvelopePayload {
  /** Schema identifier of `value`; empty when the sender gave none */
  readonly typeUrl: string
  /** Encoded payload bytes */
  readonly value: Uint8Array
}

/**
 * The routing wrapper around one frame.
 */
export interface Envelope {
  /** Free-form tag interpreted by the receiving service; may be empty */
  readonly messageType: string
  /** Service the envelope is addressed to; required on outbound envelopes */
  readonly destinationService: string
  /** Service that sent the envelope; required on inbound envelopes */
  readonly sourceService?: string
  readonly payload?: EnvelopePayload
}

/**
 * Type URL for a protobuf message given its fully-qualified name.
 *
 * @example
 * typeUrlOf('fleetspeak.channel.StartupData')
 * // 'type.googleapis.com/fleetspeak.channel.StartupData'
 */
export function typeUrlOf(fullName: string): string {
  const name = fullName.startsWith('.') ? fullName.slice(1) : fullName
  return `${TYPE_URL_PREFIX}/${name}`
}

/**
 * Error taxonomy for the connector.
 *
 * Channel faults (`IoError`, `FramingError`) poison a Connection. Per-call
 * faults (`EncodeError`, `DecodeError`, `MalformedMessageError`) do not: the
 * frame boundary is still known, only the message itself was unusable.
 *
 * @module
 */

/**
 * Base class for every fault raised by the connector.
 */
export class ConnectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message)
    this.name = 'ConnectorError'
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

/**
 * Why a channel handle could not be taken from the environment.
 */
export type ChannelAcquisitionReason =
  | 'not_specified'
  | 'not_parsable'
  | 'invalid_handle'
  | 'unsupported_platform'

/**
 * Thrown at startup when a channel handle is missing or unusable.
 * No Connection exists when this is raised.
 */
export class ChannelAcquisitionError extends ConnectorError {
  constructor(
    public readonly variable: string,
    public readonly reason: ChannelAcquisitionReason,
    detail?: string,
    options?: { cause?: unknown }
  ) {
    super(describeAcquisition(variable, reason, detail), options)
    this.name = 'ChannelAcquisitionError'
  }
}

function describeAcquisition(
  variable: string,
  reason: ChannelAcquisitionReason,
  detail: string | undefined
): string {
  switch (reason) {
    case 'not_specified':
      return `communication channel not specified: ${variable} is not set`
    case 'not_parsable':
      return `invalid communication channel value in ${variable}: ${JSON.stringify(detail ?? '')}`
    case 'invalid_handle':
      return `invalid communication channel handle in ${variable}: ${detail ?? 'unknown'}`
    case 'unsupported_platform':
      return `communication channel in ${variable} cannot be opened on ${detail ?? 'this platform'}`
  }
}

/**
 * An underlying read or write failed.
 */
export class IoError extends ConnectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'IoError'
  }
}

/**
 * The stream ended, closed or was destroyed before an operation completed.
 */
export class StreamClosedError extends IoError {
  constructor(
    public readonly reason: 'destroyed' | 'ended' | 'close' | 'finish',
    detail?: string
  ) {
    super(
      detail === undefined
        ? `Channel stream unavailable: ${reason}`
        : `Channel stream unavailable: ${reason} (${detail})`
    )
    this.name = 'StreamClosedError'
  }
}

/**
 * Protocol-integrity violation on the byte stream. Never retried.
 */
export class FramingError extends ConnectorError {
  constructor(message: string) {
    super(message)
    this.name = 'FramingError'
  }
}

/**
 * The 4-byte magic read from the channel did not match the expected constant.
 */
export class MagicMismatchError extends FramingError {
  constructor(
    public readonly magic: number,
    public readonly expected: number
  ) {
    super(`invalid magic 0x${hex32(magic)} (expected 0x${hex32(expected)})`)
    this.name = 'MagicMismatchError'
  }
}

/**
 * A value could not be encoded for the wire.
 */
export class EncodeError extends ConnectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EncodeError'
  }
}

/**
 * An encoded envelope does not fit the frame's length field.
 */
export class FrameSizeError extends EncodeError {
  constructor(
    public readonly payloadSize: number,
    public readonly maxPayloadSize: number
  ) {
    super(`Payload size ${payloadSize} exceeds maximum ${maxPayloadSize}`)
    this.name = 'FrameSizeError'
  }
}

/**
 * Bytes read from the channel do not parse under the expected schema.
 */
export class DecodeError extends ConnectorError {
  constructor(
    public readonly target: string,
    options?: { cause?: unknown }
  ) {
    super(
      options?.cause === undefined
        ? `failed to decode ${target}`
        : `failed to decode ${target}: ${errorMessage(options.cause)}`,
      options
    )
    this.name = 'DecodeError'
  }
}

/**
 * A message parsed correctly but violates an application invariant.
 */
export class MalformedMessageError extends ConnectorError {
  constructor(detail: string) {
    super(`malformed message: ${detail}`)
    this.name = 'MalformedMessageError'
  }
}

/**
 * Operation attempted on a Connection that already observed a channel fault.
 * `cause` is the first fault.
 */
export class ConnectionPoisonedError extends ConnectorError {
  constructor(originalCause: unknown) {
    super(`Connection is poisoned: ${errorMessage(originalCause)}`, { cause: originalCause })
    this.name = 'ConnectionPoisonedError'
  }
}

/**
 * Operation attempted on a Connection after close().
 */
export class ConnectionClosedError extends ConnectorError {
  constructor() {
    super('Connection is closed')
    this.name = 'ConnectionClosedError'
  }
}

/**
 * True for faults after which the channel position can no longer be trusted.
 */
export function isChannelFault(err: unknown): boolean {
  return err instanceof IoError || err instanceof FramingError
}

/**
 * True for faults scoped to a single call.
 */
export function isPerCallFault(err: unknown): boolean {
  return (
    err instanceof EncodeError || err instanceof DecodeError || err instanceof MalformedMessageError
  )
}

/**
 * Extract a printable message from an unknown throwable.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

function hex32(value: number): string {
  return (value >>> 0).toString(16).padStart(8, '0')
}

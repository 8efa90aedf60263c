/**
 * Envelope schema codec.
 *
 * The daemon's protobuf definitions ship as `.proto` files next to the
 * package and are loaded with protobufjs on first use; no code is generated.
 *
 * @module
 */
import { fileURLToPath } from 'node:url'
import {
  DecodeError,
  EncodeError,
  type Envelope,
  type EnvelopePayload,
  errorMessage,
  typeUrlOf
} from '@commslink/sdk'
import type { Root, Type } from 'protobufjs'
import protobuf from 'protobufjs'

/** Directory holding the `.proto` sources, relative to this module. */
const PROTO_DIR = new URL('../../proto/', import.meta.url)

const PROTO_FILES = ['fleetspeak/common.proto', 'fleetspeak_channel/channel.proto'] as const

/** Fully-qualified name of the envelope message. */
export const ENVELOPE_MESSAGE = 'fleetspeak.Message'

/** Fully-qualified name of the startup report message. */
export const STARTUP_DATA_MESSAGE = 'fleetspeak.channel.StartupData'

/** `data.type_url` of StartupData envelopes. */
export const STARTUP_DATA_TYPE_URL = typeUrlOf(STARTUP_DATA_MESSAGE)

/**
 * Decoded StartupData report.
 */
export interface StartupData {
  readonly pid: number
  readonly version: string
}

interface Schema {
  readonly envelope: Type
  readonly startupData: Type
}

let schema: Schema | undefined

function loadSchema(): Schema {
  if (schema === undefined) {
    const root: Root = new protobuf.Root()
    root.loadSync(
      PROTO_FILES.map((file) => fileURLToPath(new URL(file, PROTO_DIR))),
      { keepCase: false }
    )
    root.resolveAll()
    schema = {
      envelope: root.lookupType(ENVELOPE_MESSAGE),
      startupData: root.lookupType(STARTUP_DATA_MESSAGE)
    }
  }
  return schema
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/**
 * Serialize an envelope as a `fleetspeak.Message`.
 *
 * @throws EncodeError if the destination service is empty or protobuf encoding fails
 */
export function encodeEnvelope(envelope: Envelope): Uint8Array {
  if (envelope.destinationService === '') {
    throw new EncodeError('envelope has no destination service')
  }

  const { envelope: type } = loadSchema()
  try {
    const message = type.fromObject({
      messageType: envelope.messageType,
      destination: { serviceName: envelope.destinationService },
      ...(envelope.sourceService !== undefined && {
        source: { serviceName: envelope.sourceService }
      }),
      ...(envelope.payload !== undefined && {
        // google.protobuf.Any comes from protobufjs' bundled definitions, which keep snake_case
        data: { type_url: envelope.payload.typeUrl, value: envelope.payload.value }
      })
    })
    return type.encode(message).finish()
  } catch (err) {
    throw new EncodeError(`envelope encoding failed: ${errorMessage(err)}`, { cause: err })
  }
}

/**
 * Parse `fleetspeak.Message` bytes into an envelope.
 *
 * Absent submessages stay absent: a message without `source` yields an
 * envelope without `sourceService`, one without `data` has no `payload`.
 *
 * @throws DecodeError if the bytes are not a valid message
 */
export function decodeEnvelope(bytes: Uint8Array): Envelope {
  const { envelope: type } = loadSchema()

  let object: Record<string, unknown>
  try {
    object = type.toObject(type.decode(bytes), { defaults: false, longs: String })
  } catch (err) {
    throw new DecodeError('envelope', { cause: err })
  }

  const destination = isRecord(object.destination) ? object.destination : {}
  const source = isRecord(object.source) ? object.source : undefined
  const sourceService = source === undefined ? undefined : optionalString(source.serviceName)

  let payload: EnvelopePayload | undefined
  if (isRecord(object.data)) {
    const value = object.data.value
    payload = {
      typeUrl: optionalString(object.data.type_url) ?? '',
      value: value instanceof Uint8Array ? value : new Uint8Array(0)
    }
  }

  return {
    messageType: optionalString(object.messageType) ?? '',
    destinationService: optionalString(destination.serviceName) ?? '',
    ...(sourceService !== undefined && { sourceService }),
    ...(payload !== undefined && { payload })
  }
}

/**
 * Serialize a `fleetspeak.channel.StartupData` report.
 */
export function encodeStartupData(data: StartupData): Uint8Array {
  const { startupData: type } = loadSchema()
  try {
    return type.encode(type.fromObject({ pid: data.pid, version: data.version })).finish()
  } catch (err) {
    throw new EncodeError(`startup data encoding failed: ${errorMessage(err)}`, { cause: err })
  }
}

/**
 * Parse `fleetspeak.channel.StartupData` bytes.
 *
 * @throws DecodeError if the bytes are not a valid report
 */
export function decodeStartupData(bytes: Uint8Array): StartupData {
  const { startupData: type } = loadSchema()
  let object: Record<string, unknown>
  try {
    object = type.toObject(type.decode(bytes), { defaults: true, longs: Number })
  } catch (err) {
    throw new DecodeError(STARTUP_DATA_MESSAGE, { cause: err })
  }
  return {
    pid: typeof object.pid === 'number' ? object.pid : 0,
    version: optionalString(object.version) ?? ''
  }
}

/**
 * Channel framing.
 *
 * Frame structure:
 * - 4-byte little-endian length prefix (unsigned)
 * - payload bytes (protobuf-encoded `fleetspeak.Message`)
 * - 4-byte little-endian magic, always MAGIC
 *
 * The handshake exchanges a bare magic with no length or payload.
 *
 * Constraints:
 * - Maximum payload size: 2^32 - 1 bytes (the range of the length prefix),
 *   optionally lowered per connection
 * - The trailing magic of every frame is checked on read; a mismatch means
 *   the stream position can no longer be trusted
 *
 * @module
 * @remarks Node.js only. Uses Buffer for transport efficiency.
 */
import { type Envelope, FrameSizeError, FramingError, MagicMismatchError } from '@commslink/sdk'
import { decodeEnvelope, encodeEnvelope } from '../proto/schema.js'

/**
 * Magic number terminating every frame and exchanged in the handshake.
 */
export const MAGIC = 0xf1ee1001

/**
 * Length prefix size in bytes.
 */
export const LENGTH_PREFIX_SIZE = 4

/**
 * Magic trailer size in bytes.
 */
export const MAGIC_SIZE = 4

/**
 * Largest payload the length prefix can describe.
 */
export const MAX_PAYLOAD_SIZE = 0xffffffff

/**
 * Source of exact-length reads. Implemented by ByteReader.
 */
export interface ByteSource {
  readExact(size: number): Promise<Buffer>
}

/**
 * Encode the bare magic number.
 */
export function encodeMagic(): Buffer {
  const magic = Buffer.allocUnsafe(MAGIC_SIZE)
  magic.writeUInt32LE(MAGIC, 0)
  return magic
}

/**
 * Read four bytes and check them against MAGIC.
 *
 * @throws MagicMismatchError if the bytes read differ from MAGIC
 * @throws StreamClosedError if the stream ends first
 */
export async function readMagic(source: ByteSource): Promise<void> {
  const bytes = await source.readExact(MAGIC_SIZE)
  const magic = bytes.readUInt32LE(0)
  if (magic !== MAGIC) {
    throw new MagicMismatchError(magic, MAGIC)
  }
}

/**
 * Wrap payload bytes into a frame: length prefix + payload + magic.
 *
 * @throws FrameSizeError if payload exceeds maxPayloadSize
 */
export function encodeFrame(
  payload: Uint8Array,
  maxPayloadSize: number = MAX_PAYLOAD_SIZE
): Buffer {
  const limit = Math.min(maxPayloadSize, MAX_PAYLOAD_SIZE)
  if (payload.length > limit) {
    throw new FrameSizeError(payload.length, limit)
  }

  const frame = Buffer.allocUnsafe(LENGTH_PREFIX_SIZE + payload.length + MAGIC_SIZE)
  frame.writeUInt32LE(payload.length, 0)
  frame.set(payload, LENGTH_PREFIX_SIZE)
  frame.writeUInt32LE(MAGIC, LENGTH_PREFIX_SIZE + payload.length)

  return frame
}

/**
 * Encode an envelope into a complete frame.
 *
 * @throws EncodeError if the envelope cannot be serialized
 * @throws FrameSizeError if the serialized envelope exceeds maxPayloadSize
 */
export function encodeEnvelopeFrame(
  envelope: Envelope,
  maxPayloadSize: number = MAX_PAYLOAD_SIZE
): Buffer {
  return encodeFrame(encodeEnvelope(envelope), maxPayloadSize)
}

/**
 * Read one frame and decode its envelope.
 *
 * Reads the length, the payload and the magic in that order, and only then
 * parses the payload, so a DecodeError leaves the stream at the next frame
 * boundary.
 *
 * @throws StreamClosedError if the stream ends mid-frame
 * @throws FramingError if the length exceeds maxPayloadSize
 * @throws MagicMismatchError if the trailing magic is wrong
 * @throws DecodeError if the payload is not a valid envelope
 */
export async function decodeFrame(
  source: ByteSource,
  maxPayloadSize: number = MAX_PAYLOAD_SIZE
): Promise<Envelope> {
  const prefix = await source.readExact(LENGTH_PREFIX_SIZE)
  const length = prefix.readUInt32LE(0)
  if (length > maxPayloadSize) {
    throw new FramingError(`frame length ${length} exceeds maximum ${maxPayloadSize}`)
  }

  const payload = await source.readExact(length)
  await readMagic(source)

  return decodeEnvelope(payload)
}

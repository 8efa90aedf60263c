/**
 * Payload codecs: how a Packet's `data` becomes envelope bytes and back.
 *
 * The payload schema belongs to the services exchanging messages, not to the
 * connector. A codec bundles the three things the connector needs from it:
 * encode, decode and the default value used when an envelope has no payload.
 *
 * @module
 */
import { decode as msgpackDecode, encode as msgpackEncode } from '@msgpack/msgpack'
import { DecodeError, EncodeError, errorMessage } from './errors.js'

/**
 * Encodes and decodes one payload type.
 */
export interface PayloadCodec<T> {
  /** Written to `data.type_url` on send; omitted when undefined */
  readonly typeUrl?: string
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
  /** Value returned by receive() for an envelope without payload */
  empty(): T
}

/**
 * Minimal surface of a protobuf message type.
 *
 * Matches protobufjs reflection types (`Type`) as well as statically
 * generated message classes, both of which expose `encode(...).finish()`
 * and `decode(bytes)`.
 */
export interface MessageFns<T> {
  encode(message: T): { finish(): Uint8Array }
  decode(input: Uint8Array): T
}

/**
 * Raw bytes, passed through unchanged.
 */
export const bytesCodec: PayloadCodec<Uint8Array> = {
  encode(value: Uint8Array): Uint8Array {
    return value
  },
  decode(bytes: Uint8Array): Uint8Array {
    return bytes
  },
  empty(): Uint8Array {
    return new Uint8Array(0)
  }
}

/**
 * Codec for a protobuf message type.
 *
 * The empty value is the message decoded from zero bytes, i.e. the message
 * with every field at its default.
 */
export function protobufCodec<T>(
  fns: MessageFns<T>,
  options: { readonly typeUrl?: string } = {}
): PayloadCodec<T> {
  return {
    typeUrl: options.typeUrl,
    encode(value: T): Uint8Array {
      try {
        return fns.encode(value).finish()
      } catch (err) {
        throw new EncodeError(`protobuf encoding failed: ${errorMessage(err)}`, { cause: err })
      }
    },
    decode(bytes: Uint8Array): T {
      try {
        return fns.decode(bytes)
      } catch (err) {
        throw new DecodeError(options.typeUrl ?? 'protobuf payload', { cause: err })
      }
    },
    empty(): T {
      return fns.decode(new Uint8Array(0))
    }
  }
}

/**
 * Options for {@link msgpackCodec}.
 */
export type MsgpackCodecOptions<T> = {
  /** Runtime check applied to every decoded value */
  readonly is: (value: unknown) => value is T
  /** Value used for envelopes without payload */
  readonly empty: () => T
  readonly typeUrl?: string
}

/**
 * Codec for msgpack-encoded payloads.
 *
 * Decoded values must pass `is`, otherwise decoding fails with DecodeError.
 */
export function msgpackCodec<T>(options: MsgpackCodecOptions<T>): PayloadCodec<T> {
  const target = options.typeUrl ?? 'msgpack payload'
  return {
    typeUrl: options.typeUrl,
    encode(value: T): Uint8Array {
      try {
        return msgpackEncode(value)
      } catch (err) {
        throw new EncodeError(`msgpack encoding failed: ${errorMessage(err)}`, { cause: err })
      }
    },
    decode(bytes: Uint8Array): T {
      let value: unknown
      try {
        value = msgpackDecode(bytes)
      } catch (err) {
        throw new DecodeError(target, { cause: err })
      }
      if (!options.is(value)) {
        throw new DecodeError(target, { cause: new TypeError('value failed type check') })
      }
      return value
    },
    empty: options.empty
  }
}

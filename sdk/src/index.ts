// Envelope types (from sdk/src/types/envelope.ts)
export type { Envelope, EnvelopePayload } from './types/envelope.js'
export {
  HEARTBEAT_MESSAGE_TYPE,
  STARTUP_MESSAGE_TYPE,
  SYSTEM_SERVICE,
  TYPE_URL_PREFIX,
  typeUrlOf
} from './types/envelope.js'
// Payload codecs
export type { MessageFns, MsgpackCodecOptions, PayloadCodec } from './codec.js'
export { bytesCodec, msgpackCodec, protobufCodec } from './codec.js'
// Packet model
export type { Packet } from './packet.js'
export { packetFromEnvelope, packetToEnvelope } from './packet.js'
// Errors (public — callers catch these)
export type { ChannelAcquisitionReason } from './errors.js'
export {
  ChannelAcquisitionError,
  ConnectionClosedError,
  ConnectionPoisonedError,
  ConnectorError,
  DecodeError,
  EncodeError,
  errorMessage,
  FrameSizeError,
  FramingError,
  IoError,
  isChannelFault,
  isPerCallFault,
  MagicMismatchError,
  MalformedMessageError,
  StreamClosedError
} from './errors.js'

/**
 * Connector between a service process and its supervising daemon.
 *
 * Typical use:
 *
 * ```ts
 * const connection = await connectFromEnv()
 * await connection.announceStartup('1.0.0')
 * const packet = await connection.collect(bytesCodec, 1000)
 * await connection.send({ service: packet.service, data: packet.data }, bytesCodec)
 * ```
 *
 * @module
 */
export type { ChannelPair } from './channels.js'
export { channelsFromEnv, parseDescriptor } from './channels.js'
export type { ConnectorOptions, ResolvedOptions } from './config.js'
export { INBOUND_CHANNEL_ENV, OUTBOUND_CHANNEL_ENV, resolveOptions } from './config.js'
export type { ConnectionState } from './connection.js'
export { Connection, connect, connectFromEnv } from './connection.js'
export type { HeartbeatTarget, PacketSource } from './heartbeat.js'
export { collect, HeartbeatThrottle, MAX_HEARTBEAT_RATE_MS } from './heartbeat.js'
export { ByteReader } from './ipc/byte-reader.js'
export { writeFlushed } from './ipc/byte-writer.js'
export type { ByteSource } from './ipc/frame.js'
export {
  decodeFrame,
  encodeEnvelopeFrame,
  encodeFrame,
  encodeMagic,
  LENGTH_PREFIX_SIZE,
  MAGIC,
  MAGIC_SIZE,
  MAX_PAYLOAD_SIZE,
  readMagic
} from './ipc/frame.js'
export { handshake } from './ipc/handshake.js'
export { SerialLane } from './ipc/serial-lane.js'
export type { Logger } from './log.js'
export { createStderrLogger, isDebugEnabled, LOG_NAMESPACE, silentLogger } from './log.js'
export type { StartupData } from './proto/schema.js'
export {
  decodeEnvelope,
  decodeStartupData,
  ENVELOPE_MESSAGE,
  encodeEnvelope,
  encodeStartupData,
  STARTUP_DATA_MESSAGE,
  STARTUP_DATA_TYPE_URL
} from './proto/schema.js'
// Re-export the shared model so callers need a single import
export * from '@commslink/sdk'

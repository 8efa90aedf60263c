/**
 * Connection: the only way to use the channel pair.
 *
 * Responsibilities:
 * - Run the handshake before anything else touches the channels
 * - Serialize writes (heartbeat, startup, send) on the outbound lane
 * - Serialize reads (receive) on the inbound lane, independently of writes
 * - Escalate channel faults by poisoning the connection
 *
 * State machine:
 *
 *   connect() ──handshake ok──▶ ready ──channel fault──▶ poisoned (terminal)
 *                                 │
 *                                 └──close()──▶ closed (terminal)
 *
 * A failed handshake yields no Connection at all.
 *
 * Fault precedence:
 * 1. IoError / FramingError, or any error outside the taxonomy → poisoned;
 *    the first fault is kept and reported by every later call
 * 2. EncodeError / DecodeError / MalformedMessageError → the call fails,
 *    the connection stays ready
 *
 * @module
 */
import {
  ConnectionClosedError,
  ConnectionPoisonedError,
  type Envelope,
  errorMessage,
  HEARTBEAT_MESSAGE_TYPE,
  IoError,
  isPerCallFault,
  type Packet,
  type PayloadCodec,
  packetFromEnvelope,
  packetToEnvelope,
  STARTUP_MESSAGE_TYPE,
  SYSTEM_SERVICE
} from '@commslink/sdk'
import { type ChannelPair, channelsFromEnv } from './channels.js'
import { type ConnectorOptions, type ResolvedOptions, resolveOptions } from './config.js'
import { collect, HeartbeatThrottle } from './heartbeat.js'
import { ByteReader } from './ipc/byte-reader.js'
import { writeFlushed } from './ipc/byte-writer.js'
import { decodeFrame, encodeEnvelopeFrame } from './ipc/frame.js'
import { handshake } from './ipc/handshake.js'
import { SerialLane } from './ipc/serial-lane.js'
import { encodeStartupData, STARTUP_DATA_TYPE_URL } from './proto/schema.js'

export type ConnectionState = 'ready' | 'poisoned' | 'closed'

function typeOf(envelope: Envelope): string {
  return envelope.messageType === '' ? '<untyped>' : envelope.messageType
}

function describeEnvelope(envelope: Envelope): string {
  return `${typeOf(envelope)} to '${envelope.destinationService}'`
}

export class Connection {
  private currentState: ConnectionState = 'ready'
  private firstFault: unknown = null
  private readonly reader: ByteReader
  private readonly inboundLane = new SerialLane()
  private readonly outboundLane = new SerialLane()
  private throttle: HeartbeatThrottle | null = null

  private constructor(
    private readonly channels: ChannelPair,
    private readonly options: ResolvedOptions
  ) {
    this.reader = new ByteReader(channels.inbound)
    this.reader.start()
    channels.inbound.on('error', this.onInboundError)
    channels.outbound.on('error', this.onOutboundError)
  }

  /**
   * Take ownership of a channel pair and run the handshake.
   *
   * @throws MagicMismatchError if the peer answers with the wrong magic
   * @throws IoError / StreamClosedError if a channel fails during the handshake
   * @throws RangeError for invalid options
   */
  static async connect(channels: ChannelPair, options: ConnectorOptions = {}): Promise<Connection> {
    const connection = new Connection(channels, resolveOptions(options))
    try {
      await handshake(connection.reader, channels.outbound)
    } catch (err) {
      connection.detach()
      throw err
    }
    connection.options.logger.info('handshake successful')
    return connection
  }

  /**
   * Current lifecycle state.
   */
  get state(): ConnectionState {
    return this.currentState
  }

  /**
   * The fault that poisoned this connection, or null.
   */
  get fault(): unknown {
    return this.firstFault
  }

  /**
   * Send one heartbeat frame to the daemon. No response is expected.
   */
  heartbeat(): Promise<void> {
    return this.writeEnvelope(() => ({
      messageType: HEARTBEAT_MESSAGE_TYPE,
      destinationService: SYSTEM_SERVICE
    }))
  }

  /**
   * Report this process to the daemon. Call once, early: the daemon may
   * kill services that do not report in time.
   *
   * @param version - Self-reported service version
   */
  announceStartup(version: string): Promise<void> {
    return this.writeEnvelope(() => ({
      messageType: STARTUP_MESSAGE_TYPE,
      destinationService: SYSTEM_SERVICE,
      payload: {
        typeUrl: STARTUP_DATA_TYPE_URL,
        value: encodeStartupData({ pid: process.pid, version })
      }
    }))
  }

  /**
   * Send a packet to `packet.service`.
   *
   * @throws EncodeError if the packet cannot be encoded (connection stays ready)
   */
  send<T>(packet: Packet<T>, codec: PayloadCodec<T>): Promise<void> {
    return this.writeEnvelope(() => packetToEnvelope(packet, codec))
  }

  /**
   * Wait for the next packet.
   *
   * @throws MalformedMessageError if the envelope has no source service
   * @throws DecodeError if the envelope or payload does not decode
   */
  async receive<T>(codec: PayloadCodec<T>): Promise<Packet<T>> {
    this.assertUsable()
    const envelope = await this.inboundLane.run(() => {
      this.assertUsable()
      return this.guard(() => decodeFrame(this.reader, this.options.maxPayloadSize))
    })

    const source = envelope.sourceService ?? '<unknown>'
    if (envelope.payload === undefined) {
      this.options.logger.warn(`empty message from '${source}'`)
    }
    this.options.logger.debug(`received ${typeOf(envelope)} from '${source}'`)

    return packetFromEnvelope(envelope, codec)
  }

  /**
   * Wait for the next packet while heartbeating every `rateMs` milliseconds.
   */
  collect<T>(codec: PayloadCodec<T>, rateMs: number): Promise<Packet<T>> {
    return collect(this, codec, rateMs, this.options.logger)
  }

  /**
   * Heartbeat unless a throttled heartbeat was sent less than `rateMs` ago.
   *
   * @returns true if a frame was sent
   */
  heartbeatWithThrottle(rateMs: number): Promise<boolean> {
    this.throttle ??= new HeartbeatThrottle(this, this.options.clock)
    return this.throttle.beat(rateMs)
  }

  /**
   * Stop reading, end the outbound stream and destroy the inbound one.
   * A ready connection becomes closed; a poisoned one stays poisoned.
   */
  close(): void {
    if (this.currentState === 'ready') {
      this.currentState = 'closed'
    }
    this.reader.stop()
    if (!this.channels.outbound.writableEnded && !this.channels.outbound.destroyed) {
      this.channels.outbound.end()
    }
    if (!this.channels.inbound.destroyed) {
      this.channels.inbound.destroy()
    }
  }

  /**
   * Build, encode and write one envelope. `build` runs only on a usable
   * connection; encoding happens outside the lane.
   */
  private async writeEnvelope(build: () => Envelope): Promise<void> {
    this.assertUsable()
    const envelope = build()
    const frame = encodeEnvelopeFrame(envelope, this.options.maxPayloadSize)
    await this.outboundLane.run(async () => {
      this.assertUsable()
      await this.guard(() => writeFlushed(this.channels.outbound, frame))
    })
    this.options.logger.debug(`sent ${describeEnvelope(envelope)} (${frame.length} bytes)`)
  }

  /**
   * Run a channel operation, poisoning the connection on anything but a
   * per-call fault.
   */
  private async guard<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op()
    } catch (err) {
      if (!isPerCallFault(err)) {
        this.poison(err)
      }
      throw err
    }
  }

  private assertUsable(): void {
    if (this.currentState === 'poisoned') {
      throw new ConnectionPoisonedError(this.firstFault)
    }
    if (this.currentState === 'closed') {
      throw new ConnectionClosedError()
    }
  }

  /** First fault wins. */
  private poison(fault: unknown): void {
    if (this.currentState !== 'ready') return
    this.currentState = 'poisoned'
    this.firstFault = fault
    this.options.logger.warn(`connection poisoned: ${errorMessage(fault)}`)
  }

  /**
   * Stream errors while an operation is in flight on that side are reported
   * by the operation itself; only idle errors poison from here.
   */
  private onChannelError(lane: SerialLane, err: Error): void {
    if (lane.depth > 0) return
    this.poison(new IoError(`channel error: ${err.message}`, { cause: err }))
  }

  private readonly onInboundError = (err: Error): void => {
    this.onChannelError(this.inboundLane, err)
  }

  private readonly onOutboundError = (err: Error): void => {
    this.onChannelError(this.outboundLane, err)
  }

  /** Undo the constructor's side effects after a failed handshake. */
  private detach(): void {
    this.reader.stop()
    this.channels.inbound.off('error', this.onInboundError)
    this.channels.outbound.off('error', this.onOutboundError)
  }
}

/**
 * Take ownership of a channel pair and run the handshake.
 * The resolved Connection is the process-wide context for all channel use.
 */
export function connect(
  channels: ChannelPair,
  options: ConnectorOptions = {}
): Promise<Connection> {
  return Connection.connect(channels, options)
}

/**
 * Acquire the channel pair from the environment, then connect.
 *
 * @throws ChannelAcquisitionError if the environment does not name usable channels
 */
export async function connectFromEnv(
  options: ConnectorOptions = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<Connection> {
  return Connection.connect(channelsFromEnv(env), options)
}

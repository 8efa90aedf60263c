/**
 * Connector options and their resolution.
 *
 * @module
 */
import { performance } from 'node:perf_hooks'
import { MAX_PAYLOAD_SIZE } from './ipc/frame.js'
import { createStderrLogger, type Logger } from './log.js'

/** Environment variable naming the inbound channel descriptor. */
export const INBOUND_CHANNEL_ENV = 'FLEETSPEAK_COMMS_CHANNEL_INFD'

/** Environment variable naming the outbound channel descriptor. */
export const OUTBOUND_CHANNEL_ENV = 'FLEETSPEAK_COMMS_CHANNEL_OUTFD'

/**
 * Options accepted by connect().
 */
export interface ConnectorOptions {
  /** Diagnostics sink (defaults to stderr) */
  readonly logger?: Logger
  /**
   * Largest envelope accepted in either direction, in bytes.
   * Defaults to the range of the length prefix.
   */
  readonly maxPayloadSize?: number
  /** Monotonic milliseconds, used by the heartbeat throttle */
  readonly clock?: () => number
}

/**
 * Options with every default applied.
 */
export interface ResolvedOptions {
  readonly logger: Logger
  readonly maxPayloadSize: number
  readonly clock: () => number
}

/**
 * Apply defaults and validate option values.
 *
 * @throws RangeError if maxPayloadSize is not an integer in [1, 2^32 - 1]
 */
export function resolveOptions(options: ConnectorOptions = {}): ResolvedOptions {
  const maxPayloadSize = options.maxPayloadSize ?? MAX_PAYLOAD_SIZE
  if (
    !Number.isInteger(maxPayloadSize) ||
    maxPayloadSize < 1 ||
    maxPayloadSize > MAX_PAYLOAD_SIZE
  ) {
    throw new RangeError(
      `maxPayloadSize must be an integer between 1 and ${MAX_PAYLOAD_SIZE}, got ${maxPayloadSize}`
    )
  }

  return {
    logger: options.logger ?? createStderrLogger(),
    maxPayloadSize,
    clock: options.clock ?? (() => performance.now())
  }
}

/**
 * Heartbeat scheduling.
 *
 * The daemon restarts services that stop heartbeating. A process waiting for
 * its next message sits in receive() for as long as the daemon keeps it
 * waiting, so collect() keeps heartbeating in the background until the
 * message arrives. HeartbeatThrottle is the simpler policy for callers that
 * run their own loop.
 *
 * @module
 */
import { setTimeout as sleep } from 'node:timers/promises'
import { errorMessage, type Packet, type PayloadCodec } from '@commslink/sdk'
import { SerialLane } from './ipc/serial-lane.js'
import { type Logger, silentLogger } from './log.js'

/**
 * Anything that can emit one heartbeat frame.
 */
export interface HeartbeatTarget {
  heartbeat(): Promise<void>
}

/**
 * Anything that can receive one packet.
 */
export interface PacketSource {
  receive<T>(codec: PayloadCodec<T>): Promise<Packet<T>>
}

/** Longest delay a Node timer honours; longer ones fire after 1 ms. */
export const MAX_HEARTBEAT_RATE_MS = 2 ** 31 - 1

function assertRate(rateMs: number): void {
  if (!Number.isFinite(rateMs) || rateMs <= 0 || rateMs > MAX_HEARTBEAT_RATE_MS) {
    throw new RangeError(
      `Heartbeat rate must be a number in (0, ${MAX_HEARTBEAT_RATE_MS}] ms, got ${rateMs}`
    )
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError'
}

/**
 * Background loop: heartbeat, sleep, repeat until aborted.
 *
 * The abort check happens at the top of each iteration; the sleep is
 * interrupted by the abort. A failed heartbeat ends the loop without
 * propagating: the foreground receive() reports the channel fault.
 * Never rejects.
 */
async function heartbeatLoop(
  target: HeartbeatTarget,
  rateMs: number,
  signal: AbortSignal,
  logger: Logger
): Promise<void> {
  while (!signal.aborted) {
    try {
      await target.heartbeat()
    } catch (err) {
      logger.warn(`heartbeat failed, stopping background heartbeats: ${errorMessage(err)}`)
      return
    }

    try {
      await sleep(rateMs, undefined, { signal })
    } catch (err) {
      if (isAbortError(err)) return
      logger.warn(`heartbeat timer failed: ${errorMessage(err)}`)
      return
    }
  }
}

/**
 * Receive one packet while heartbeating every `rateMs` in the background.
 *
 * The first heartbeat is sent immediately. Once receive() settles, either
 * way, the background loop is cancelled and awaited, so no heartbeat is
 * written after collect() settles.
 *
 * @throws RangeError if rateMs is not in (0, MAX_HEARTBEAT_RATE_MS]
 * @throws whatever receive() throws
 */
export async function collect<T>(
  connection: HeartbeatTarget & PacketSource,
  codec: PayloadCodec<T>,
  rateMs: number,
  logger: Logger = silentLogger
): Promise<Packet<T>> {
  assertRate(rateMs)

  const controller = new AbortController()
  const heartbeats = heartbeatLoop(connection, rateMs, controller.signal, logger)
  try {
    return await connection.receive(codec)
  } finally {
    controller.abort()
    await heartbeats
  }
}

/**
 * Rate-limited heartbeats.
 *
 * beat(rate) sends a heartbeat unless the last successful one was sent less
 * than `rate` milliseconds ago. Calls are serialized, so concurrent callers
 * observe each other's timestamp.
 */
export class HeartbeatThrottle {
  private lastSent: number | null = null
  private readonly lane = new SerialLane()

  constructor(
    private readonly target: HeartbeatTarget,
    private readonly clock: () => number
  ) {}

  /**
   * Heartbeat unless one was sent within the last `rateMs` milliseconds.
   *
   * @returns true if a frame was sent
   * @throws RangeError if rateMs is not in (0, MAX_HEARTBEAT_RATE_MS]
   */
  async beat(rateMs: number): Promise<boolean> {
    assertRate(rateMs)
    return this.lane.run(async () => {
      if (this.lastSent !== null && this.clock() - this.lastSent < rateMs) {
        return false
      }
      await this.target.heartbeat()
      this.lastSent = this.clock()
      return true
    })
  }

  /**
   * Clock reading of the last successful throttled heartbeat, if any.
   */
  get lastSentAt(): number | null {
    return this.lastSent
  }
}

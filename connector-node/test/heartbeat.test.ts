import { bytesCodec, type Packet, type PayloadCodec } from '@commslink/sdk'
import fc from 'fast-check'
import { describe, expect, it, vi } from 'vitest'
import { collect, HeartbeatThrottle, MAX_HEARTBEAT_RATE_MS } from '../src/heartbeat.js'
import { RecordingLogger } from './_harness/daemon.js'

/**
 * Connection stand-in: counts heartbeats, hands out packets on demand.
 */
class FakeConnection {
  heartbeats = 0
  failHeartbeats: Error | null = null
  private settle: { resolve: () => void; reject: (err: Error) => void } | null = null

  heartbeat(): Promise<void> {
    if (this.failHeartbeats !== null) return Promise.reject(this.failHeartbeats)
    this.heartbeats += 1
    return Promise.resolve()
  }

  receive<T>(codec: PayloadCodec<T>): Promise<Packet<T>> {
    return new Promise((resolve, reject) => {
      this.settle = {
        resolve: () => resolve({ service: 'server', data: codec.empty() }),
        reject
      }
    })
  }

  deliver(): void {
    this.settle?.resolve()
  }

  fail(err: Error): void {
    this.settle?.reject(err)
  }
}

describe('collect', () => {
  it('sends the first heartbeat immediately', async () => {
    const connection = new FakeConnection()

    const pending = collect(connection, bytesCodec, 1000, new RecordingLogger())
    expect(connection.heartbeats).toBe(1)

    connection.deliver()
    await pending
  })

  it('keeps heartbeating while receive waits', async () => {
    const connection = new FakeConnection()

    const pending = collect(connection, bytesCodec, 10, new RecordingLogger())
    await vi.waitFor(() => {
      expect(connection.heartbeats).toBeGreaterThanOrEqual(3)
    })
    connection.deliver()

    expect((await pending).service).toBe('server')
  })

  it('stops heartbeating once receive resolves', async () => {
    const connection = new FakeConnection()

    const pending = collect(connection, bytesCodec, 10, new RecordingLogger())
    connection.deliver()
    await pending
    const sent = connection.heartbeats

    await new Promise((resolve) => setTimeout(resolve, 50))
    expect(connection.heartbeats).toBe(sent)
  })

  it('propagates a receive failure and stops heartbeating', async () => {
    const connection = new FakeConnection()

    const pending = collect(connection, bytesCodec, 10, new RecordingLogger())
    connection.fail(new Error('receive failed'))
    await expect(pending).rejects.toThrow('receive failed')
    const sent = connection.heartbeats

    await new Promise((resolve) => setTimeout(resolve, 50))
    expect(connection.heartbeats).toBe(sent)
  })

  it('a failed heartbeat stops the loop with a warning but not the receive', async () => {
    const connection = new FakeConnection()
    connection.failHeartbeats = new Error('pipe closed')
    const logger = new RecordingLogger()

    const pending = collect(connection, bytesCodec, 10, logger)
    connection.deliver()

    expect((await pending).service).toBe('server')
    expect(logger.messages('warn')).toEqual([
      'heartbeat failed, stopping background heartbeats: pipe closed'
    ])
  })

  it('rejects a non-positive rate without receiving', async () => {
    const connection = new FakeConnection()

    await expect(collect(connection, bytesCodec, 0, new RecordingLogger())).rejects.toThrow(
      'Heartbeat rate must be a number in (0, 2147483647] ms, got 0'
    )
    expect(connection.heartbeats).toBe(0)
  })

  it('rejects a rate longer than a timer can wait', async () => {
    const connection = new FakeConnection()

    await expect(
      collect(connection, bytesCodec, MAX_HEARTBEAT_RATE_MS + 1, new RecordingLogger())
    ).rejects.toBeInstanceOf(RangeError)
    expect(connection.heartbeats).toBe(0)
  })
})

describe('HeartbeatThrottle', () => {
  it('sends only when the rate has elapsed since the last heartbeat', async () => {
    let now = 5000
    const target = new FakeConnection()
    const throttle = new HeartbeatThrottle(target, () => now)

    expect(await throttle.beat(100)).toBe(true)
    expect(throttle.lastSentAt).toBe(5000)
    now = 5099
    expect(await throttle.beat(100)).toBe(false)
    now = 5100
    expect(await throttle.beat(100)).toBe(true)
    expect(target.heartbeats).toBe(2)
  })

  it('concurrent beats send a single heartbeat', async () => {
    const target = new FakeConnection()
    const throttle = new HeartbeatThrottle(target, () => 0)

    const results = await Promise.all([throttle.beat(50), throttle.beat(50), throttle.beat(50)])

    expect(results).toEqual([true, false, false])
    expect(target.heartbeats).toBe(1)
  })

  it('a failed heartbeat does not count as sent', async () => {
    const target = new FakeConnection()
    target.failHeartbeats = new Error('pipe closed')
    const throttle = new HeartbeatThrottle(target, () => 0)

    await expect(throttle.beat(50)).rejects.toThrow('pipe closed')
    expect(throttle.lastSentAt).toBeNull()

    target.failHeartbeats = null
    expect(await throttle.beat(50)).toBe(true)
  })

  it('rejects invalid rates', async () => {
    const throttle = new HeartbeatThrottle(new FakeConnection(), () => 0)

    await expect(throttle.beat(-1)).rejects.toBeInstanceOf(RangeError)
    await expect(throttle.beat(Number.NaN)).rejects.toBeInstanceOf(RangeError)
    await expect(throttle.beat(Number.POSITIVE_INFINITY)).rejects.toBeInstanceOf(RangeError)
    await expect(throttle.beat(2 ** 31)).rejects.toBeInstanceOf(RangeError)
    expect(await throttle.beat(MAX_HEARTBEAT_RATE_MS)).toBe(true)
  })

  it('sends exactly on the calls where the rate has elapsed', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 1000 }),
        fc.array(fc.integer({ min: 0, max: 500 }), { maxLength: 20 }),
        async (rate, steps) => {
          let now = 0
          const target = new FakeConnection()
          const throttle = new HeartbeatThrottle(target, () => now)

          let last: number | null = null
          let expected = 0
          for (const step of steps) {
            now += step
            const due = last === null || now - last >= rate
            expect(await throttle.beat(rate)).toBe(due)
            if (due) {
              last = now
              expected += 1
            }
          }
          expect(target.heartbeats).toBe(expected)
        }
      )
    )
  })
})

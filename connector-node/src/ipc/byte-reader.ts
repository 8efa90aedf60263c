/**
 * ByteReader: exact-length reads from the inbound channel.
 *
 * Node streams deliver chunks of arbitrary size; the frame decoder needs
 * "exactly N bytes or fail". ByteReader buffers incoming chunks and hands
 * out exact slices to a single pending read.
 *
 * Lifecycle:
 * 1. Construct with the inbound readable stream
 * 2. Call start() to attach listeners
 * 3. Call readExact(size) as needed, one at a time
 * 4. Call stop() when the channel is no longer used
 *
 * On EOF or error, the pending read (and every later one) is rejected.
 *
 * @module
 */
import type { Readable } from 'node:stream'
import { IoError, StreamClosedError } from '@commslink/sdk'
import type { ByteSource } from './frame.js'

/** Buffered bytes above which the stream is paused while no read is pending. */
const DEFAULT_HIGH_WATER_MARK = 64 * 1024

interface PendingRead {
  readonly size: number
  readonly resolve: (bytes: Buffer) => void
  readonly reject: (err: Error) => void
}

export class ByteReader implements ByteSource {
  private chunks: Buffer[] = []
  private buffered = 0
  private pending: PendingRead | null = null
  /** Set once the stream can deliver no more data. */
  private failure: Error | null = null
  private started = false
  private readonly highWaterMark: number

  constructor(
    private readonly stream: Readable,
    options: { readonly highWaterMark?: number } = {}
  ) {
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK
  }

  /**
   * Attach data/end/close/error listeners.
   */
  start(): void {
    if (this.started) return
    this.started = true
    this.stream.on('data', this.onData)
    this.stream.on('end', this.onEnd)
    this.stream.on('close', this.onClose)
    this.stream.on('error', this.onError)
    if (this.stream.destroyed) {
      this.fail(new StreamClosedError('destroyed'))
    }
  }

  /**
   * Detach listeners and reject any pending read.
   */
  stop(): void {
    if (!this.started) return
    this.started = false
    this.stream.off('data', this.onData)
    this.stream.off('end', this.onEnd)
    this.stream.off('close', this.onClose)
    this.stream.off('error', this.onError)
    this.fail(new StreamClosedError('close', 'reader stopped'))
  }

  /**
   * Number of bytes received but not yet handed out.
   */
  get bufferedBytes(): number {
    return this.buffered
  }

  /**
   * Resolve with exactly `size` bytes.
   *
   * @throws StreamClosedError if the stream ends before `size` bytes arrive
   * @throws IoError if the stream errors
   */
  readExact(size: number): Promise<Buffer> {
    if (this.pending !== null) {
      return Promise.reject(new Error('ByteReader does not support concurrent reads'))
    }
    if (size === 0) {
      return Promise.resolve(Buffer.alloc(0))
    }
    if (this.buffered >= size) {
      return Promise.resolve(this.take(size))
    }
    if (this.failure !== null) {
      return Promise.reject(this.failure)
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { size, resolve, reject }
      if (this.stream.isPaused()) {
        this.stream.resume()
      }
    })
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
    this.chunks.push(bytes)
    this.buffered += bytes.length
    this.drain()
  }

  private readonly onEnd = (): void => {
    this.fail(new StreamClosedError('ended', this.shortReadDetail()))
  }

  private readonly onClose = (): void => {
    this.fail(new StreamClosedError('close', this.shortReadDetail()))
  }

  private readonly onError = (err: Error): void => {
    this.fail(new IoError(`inbound channel error: ${err.message}`, { cause: err }))
  }

  /** Satisfy the pending read if enough bytes arrived, else apply backpressure. */
  private drain(): void {
    const pending = this.pending
    if (pending !== null && this.buffered >= pending.size) {
      this.pending = null
      pending.resolve(this.take(pending.size))
    }
    if (this.pending === null && this.buffered >= this.highWaterMark) {
      this.stream.pause()
    }
  }

  /** Remove and return the first `size` buffered bytes. */
  private take(size: number): Buffer {
    const all =
      this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered)
    const bytes = all.subarray(0, size)
    const rest = all.subarray(size)
    this.chunks = rest.length > 0 ? [rest] : []
    this.buffered = rest.length
    return bytes
  }

  /** First failure wins; rejects the pending read. */
  private fail(err: Error): void {
    if (this.failure === null) {
      this.failure = err
    }
    const pending = this.pending
    if (pending !== null) {
      this.pending = null
      pending.reject(this.failure)
    }
  }

  private shortReadDetail(): string | undefined {
    const pending = this.pending
    if (pending === null) return undefined
    return `needed ${pending.size} bytes, got ${this.buffered}`
  }
}

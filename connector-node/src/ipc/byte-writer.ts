/**
 * Flushed writes to the outbound channel.
 *
 * A frame counts as sent only once the stream's write callback reports that
 * its bytes were handed to the underlying resource. This is the connector's
 * explicit flush: the handshake and every frame wait for it.
 *
 * @module
 */
import type { Writable } from 'node:stream'
import { IoError, StreamClosedError } from '@commslink/sdk'

/**
 * Write a buffer and wait until the stream has flushed it.
 * Settles once; later events are ignored.
 *
 * @throws StreamClosedError if the stream is destroyed, ended or closes first
 * @throws IoError if the write fails or the stream emits an error
 */
export function writeFlushed(stream: Writable, data: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed) {
      reject(new StreamClosedError('destroyed'))
      return
    }
    if (stream.writableEnded || stream.writableFinished) {
      reject(new StreamClosedError('ended'))
      return
    }

    let settled = false

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      cleanup()
      fn()
    }

    const onError = (err: Error) =>
      settle(() => reject(new IoError(`outbound channel error: ${err.message}`, { cause: err })))
    const onClose = () => settle(() => reject(new StreamClosedError('close')))
    const onFinish = () => settle(() => reject(new StreamClosedError('finish')))

    const cleanup = () => {
      stream.off('error', onError)
      stream.off('close', onClose)
      stream.off('finish', onFinish)
    }

    // Listeners go on first: write() may fail synchronously
    stream.on('error', onError)
    stream.on('close', onClose)
    stream.on('finish', onFinish)

    stream.write(data, (err) => {
      if (err) {
        onError(err)
      } else {
        settle(() => resolve())
      }
    })
  })
}

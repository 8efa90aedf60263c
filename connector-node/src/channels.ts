/**
 * Channel acquisition from the environment.
 *
 * The supervising daemon starts the process with two descriptors already
 * open and names them in environment variables. This is the only module
 * that knows where the channels come from; everything else works on a
 * ChannelPair.
 *
 * @module
 */
import { createReadStream, createWriteStream, fstatSync } from 'node:fs'
import { Socket } from 'node:net'
import type { Readable, Writable } from 'node:stream'
import { ChannelAcquisitionError } from '@commslink/sdk'
import { INBOUND_CHANNEL_ENV, OUTBOUND_CHANNEL_ENV } from './config.js'

/**
 * The two one-directional byte streams connecting this process to its
 * supervisor.
 */
export interface ChannelPair {
  readonly inbound: Readable
  readonly outbound: Writable
}

/**
 * Open the channel pair named by the environment.
 *
 * @throws ChannelAcquisitionError if a variable is missing, unparsable or names a closed descriptor
 */
export function channelsFromEnv(env: NodeJS.ProcessEnv = process.env): ChannelPair {
  if (process.platform === 'win32') {
    // Pipe HANDLEs passed by the daemon cannot be adopted as Node streams.
    throw new ChannelAcquisitionError(INBOUND_CHANNEL_ENV, 'unsupported_platform', 'win32')
  }

  const inboundFd = parseDescriptor(env, INBOUND_CHANNEL_ENV)
  const outboundFd = parseDescriptor(env, OUTBOUND_CHANNEL_ENV)

  return {
    inbound: openInbound(inboundFd),
    outbound: openOutbound(outboundFd)
  }
}

/**
 * Read a descriptor number from the environment and check it is open.
 */
export function parseDescriptor(env: NodeJS.ProcessEnv, variable: string): number {
  const raw = env[variable]
  if (raw === undefined || raw === '') {
    throw new ChannelAcquisitionError(variable, 'not_specified')
  }

  const trimmed = raw.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new ChannelAcquisitionError(variable, 'not_parsable', raw)
  }
  const fd = Number(trimmed)
  if (!Number.isSafeInteger(fd)) {
    throw new ChannelAcquisitionError(variable, 'not_parsable', raw)
  }

  try {
    fstatSync(fd)
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? String(err.code) : 'unknown error'
    throw new ChannelAcquisitionError(variable, 'invalid_handle', `descriptor ${fd}: ${code}`, {
      cause: err
    })
  }

  return fd
}

/** True for descriptors libuv can drive as a non-blocking pipe. */
function isStreamDescriptor(fd: number): boolean {
  const stats = fstatSync(fd)
  return stats.isFIFO() || stats.isSocket()
}

function openInbound(fd: number): Readable {
  if (isStreamDescriptor(fd)) {
    return new Socket({ fd, readable: true, writable: false })
  }
  return createReadStream('', { fd, autoClose: false })
}

function openOutbound(fd: number): Writable {
  if (isStreamDescriptor(fd)) {
    return new Socket({ fd, readable: false, writable: true })
  }
  return createWriteStream('', { fd, autoClose: false })
}

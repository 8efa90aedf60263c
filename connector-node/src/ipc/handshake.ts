import type { Writable } from 'node:stream'
import { writeFlushed } from './byte-writer.js'
import { type ByteSource, encodeMagic, readMagic } from './frame.js'

/**
 * Execute the handshake procedure.
 *
 * Writes the magic number, waits for it to be flushed, then reads four bytes
 * back and compares them with the magic. It proves the channel pair is wired
 * to a peer speaking the same framing; it is not a version negotiation.
 *
 * @throws MagicMismatchError if the peer answers with anything but the magic
 * @throws IoError / StreamClosedError if either channel fails
 */
export async function handshake(input: ByteSource, output: Writable): Promise<void> {
  await writeFlushed(output, encodeMagic())
  await readMagic(input)
}

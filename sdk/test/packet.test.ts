import { describe, expect, it } from 'vitest'
import { bytesCodec, msgpackCodec } from '../src/codec.js'
import { DecodeError, EncodeError, MalformedMessageError } from '../src/errors.js'
import { packetFromEnvelope, packetToEnvelope } from '../src/packet.js'

const numberCodec = msgpackCodec<number>({
  is: (value): value is number => typeof value === 'number',
  empty: () => 0,
  typeUrl: 'test/number'
})

describe('packetToEnvelope', () => {
  it('addresses the packet service and leaves an absent kind empty', () => {
    const data = new Uint8Array([1, 2, 3, 4, 5])

    expect(packetToEnvelope({ service: 'greeter', data }, bytesCodec)).toEqual({
      messageType: '',
      destinationService: 'greeter',
      payload: { typeUrl: '', value: data }
    })
  })

  it('uses kind as the message type and the codec type URL', () => {
    const envelope = packetToEnvelope({ service: 'counter', kind: 'Set', data: 7 }, numberCodec)

    expect(envelope.messageType).toBe('Set')
    expect(envelope.payload?.typeUrl).toBe('test/number')
    expect([...(envelope.payload?.value ?? [])]).toEqual([7])
  })

  it('never sets a source service', () => {
    const envelope = packetToEnvelope({ service: 'greeter', data: new Uint8Array(0) }, bytesCodec)

    expect(envelope).not.toHaveProperty('sourceService')
  })

  it('rejects an empty destination', () => {
    expect(() => packetToEnvelope({ service: '', data: new Uint8Array(0) }, bytesCodec)).toThrow(
      new EncodeError('packet has no destination service')
    )
  })
})

describe('packetFromEnvelope', () => {
  it('reads the source service, kind and payload', () => {
    const packet = packetFromEnvelope(
      {
        messageType: 'Set',
        destinationService: 'client',
        sourceService: 'counter',
        payload: { typeUrl: 'test/number', value: new Uint8Array([7]) }
      },
      numberCodec
    )

    expect(packet).toEqual({ service: 'counter', kind: 'Set', data: 7 })
  })

  it('omits kind for an empty message type', () => {
    const packet = packetFromEnvelope(
      {
        messageType: '',
        destinationService: 'client',
        sourceService: 'counter',
        payload: { typeUrl: '', value: new Uint8Array([7]) }
      },
      numberCodec
    )

    expect(packet).toEqual({ service: 'counter', data: 7 })
    expect('kind' in packet).toBe(false)
  })

  it('uses the empty value when there is no payload', () => {
    expect(
      packetFromEnvelope(
        { messageType: 'Reset', destinationService: 'client', sourceService: 'counter' },
        numberCodec
      )
    ).toEqual({ service: 'counter', kind: 'Reset', data: 0 })
  })

  it.each([undefined, ''])('rejects source service %j', (sourceService) => {
    expect(() =>
      packetFromEnvelope(
        { messageType: 'Set', destinationService: 'client', sourceService },
        numberCodec
      )
    ).toThrow(new MalformedMessageError('missing source address'))
  })

  it('propagates payload decode failures', () => {
    expect(() =>
      packetFromEnvelope(
        {
          messageType: 'Set',
          destinationService: 'client',
          sourceService: 'counter',
          payload: { typeUrl: 'test/number', value: new Uint8Array([0xa1, 0x78]) }
        },
        numberCodec
      )
    ).toThrow(DecodeError)
  })
})

import { DecodeError, EncodeError } from '@commslink/sdk'
import { describe, expect, it } from 'vitest'
import {
  decodeEnvelope,
  decodeStartupData,
  encodeEnvelope,
  encodeStartupData,
  STARTUP_DATA_TYPE_URL
} from '../../src/proto/schema.js'

describe('envelope schema', () => {
  it('STARTUP_DATA_TYPE_URL names the startup report message', () => {
    expect(STARTUP_DATA_TYPE_URL).toBe('type.googleapis.com/fleetspeak.channel.StartupData')
  })

  it('encodes a heartbeat as message_type and destination.service_name only', () => {
    const bytes = encodeEnvelope({ messageType: 'Heartbeat', destinationService: 'system' })

    // field 4 (destination, len 8) { field 2 (service_name, len 6) "system" },
    // field 5 (message_type, len 9) "Heartbeat"
    expect([...bytes]).toEqual([
      0x22,
      0x08,
      0x12,
      0x06,
      ...Buffer.from('system'),
      0x2a,
      0x09,
      ...Buffer.from('Heartbeat')
    ])
  })

  it('writes the payload type URL as google.protobuf.Any field 1', () => {
    const bytes = encodeEnvelope({
      messageType: 'Q',
      destinationService: 'x',
      payload: { typeUrl: 'a', value: new Uint8Array([1]) }
    })

    // field 7 (data, len 6) { field 1 (type_url, len 1) "a", field 2 (value, len 1) 0x01 }
    expect([...bytes.subarray(bytes.length - 8)]).toEqual([
      0x3a, 0x06, 0x0a, 0x01, 0x61, 0x12, 0x01, 0x01
    ])
    expect(decodeEnvelope(bytes).payload?.typeUrl).toBe('a')
  })

  it('round-trips every field the connector uses', () => {
    const decoded = decodeEnvelope(
      encodeEnvelope({
        messageType: 'Query',
        destinationService: 'greeter',
        sourceService: 'client',
        payload: { typeUrl: 'type.googleapis.com/test.Query', value: new Uint8Array([7, 8]) }
      })
    )

    expect(decoded.messageType).toBe('Query')
    expect(decoded.destinationService).toBe('greeter')
    expect(decoded.sourceService).toBe('client')
    expect(decoded.payload?.typeUrl).toBe('type.googleapis.com/test.Query')
    expect([...(decoded.payload?.value ?? [])]).toEqual([7, 8])
  })

  it('leaves absent submessages absent', () => {
    const decoded = decodeEnvelope(encodeEnvelope({ messageType: '', destinationService: 'x' }))

    expect(decoded).toEqual({ messageType: '', destinationService: 'x' })
    expect('sourceService' in decoded).toBe(false)
    expect('payload' in decoded).toBe(false)
  })

  it('keeps a present but empty payload', () => {
    const decoded = decodeEnvelope(
      encodeEnvelope({
        messageType: '',
        destinationService: 'x',
        payload: { typeUrl: '', value: new Uint8Array(0) }
      })
    )

    expect(decoded.payload?.typeUrl).toBe('')
    expect(decoded.payload?.value.length).toBe(0)
  })

  it('rejects an envelope without destination', () => {
    expect(() => encodeEnvelope({ messageType: 'A', destinationService: '' })).toThrow(
      new EncodeError('envelope has no destination service')
    )
  })

  it('wraps parse failures in DecodeError', () => {
    expect(() => decodeEnvelope(new Uint8Array([0xff, 0xff, 0xff]))).toThrow(DecodeError)
    expect(() => decodeEnvelope(new Uint8Array([0xff, 0xff, 0xff]))).toThrow(
      /^failed to decode envelope: /
    )
  })
})

describe('startup data schema', () => {
  it('round-trips pid and version', () => {
    expect(decodeStartupData(encodeStartupData({ pid: 4242, version: '1.2.3' }))).toEqual({
      pid: 4242,
      version: '1.2.3'
    })
  })

  it('decodes an empty report to defaults', () => {
    expect(decodeStartupData(new Uint8Array(0))).toEqual({ pid: 0, version: '' })
  })
})

import { describe, it, expect } from 'vitest'
import {
  formatEntity,
  formatMessage,
  formatValue,
  toDisplayJson,
} from '@fluxstate/core'
import type { Entity } from '@fluxstate/core'

const entity: Entity = {
  id: 'sensor-1',
  properties: { temperature: 22.5, status: 'online' },
  lastUpdated: '2024-01-01T12:34:56.789Z',
}

const multiLine = [
  'Entity: sensor-1',
  'Last Updated: 2024-01-01T12:34:56.789Z',
  'Properties:',
  '{',
  '  "temperature": 22.5,',
  '  "status": "online"',
  '}',
].join('\n')

describe('formatValue', () => {
  it('shows strings bare and everything else as JSON', () => {
    expect(formatValue('online')).toBe('online')
    expect(formatValue(22.5)).toBe('22.5')
    expect(formatValue(true)).toBe('true')
    expect(formatValue(null)).toBe('null')
    expect(formatValue({ a: [1] })).toBe('{"a":[1]}')
  })
})

describe('toDisplayJson', () => {
  it('spaces items and keys at every depth', () => {
    expect(toDisplayJson({ a: [1, 2], b: { c: null }, d: 'x, y: z' })).toBe(
      '{"a": [1, 2], "b": {"c": null}, "d": "x, y: z"}',
    )
  })

  it('keeps empty containers and scalars compact', () => {
    expect(toDisplayJson({})).toBe('{}')
    expect(toDisplayJson([])).toBe('[]')
    expect(toDisplayJson(22.5)).toBe('22.5')
    expect(toDisplayJson('tab\there')).toBe('"tab\\there"')
  })

  it('escapes DEL, non-ASCII and astral characters', () => {
    expect(toDisplayJson('\u007f')).toBe('"\\u007f"')
    expect(toDisplayJson('é')).toBe('"\\u00e9"')
    expect(toDisplayJson('😀')).toBe('"\\ud83d\\ude00"')
  })
})

describe('formatEntity', () => {
  it('renders the compact single line', () => {
    expect(formatEntity(entity, { compact: true })).toBe(
      'sensor-1: temperature=22.5, status=online (updated: 2024-01-01T12:34:56)',
    )
  })

  it('renders the multi-line form by default', () => {
    expect(formatEntity(entity)).toBe(multiLine)
  })

  it('escapes non-ASCII text in the multi-line form', () => {
    expect(formatEntity({ ...entity, properties: { city: 'Zürich' } })).toBe(
      [
        'Entity: sensor-1',
        'Last Updated: 2024-01-01T12:34:56.789Z',
        'Properties:',
        '{',
        '  "city": "Z\\u00fcrich"',
        '}',
      ].join('\n'),
    )
  })
})

describe('formatMessage', () => {
  it('renders a compact update with a second-precision timestamp', () => {
    expect(formatMessage({ type: 'update', entity })).toBe(
      '[2024-01-01T12:34:56] sensor-1: temperature=22.5, status=online',
    )
  })

  it('renders a compact snapshot with spaced JSON properties', () => {
    expect(formatMessage({ type: 'snapshot', entity })).toBe(
      '[SNAPSHOT] sensor-1: {"temperature": 22.5, "status": "online"}',
    )
  })

  it('escapes non-ASCII text in a snapshot', () => {
    expect(
      formatMessage({
        type: 'snapshot',
        entity: { ...entity, properties: { city: 'Zürich' } },
      }),
    ).toBe('[SNAPSHOT] sensor-1: {"city": "Z\\u00fcrich"}')
  })

  it('renders an update with no properties', () => {
    expect(
      formatMessage({ type: 'update', entity: { ...entity, properties: {} } }),
    ).toBe('[2024-01-01T12:34:56] sensor-1: ')
  })

  it('puts a header over the multi-line form when not compact', () => {
    expect(formatMessage({ type: 'update', entity }, { compact: false })).toBe(
      `[UPDATE]\n${multiLine}`,
    )
    expect(formatMessage({ type: 'snapshot', entity }, { compact: false })).toBe(
      `[SNAPSHOT]\n${multiLine}`,
    )
  })

  it('pretty-prints an unrecognized JSON frame', () => {
    expect(formatMessage({ type: 'unrecognized', raw: '{"type":"heartbeat"}' })).toBe(
      '{\n  "type": "heartbeat"\n}',
    )
  })

  it('passes unrecognized non-JSON text through', () => {
    expect(formatMessage({ type: 'unrecognized', raw: 'garbage' })).toBe('garbage')
  })
})

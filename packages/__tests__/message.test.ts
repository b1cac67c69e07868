import { describe, it, expect } from 'vitest'
import {
  isSnapshot,
  isUnrecognized,
  isUpdate,
  parseSubscriptionMessage,
} from '@fluxstate/core'

const entity = {
  id: 'sensor-1',
  properties: { temperature: 22.5, tags: ['a', 'b'], meta: { floor: 2 } },
  lastUpdated: '2024-01-01T00:00:00Z',
}

describe('parseSubscriptionMessage', () => {
  it('classifies a snapshot frame', () => {
    const msg = parseSubscriptionMessage(JSON.stringify({ type: 'snapshot', entity }))
    expect(msg).toEqual({ type: 'snapshot', entity })
    expect(isSnapshot(msg)).toBe(true)
    expect(isUpdate(msg)).toBe(false)
  })

  it('classifies an update frame', () => {
    const msg = parseSubscriptionMessage(JSON.stringify({ type: 'update', entity }))
    expect(msg).toEqual({ type: 'update', entity })
    expect(isUpdate(msg)).toBe(true)
  })

  it('ignores extra fields on the frame', () => {
    const msg = parseSubscriptionMessage(
      JSON.stringify({ type: 'update', entity, seq: 7 }),
    )
    expect(msg).toEqual({ type: 'update', entity })
  })

  it.each([
    ['text that is not JSON', 'hello'],
    ['an unknown type', '{"type":"heartbeat"}'],
    ['a frame without type', JSON.stringify({ entity })],
    ['an update without entity', '{"type":"update"}'],
    [
      'an entity missing lastUpdated',
      '{"type":"snapshot","entity":{"id":"a","properties":{}}}',
    ],
    [
      'an entity with non-object properties',
      '{"type":"update","entity":{"id":"a","properties":5,"lastUpdated":"x"}}',
    ],
    ['a JSON array', '[1,2]'],
    ['JSON null', 'null'],
  ])('keeps %s as unrecognized with the raw text', (_label, raw) => {
    const msg = parseSubscriptionMessage(raw)
    expect(msg).toEqual({ type: 'unrecognized', raw })
    expect(isUnrecognized(msg)).toBe(true)
  })
})

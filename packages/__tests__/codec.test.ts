/**
 * Tests for the property codec: key=value tokens → typed property values.
 */

import { describe, it, expect } from 'vitest'
import {
  FormatError,
  decodeValue,
  encodeProperties,
  encodeValue,
  parseProperties,
  parseToken,
} from '@fluxstate/core'

describe('decodeValue', () => {
  it('parses JSON literals into typed values', () => {
    expect(decodeValue('22.5')).toBe(22.5)
    expect(decodeValue('-3')).toBe(-3)
    expect(decodeValue('true')).toBe(true)
    expect(decodeValue('false')).toBe(false)
    expect(decodeValue('null')).toBeNull()
    expect(decodeValue('"quoted"')).toBe('quoted')
  })

  it('parses structured JSON', () => {
    expect(decodeValue('{"a":1,"b":[true,null]}')).toEqual({ a: 1, b: [true, null] })
    expect(decodeValue('[1,2,3]')).toEqual([1, 2, 3])
  })

  it('returns anything that is not strict JSON unchanged', () => {
    expect(decodeValue('online')).toBe('online')
    expect(decodeValue('22.5abc')).toBe('22.5abc')
    expect(decodeValue('True')).toBe('True')
    expect(decodeValue("{'a':1}")).toBe("{'a':1}")
    expect(decodeValue('')).toBe('')
  })
})

describe('parseToken', () => {
  it('splits on the first = only', () => {
    expect(parseToken('query=a=b')).toEqual(['query', 'a=b'])
    expect(parseToken('expr==')).toEqual(['expr', '='])
  })

  it('decodes the value', () => {
    expect(parseToken('temperature=22.5')).toEqual(['temperature', 22.5])
    expect(parseToken('active=true')).toEqual(['active', true])
    expect(parseToken('status=online')).toEqual(['status', 'online'])
  })

  it('keeps an empty value as an empty string', () => {
    expect(parseToken('note=')).toEqual(['note', ''])
  })

  it('throws FormatError without a separator', () => {
    expect(() => parseToken('temperature')).toThrow(FormatError)
    expect(() => parseToken('temperature')).toThrow(
      "Invalid property format 'temperature'. Use key=value",
    )
  })

  it('accepts an empty key', () => {
    expect(parseToken('=22')).toEqual(['', 22])
  })
})

describe('parseProperties', () => {
  it('types each token independently', () => {
    expect(
      parseProperties(['temperature=22.5', 'active=true', 'status=online']),
    ).toEqual({ temperature: 22.5, active: true, status: 'online' })
  })

  it('keeps the last value for a repeated key', () => {
    expect(parseProperties(['t=1', 't=2'])).toEqual({ t: 2 })
  })

  it('returns an empty map for no tokens', () => {
    expect(parseProperties([])).toEqual({})
  })

  it('keeps __proto__ as an ordinary own key', () => {
    const props = parseProperties(['__proto__={"a":1}', 't=1'])
    expect(Object.keys(props)).toEqual(['__proto__', 't'])
    expect(Object.getPrototypeOf(props)).toBe(Object.prototype)
    expect('a' in props).toBe(false)
    expect(Object.getOwnPropertyDescriptor(props, '__proto__')?.value).toEqual({ a: 1 })
  })

  it('fails on the first malformed token', () => {
    expect(() => parseProperties(['a=1', 'broken'])).toThrow(FormatError)
  })
})

describe('encodeValue / encodeProperties', () => {
  it('leaves plain strings bare and quotes strings that look like JSON', () => {
    expect(encodeValue('online')).toBe('online')
    expect(encodeValue('42')).toBe('"42"')
    expect(encodeValue('true')).toBe('"true"')
  })

  it('writes non-strings as JSON', () => {
    expect(encodeValue(22.5)).toBe('22.5')
    expect(encodeValue(null)).toBe('null')
    expect(encodeValue({ a: [1] })).toBe('{"a":[1]}')
  })

  it('produces tokens that parse back to the same properties', () => {
    const properties = { t: 22.5, label: '42', status: 'online', tags: ['a'] }
    const tokens = encodeProperties(properties)
    expect(tokens).toEqual(['t=22.5', 'label="42"', 'status=online', 'tags=["a"]'])
    expect(parseProperties(tokens)).toEqual(properties)
  })

  it('round-trips an empty key', () => {
    expect(encodeProperties({ '': 5 })).toEqual(['=5'])
    expect(parseProperties(['=5'])).toEqual({ '': 5 })
  })

  it('rejects a key containing =', () => {
    expect(() => encodeProperties({ 'a=b': 1 })).toThrow(FormatError)
    expect(() => encodeProperties({ 'a=b': 1 })).toThrow(
      "Property key 'a=b' cannot contain '='",
    )
  })
})

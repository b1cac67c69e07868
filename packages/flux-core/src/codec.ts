import { FormatError } from './errors.js'
import type { Properties, PropertyValue } from './types.js'

/**
 * Decode one textual value into a typed property.
 *
 * The text is parsed as a strict JSON literal first, so `22.5`, `true`,
 * `null`, `"quoted"` and `{"a":1}` come back typed. Anything that is not
 * valid JSON (`online`, `22.5abc`, an empty string) is returned unchanged as
 * a string.
 */
export function decodeValue(text: string): PropertyValue {
  try {
    return JSON.parse(text) as PropertyValue
  } catch {
    return text
  }
}

/**
 * Split a `key=value` token on the first `=` and decode the value.
 * The value may itself contain `=`; the key may be empty.
 *
 * @throws {FormatError} when the token has no `=`.
 */
export function parseToken(token: string): [key: string, value: PropertyValue] {
  const index = token.indexOf('=')
  if (index === -1) {
    throw new FormatError(`Invalid property format '${token}'. Use key=value`)
  }
  return [token.slice(0, index), decodeValue(token.slice(index + 1))]
}

/**
 * Fold a list of `key=value` tokens into a property map. A repeated key keeps
 * the last value.
 */
export function parseProperties(tokens: Iterable<string>): Properties {
  const properties: Properties = {}
  for (const token of tokens) {
    const [key, value] = parseToken(token)
    // Plain assignment to `__proto__` would swap the prototype instead.
    Object.defineProperty(properties, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    })
  }
  return properties
}

/**
 * Encode a property value as token text such that `decodeValue` gives the
 * same value back. Plain strings stay bare; strings that would otherwise
 * decode as JSON (`"42"`, `"true"`) are JSON-quoted.
 */
export function encodeValue(value: PropertyValue): string {
  if (typeof value === 'string') {
    return decodeValue(value) === value ? value : JSON.stringify(value)
  }
  return JSON.stringify(value)
}

/**
 * Inverse of `parseProperties`, in key insertion order.
 *
 * @throws {FormatError} for a key containing `=`, which no token can carry.
 */
export function encodeProperties(properties: Properties): string[] {
  return Object.entries(properties).map(([key, value]) => {
    if (key.includes('=')) {
      throw new FormatError(`Property key '${key}' cannot contain '='`)
    }
    return `${key}=${encodeValue(value)}`
  })
}

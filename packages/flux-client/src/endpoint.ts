import { FormatError } from '@fluxstate/core'

export const SUBSCRIPTION_PATH = '/api/ws'

const HTTP_SCHEMES = new Set(['http:', 'https:'])
const WS_SCHEMES = new Set(['ws:', 'wss:'])

function parse(url: string): URL {
  try {
    return new URL(url)
  } catch {
    throw new FormatError(`Invalid service URL '${url}'`)
  }
}

function trimPath(pathname: string): string {
  return pathname.replace(/\/+$/, '')
}

/**
 * Normalise the base address used for HTTP calls: `http:` or `https:` only,
 * no trailing slash, query and fragment dropped.
 *
 * @throws {FormatError} for unparsable URLs and other schemes.
 */
export function resolveHttpBase(url: string): string {
  const parsed = parse(url)
  if (!HTTP_SCHEMES.has(parsed.protocol)) {
    throw new FormatError(
      `Service URL must use http: or https:, got '${parsed.protocol}'`,
    )
  }
  return `${parsed.protocol}//${parsed.host}${trimPath(parsed.pathname)}`
}

/**
 * Derive the subscription endpoint from the service address:
 * `http:` → `ws:`, `https:` → `wss:`, then `/api/ws` appended.
 *
 * @example
 * resolveSubscriptionUrl('https://flux.example.com:3000')
 * // 'wss://flux.example.com:3000/api/ws'
 *
 * @throws {FormatError} for unparsable URLs and non-HTTP/WebSocket schemes.
 */
export function resolveSubscriptionUrl(url: string): string {
  const parsed = parse(url)
  let protocol: string
  if (parsed.protocol === 'http:') protocol = 'ws:'
  else if (parsed.protocol === 'https:') protocol = 'wss:'
  else if (WS_SCHEMES.has(parsed.protocol)) protocol = parsed.protocol
  else {
    throw new FormatError(
      `Subscription URL must use http:, https:, ws: or wss:, got '${parsed.protocol}'`,
    )
  }
  return `${protocol}//${parsed.host}${trimPath(parsed.pathname)}${SUBSCRIPTION_PATH}`
}

/** @throws {FormatError} unless `value` is a positive, finite number of ms. */
export function requireTimeout(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new FormatError(`'${name}' must be a positive number of milliseconds, got ${value}`)
  }
  return value
}

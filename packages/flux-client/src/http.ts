import {
  ServerError,
  TimeoutError,
  UnreachableError,
  err,
  ok,
} from '@fluxstate/core'
import type { JsonValue, Result } from '@fluxstate/core'
import type { ZodType, ZodTypeDef } from 'zod'
import { requireTimeout, resolveHttpBase } from './endpoint.js'
import { createConsoleLogger } from './logger.js'
import type { FetchFn, HttpClientOptions, Logger } from './types.js'

export const DEFAULT_TIMEOUT = 10_000

/** Validated, defaulted form of {@link HttpClientOptions}. */
export interface HttpConfig {
  readonly baseUrl: string
  readonly timeout: number
  readonly fetch: FetchFn
  readonly logger: Logger
}

export function resolveHttpConfig(options: HttpClientOptions): HttpConfig {
  const {
    url,
    timeout = DEFAULT_TIMEOUT,
    fetch: fetchFn = (input, init) => fetch(input, init),
    logger = createConsoleLogger('http'),
  } = options
  return {
    baseUrl: resolveHttpBase(url),
    timeout: requireTimeout('timeout', timeout),
    fetch: fetchFn,
    logger,
  }
}

export interface HttpResponse {
  readonly status: number
  readonly ok: boolean
  readonly text: string
}

// DOMException from an aborted signal is not guaranteed to be an Error subclass.
function errorName(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('name' in error)) return undefined
  return typeof error.name === 'string' ? error.name : undefined
}

/**
 * Issue one request and read the whole body under a single deadline.
 *
 * Only transport outcomes are mapped here: an elapsed deadline becomes
 * `TimeoutError`, a failed connection (`fetch` rejects with `TypeError`)
 * becomes `UnreachableError`. Status codes are left to the caller.
 */
export async function send(
  config: HttpConfig,
  method: 'GET' | 'POST' | 'DELETE',
  path: string,
  options: { body?: unknown; timeout?: number } = {},
): Promise<Result<HttpResponse, UnreachableError | TimeoutError>> {
  const url = `${config.baseUrl}${path}`
  const timeout = requireTimeout('timeout', options.timeout ?? config.timeout)
  const headers: Record<string, string> = { accept: 'application/json' }
  const init: RequestInit = {
    method,
    headers,
    signal: AbortSignal.timeout(timeout),
  }
  if (options.body !== undefined) {
    headers['content-type'] = 'application/json'
    init.body = JSON.stringify(options.body)
  }

  config.logger.debug(`${method} ${url}`)
  try {
    const res = await config.fetch(url, init)
    const text = await res.text()
    return ok({ status: res.status, ok: res.ok, text })
  } catch (error) {
    const name = errorName(error)
    if (name === 'TimeoutError' || name === 'AbortError') {
      return err(new TimeoutError(url, timeout))
    }
    if (error instanceof TypeError) {
      return err(new UnreachableError(config.baseUrl, error))
    }
    throw error
  }
}

/** Parsed JSON when the text is JSON, otherwise the text itself. */
export function readDetail(text: string): JsonValue {
  try {
    return JSON.parse(text) as JsonValue
  } catch {
    return text
  }
}

/**
 * Decode a 2xx body with `schema`. A body that is not JSON, or does not match,
 * is reported as a `ServerError` carrying the raw text.
 */
export function decodeBody<T>(
  res: HttpResponse,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Result<T, ServerError> {
  let parsed: unknown
  try {
    parsed = JSON.parse(res.text)
  } catch {
    return err(new ServerError(res.status, res.text))
  }
  const result = schema.safeParse(parsed)
  return result.success ? ok(result.data) : err(new ServerError(res.status, res.text))
}

/** Map a non-2xx response to a `ServerError` with the body preserved. */
export function toServerError(res: HttpResponse): ServerError {
  return new ServerError(res.status, readDetail(res.text))
}

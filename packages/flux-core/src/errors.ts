import type { JsonValue } from './types.js'

export type FluxErrorCode =
  | 'FORMAT'
  | 'UNREACHABLE'
  | 'TIMEOUT'
  | 'NOT_FOUND'
  | 'SERVER'
  | 'CONNECTION_LOST'

/**
 * Base class for every error the library produces. `code` is the
 * discriminant; branch on it (or `instanceof`) rather than on `message`.
 */
export class FluxError extends Error {
  constructor(
    public readonly code: FluxErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'FluxError'
  }
}

/** Malformed caller input, e.g. a property token without `=`. Never retried. */
export class FormatError extends FluxError {
  constructor(message: string) {
    super('FORMAT', message)
    this.name = 'FormatError'
  }
}

/** No connection to the service could be established. */
export class UnreachableError extends FluxError {
  constructor(
    public readonly url: string,
    cause?: unknown,
  ) {
    super('UNREACHABLE', `Cannot connect to ${url}`, { cause })
    this.name = 'UnreachableError'
  }
}

/** A bounded wait elapsed before the service answered. */
export class TimeoutError extends FluxError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super('TIMEOUT', `Request to ${url} timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
  }
}

/** The queried entity does not exist. An expected outcome, not a failure. */
export class NotFoundError extends FluxError {
  constructor(public readonly entityId: string) {
    super('NOT_FOUND', `Entity '${entityId}' not found`)
    this.name = 'NotFoundError'
  }
}

/**
 * Non-success response. `detail` is the parsed JSON body when the body is
 * JSON, otherwise the raw response text.
 */
export class ServerError extends FluxError {
  constructor(
    public readonly status: number,
    public readonly detail: JsonValue,
  ) {
    super(
      'SERVER',
      `HTTP ${status}: ${typeof detail === 'string' ? detail : JSON.stringify(detail)}`,
    )
    this.name = 'ServerError'
  }
}

/**
 * The subscription connection ended after it had been established.
 * `streamed` tells apart a drop during normal streaming from one before the
 * first inbound frame.
 */
export class ConnectionLostError extends FluxError {
  constructor(
    public readonly url: string,
    public readonly closeCode: number,
    public readonly reason: string,
    public readonly framesReceived: number,
    cause?: unknown,
  ) {
    super(
      'CONNECTION_LOST',
      framesReceived > 0
        ? `Connection to ${url} lost after ${framesReceived} frame(s) (code ${closeCode}${reason ? `: ${reason}` : ''})`
        : `Connection to ${url} closed before any frame arrived (code ${closeCode}${reason ? `: ${reason}` : ''})`,
      { cause },
    )
    this.name = 'ConnectionLostError'
  }

  get streamed(): boolean {
    return this.framesReceived > 0
  }
}

/** Errors a one-shot HTTP call can end with. */
export type RequestError = UnreachableError | TimeoutError | ServerError

/** Errors `queryOne` / `queryAll` can end with. */
export type QueryError = RequestError | NotFoundError

/** Errors that end a subscription session in `'failed'`. */
export type SessionError =
  | UnreachableError
  | TimeoutError
  | ServerError
  | ConnectionLostError

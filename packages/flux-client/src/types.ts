// Re-export the shared model from core so consumers have a single import.
export type {
  Entity,
  EntityFilter,
  HistoryEvent,
  DeleteFilter,
  DeleteReceipt,
  BatchDeleteReceipt,
  FluxEvent,
  Properties,
  PropertyValue,
  PublishReceipt,
  BatchReceipt,
  Result,
  SessionStatus,
  SubscriptionMessage,
} from '@fluxstate/core'

/**
 * Minimal logging surface. `console` satisfies it; so do pino / winston
 * loggers when adapted to `(message, ...args)`.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

/** The `fetch` signature the HTTP calls depend on. Defaults to the global. */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>

/** Options shared by the one-shot HTTP calls. */
export interface HttpClientOptions {
  /**
   * Base address of the service, e.g. `"http://localhost:3000"`.
   * A trailing slash is ignored; a path prefix is kept.
   */
  url: string
  /** Per-request deadline in ms, covering connect and body. Defaults to `10000`. */
  timeout?: number
  /** Replacement for the global `fetch` (tests, proxies). */
  fetch?: FetchFn
  logger?: Logger
}

/** Per-call overrides. */
export interface CallOptions {
  /** Deadline for this call in ms. Overrides the client's `timeout`. */
  timeout?: number
}

/** Window for `queryHistory`. */
export interface HistoryOptions extends CallOptions {
  /** Oldest event to return, ISO-8601 or a `Date`. The service defaults to 24h ago. */
  since?: string | Date
  /** Most events to return. Clamped to 1..500; the service defaults to 100. */
  limit?: number
}

export interface SubscriptionOptions {
  /**
   * Base address of the service. `http:` / `https:` become `ws:` / `wss:`
   * and `/api/ws` is appended. A `ws:` / `wss:` base is used as-is apart
   * from the appended path.
   */
  url: string
  /** Restrict the subscription to a single entity. Fixed for the session's lifetime. */
  entityId?: string
  /** WebSocket handshake deadline in ms. Defaults to `10000`. */
  connectTimeout?: number
  /**
   * Longest single wait for the next frame, in ms. An elapsed wait is not an
   * error and is not surfaced; it bounds how long cancellation can go
   * unnoticed. Defaults to `1000`.
   */
  receiveTimeout?: number
  /** Aborting the signal cancels the session. */
  signal?: AbortSignal
  logger?: Logger
}

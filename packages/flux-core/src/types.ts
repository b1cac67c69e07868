/**
 * A JSON value as produced by `JSON.parse`.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue }

/**
 * A typed entity property. Textual input becomes a `PropertyValue` by strict
 * JSON parse, falling back to the original text (see `decodeValue`).
 */
export type PropertyValue = JsonValue

/** Property name → value. Keys are unique. */
export type Properties = Record<string, PropertyValue>

// ---------------------------------------------------------------------------
// Events (client → service)
// ---------------------------------------------------------------------------

/**
 * An event as constructed for one publish call. Built by `buildEvent`, which
 * stamps `timestamp`; callers never supply it.
 */
export interface FluxEvent {
  /** Logical namespace the event is published under (e.g. `"sensors"`). */
  readonly stream: string
  /** Producer identity (e.g. `"sensor-01"`). */
  readonly source: string
  /** Epoch milliseconds, assigned at construction. */
  readonly timestamp: number
  readonly entityId: string
  readonly properties: Readonly<Properties>
  /** Ordering / grouping hint. */
  readonly key?: string
  /** Schema metadata tag; not interpreted by the service. */
  readonly schema?: string
}

/** Input accepted by `buildEvent`. */
export interface EventInit {
  stream: string
  source: string
  entityId: string
  properties: Properties
  key?: string
  schema?: string
}

/** The JSON body of `POST /api/events`. Field names are dictated by the service. */
export interface WireEvent {
  stream: string
  source: string
  timestamp: number
  payload: {
    entity_id: string
    properties: Properties
  }
  key?: string
  schema?: string
}

export interface PublishReceipt {
  readonly eventId: string
  readonly stream: string
}

export interface BatchItemReceipt {
  readonly eventId?: string
  readonly stream?: string
  readonly error?: string
}

export interface BatchReceipt {
  readonly successful: number
  readonly failed: number
  readonly results: ReadonlyArray<BatchItemReceipt>
}

// ---------------------------------------------------------------------------
// Entities (service → client)
// ---------------------------------------------------------------------------

/**
 * A read-only copy of an entity owned by the service.
 */
export interface Entity {
  readonly id: string
  readonly properties: Readonly<Properties>
  /** ISO-8601 timestamp of the last change, as reported by the service. */
  readonly lastUpdated: string
}

/**
 * Narrows `GET /api/state/entities`. Both filters combine with AND.
 */
export interface EntityFilter {
  /** Exact match on the `namespace/` prefix of the entity id. */
  namespace?: string
  /** Plain string prefix match on the entity id. */
  prefix?: string
}

/**
 * One stored event as returned by `GET /api/events`. `payload` is kept as the
 * service stored it.
 */
export interface HistoryEvent {
  readonly eventId?: string
  readonly stream: string
  readonly source: string
  readonly timestamp: number
  readonly key?: string
  readonly schema?: string
  readonly payload: JsonValue
}

// ---------------------------------------------------------------------------
// Deletion
// ---------------------------------------------------------------------------

/** Selects the entities removed by one batch delete. Exactly one form. */
export type DeleteFilter =
  | { readonly namespace: string }
  | { readonly prefix: string }
  | { readonly entityIds: ReadonlyArray<string> }

/** The service records a deletion as a tombstone event. */
export interface DeleteReceipt {
  readonly entityId: string
  readonly eventId: string
}

export interface BatchDeleteReceipt {
  readonly deleted: number
  readonly failed: number
  /** One `"<entityId>: <reason>"` line per failed deletion. */
  readonly errors: ReadonlyArray<string>
}

// ---------------------------------------------------------------------------
// Subscription protocol
// ---------------------------------------------------------------------------

/** The single outbound frame, sent once per session right after the handshake. */
export type SubscribeFrame =
  | { type: 'subscribe' }
  | { type: 'subscribe'; entityId: string }

/**
 * An inbound frame, classified.
 *
 * - `snapshot`: full current state of one entity, sent after subscribing.
 * - `update`: replacement state of one entity after a change.
 * - `unrecognized`: anything else, kept verbatim.
 */
export type SubscriptionMessage =
  | { readonly type: 'snapshot'; readonly entity: Entity }
  | { readonly type: 'update'; readonly entity: Entity }
  | { readonly type: 'unrecognized'; readonly raw: string }

export type SnapshotMessage = Extract<SubscriptionMessage, { type: 'snapshot' }>
export type UpdateMessage = Extract<SubscriptionMessage, { type: 'update' }>
export type UnrecognizedMessage = Extract<
  SubscriptionMessage,
  { type: 'unrecognized' }
>

/**
 * Lifecycle of a subscription session.
 *
 * - `'disconnected'`: created, `open()` not called yet.
 * - `'connecting'`: WebSocket handshake in progress.
 * - `'subscribing'`: subscribe frame sent, no inbound frame yet.
 * - `'streaming'`: at least one frame received.
 * - `'closing'` / `'closed'`: cancelled by the caller.
 * - `'failed'`: the connection could not be opened or was lost.
 */
export type SessionStatus =
  | 'disconnected'
  | 'connecting'
  | 'subscribing'
  | 'streaming'
  | 'closing'
  | 'closed'
  | 'failed'

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}

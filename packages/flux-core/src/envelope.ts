import { FormatError } from './errors.js'
import type { EventInit, FluxEvent, WireEvent } from './types.js'

function requireNonEmpty(field: string, value: string): void {
  if (typeof value !== 'string' || value.length === 0) {
    throw new FormatError(`'${field}' must be a non-empty string`)
  }
}

/**
 * Assemble an immutable event for one publish call.
 *
 * Reads the clock once to stamp `timestamp` (epoch ms). The caller's
 * `properties` object is copied, never mutated or retained.
 *
 * @throws {FormatError} when `stream`, `source` or `entityId` is empty, or
 * the clock does not return a positive integer.
 *
 * @example
 * const event = buildEvent({
 *   stream: 'sensors',
 *   source: 'demo',
 *   entityId: 'sensor-1',
 *   properties: parseProperties(['temperature=22.5']),
 * })
 */
export function buildEvent(
  init: EventInit,
  now: () => number = Date.now,
): FluxEvent {
  requireNonEmpty('stream', init.stream)
  requireNonEmpty('source', init.source)
  requireNonEmpty('entityId', init.entityId)

  const timestamp = now()
  if (!Number.isInteger(timestamp) || timestamp <= 0) {
    throw new FormatError(`'timestamp' must be a positive integer, got ${timestamp}`)
  }

  const event: FluxEvent = {
    stream: init.stream,
    source: init.source,
    timestamp,
    entityId: init.entityId,
    properties: Object.freeze({ ...init.properties }),
    // An empty key or schema is the same as none.
    ...(init.key ? { key: init.key } : {}),
    ...(init.schema ? { schema: init.schema } : {}),
  }
  return Object.freeze(event)
}

/**
 * The wire form of an event for `POST /api/events`. Pure: the same event
 * always yields the same body. `key` and `schema` are left out entirely when
 * they are absent or empty.
 */
export function toWireEvent(event: FluxEvent): WireEvent {
  const wire: WireEvent = {
    stream: event.stream,
    source: event.source,
    timestamp: event.timestamp,
    payload: {
      entity_id: event.entityId,
      properties: { ...event.properties },
    },
  }
  if (event.key) wire.key = event.key
  if (event.schema) wire.schema = event.schema
  return wire
}

import type {
  Entity,
  JsonValue,
  PropertyValue,
  SubscriptionMessage,
} from './types.js'

export interface FormatOptions {
  /** Single-line output. Defaults to `true` for messages, `false` for entities. */
  compact?: boolean
}

/** Strings are shown bare; everything else as compact JSON. */
export function formatValue(value: PropertyValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value)
}

// DEL and everything above ASCII, as lowercase `\uXXXX` escapes.
function escapeNonAscii(json: string): string {
  return json.replace(
    /[\u007f-\uffff]/g,
    (c) => `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`,
  )
}

/**
 * JSON text in the display dialect: `, ` between items, `: ` after keys, and
 * ASCII-only output.
 *
 * @example
 * toDisplayJson({ t: 22.5, city: 'Zürich' })
 * // '{"t": 22.5, "city": "Z\\u00fcrich"}'
 */
export function toDisplayJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(toDisplayJson).join(', ')}]`
  }
  if (value !== null && typeof value === 'object') {
    const members = Object.entries(value).map(
      ([key, item]) => `${escapeNonAscii(JSON.stringify(key))}: ${toDisplayJson(item)}`,
    )
    return `{${members.join(', ')}}`
  }
  return escapeNonAscii(JSON.stringify(value))
}

function prettyJson(value: unknown): string {
  return escapeNonAscii(JSON.stringify(value, null, 2))
}

function formatPropertyList(entity: Entity): string {
  return Object.entries(entity.properties)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(', ')
}

// ISO-8601 down to the second, e.g. `2024-01-01T00:00:00`
function shortTime(lastUpdated: string): string {
  return lastUpdated.slice(0, 19)
}

/**
 * Render an entity for display.
 *
 * @example
 * formatEntity(entity, { compact: true })
 * // 'sensor-1: t=22.5, status=online (updated: 2024-01-01T00:00:00)'
 */
export function formatEntity(entity: Entity, options: FormatOptions = {}): string {
  if (options.compact) {
    return `${entity.id}: ${formatPropertyList(entity)} (updated: ${shortTime(entity.lastUpdated)})`
  }
  return [
    `Entity: ${entity.id}`,
    `Last Updated: ${entity.lastUpdated}`,
    'Properties:',
    prettyJson(entity.properties),
  ].join('\n')
}

/**
 * Render a subscription message for display.
 *
 * Compact (default):
 * - update → `[2024-01-01T00:00:00] sensor-1: t=22.5`
 * - snapshot → `[SNAPSHOT] sensor-1: {"t": 22.5}`
 * - unrecognized → the frame, pretty-printed when it is JSON
 *
 * Non-compact prints a `[SNAPSHOT]` / `[UPDATE]` header over the multi-line
 * entity form.
 */
export function formatMessage(
  message: SubscriptionMessage,
  options: FormatOptions = {},
): string {
  const compact = options.compact ?? true
  switch (message.type) {
    case 'update':
      return compact
        ? `[${shortTime(message.entity.lastUpdated)}] ${message.entity.id}: ${formatPropertyList(message.entity)}`
        : `[UPDATE]\n${formatEntity(message.entity)}`
    case 'snapshot':
      return compact
        ? `[SNAPSHOT] ${message.entity.id}: ${toDisplayJson(message.entity.properties)}`
        : `[SNAPSHOT]\n${formatEntity(message.entity)}`
    case 'unrecognized':
      return formatRaw(message.raw)
  }
}

function formatRaw(raw: string): string {
  try {
    return prettyJson(JSON.parse(raw))
  } catch {
    return raw
  }
}

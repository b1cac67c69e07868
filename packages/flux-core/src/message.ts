import { z } from 'zod'
import type {
  Entity,
  JsonValue,
  SnapshotMessage,
  SubscriptionMessage,
  UnrecognizedMessage,
  UpdateMessage,
} from './types.js'

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
)

/** Shape of an entity as served by `/api/state/entities` and in frames. */
export const entitySchema = z.object({
  id: z.string(),
  properties: z.record(z.string(), jsonValueSchema),
  lastUpdated: z.string(),
})

export const entityListSchema = z.array(entitySchema)

const entityFrameSchema = z.object({
  type: z.enum(['snapshot', 'update']),
  entity: entitySchema,
})

export const publishReceiptSchema = z.object({
  eventId: z.string(),
  stream: z.string(),
})

export const batchReceiptSchema = z.object({
  successful: z.number().int(),
  failed: z.number().int(),
  results: z.array(
    z.object({
      eventId: z.string().nullish().transform((v) => v ?? undefined),
      stream: z.string().nullish().transform((v) => v ?? undefined),
      error: z.string().nullish().transform((v) => v ?? undefined),
    }),
  ),
})

export const historyEventSchema = z.object({
  eventId: z.string().optional(),
  stream: z.string(),
  source: z.string(),
  timestamp: z.number().int(),
  key: z.string().optional(),
  schema: z.string().optional(),
  payload: jsonValueSchema,
})

export const historyListSchema = z.array(historyEventSchema)

export const deleteReceiptSchema = z
  .object({ entity_id: z.string(), eventId: z.string() })
  .transform(({ entity_id, eventId }) => ({ entityId: entity_id, eventId }))

export const batchDeleteReceiptSchema = z.object({
  deleted: z.number().int(),
  failed: z.number().int(),
  errors: z.array(z.string()),
})

// ---------------------------------------------------------------------------
// Frame classification
// ---------------------------------------------------------------------------

/**
 * Classify one inbound subscription frame.
 *
 * Never throws. A frame that is not JSON, has a `type` other than
 * `"snapshot"` / `"update"`, or carries an entity of the wrong shape comes
 * back as `{ type: 'unrecognized', raw }` with the text untouched, so a single
 * bad frame cannot end an otherwise healthy stream.
 */
export function parseSubscriptionMessage(raw: string): SubscriptionMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return { type: 'unrecognized', raw }
  }

  const frame = entityFrameSchema.safeParse(parsed)
  if (!frame.success) {
    return { type: 'unrecognized', raw }
  }
  const entity: Entity = frame.data.entity
  return frame.data.type === 'snapshot'
    ? { type: 'snapshot', entity }
    : { type: 'update', entity }
}

export function isSnapshot(msg: SubscriptionMessage): msg is SnapshotMessage {
  return msg.type === 'snapshot'
}

export function isUpdate(msg: SubscriptionMessage): msg is UpdateMessage {
  return msg.type === 'update'
}

export function isUnrecognized(
  msg: SubscriptionMessage,
): msg is UnrecognizedMessage {
  return msg.type === 'unrecognized'
}

/**
 * @fluxstate/core
 *
 * Data model, property codec, event envelopes, subscription frame parsing and
 * display formatting. No I/O; shared by the client and by tests.
 */

export type {
  JsonValue,
  PropertyValue,
  Properties,
  FluxEvent,
  EventInit,
  WireEvent,
  PublishReceipt,
  BatchItemReceipt,
  BatchReceipt,
  Entity,
  EntityFilter,
  HistoryEvent,
  DeleteFilter,
  DeleteReceipt,
  BatchDeleteReceipt,
  SubscribeFrame,
  SubscriptionMessage,
  SnapshotMessage,
  UpdateMessage,
  UnrecognizedMessage,
  SessionStatus,
  Result,
} from './types.js'
export { ok, err } from './types.js'

export {
  decodeValue,
  parseToken,
  parseProperties,
  encodeValue,
  encodeProperties,
} from './codec.js'

export { buildEvent, toWireEvent } from './envelope.js'

export {
  jsonValueSchema,
  entitySchema,
  entityListSchema,
  publishReceiptSchema,
  batchReceiptSchema,
  historyEventSchema,
  historyListSchema,
  deleteReceiptSchema,
  batchDeleteReceiptSchema,
  parseSubscriptionMessage,
  isSnapshot,
  isUpdate,
  isUnrecognized,
} from './message.js'

export {
  formatValue,
  formatEntity,
  formatMessage,
  toDisplayJson,
} from './format.js'
export type { FormatOptions } from './format.js'

export {
  FluxError,
  FormatError,
  UnreachableError,
  TimeoutError,
  NotFoundError,
  ServerError,
  ConnectionLostError,
} from './errors.js'
export type {
  FluxErrorCode,
  RequestError,
  QueryError,
  SessionError,
} from './errors.js'

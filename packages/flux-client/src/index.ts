export { createFluxClient } from './client.js'
export type {
  FluxClient,
  FluxClientOptions,
  SubscribeOptions,
} from './client.js'

export { createSubscriptionSession } from './session.js'
export type { SubscriptionSession } from './session.js'

export { createQueryClient } from './query.js'
export type { QueryClient } from './query.js'

export { createPublisher } from './publish.js'
export type { Publisher } from './publish.js'

export { createDeleter } from './deletion.js'
export type { Deleter } from './deletion.js'

export { resolveHttpBase, resolveSubscriptionUrl } from './endpoint.js'
export { createConsoleLogger, silentLogger } from './logger.js'

export type {
  Logger,
  FetchFn,
  HttpClientOptions,
  CallOptions,
  HistoryOptions,
  SubscriptionOptions,
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
} from './types.js'

import type {
  BatchDeleteReceipt,
  BatchReceipt,
  DeleteFilter,
  DeleteReceipt,
  Entity,
  EntityFilter,
  FluxEvent,
  HistoryEvent,
  PublishReceipt,
  QueryError,
  RequestError,
  Result,
} from '@fluxstate/core'
import { createDeleter } from './deletion.js'
import { DEFAULT_TIMEOUT } from './http.js'
import { createPublisher } from './publish.js'
import { createQueryClient } from './query.js'
import {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_RECEIVE_TIMEOUT,
  createSubscriptionSession,
} from './session.js'
import type { SubscriptionSession } from './session.js'
import type { CallOptions, FetchFn, HistoryOptions, Logger } from './types.js'

export interface FluxClientOptions {
  /** Base address of the service, e.g. `"http://localhost:3000"`. */
  url: string
  /** HTTP deadline in ms. Default: 10000 */
  timeout?: number
  /** WebSocket handshake deadline in ms. Default: 10000 */
  connectTimeout?: number
  /** Longest idle wait per receive in ms. Default: 1000 */
  receiveTimeout?: number
  fetch?: FetchFn
  logger?: Logger
}

export interface SubscribeOptions {
  /** Only receive frames for this entity. */
  entityId?: string
  /** Aborting the signal cancels the session. */
  signal?: AbortSignal
}

export interface FluxClient {
  publish(
    event: FluxEvent,
    options?: CallOptions,
  ): Promise<Result<PublishReceipt, RequestError>>
  publishBatch(
    events: ReadonlyArray<FluxEvent>,
    options?: CallOptions,
  ): Promise<Result<BatchReceipt, RequestError>>
  queryOne(
    entityId: string,
    options?: CallOptions,
  ): Promise<Result<Entity, QueryError>>
  queryAll(
    filter?: EntityFilter,
    options?: CallOptions,
  ): Promise<Result<Entity[], QueryError>>
  queryHistory(
    entityId: string,
    options?: HistoryOptions,
  ): Promise<Result<HistoryEvent[], RequestError>>
  deleteEntity(
    entityId: string,
    options?: CallOptions,
  ): Promise<Result<DeleteReceipt, RequestError>>
  deleteEntities(
    filter: DeleteFilter,
    options?: CallOptions,
  ): Promise<Result<BatchDeleteReceipt, RequestError>>
  /**
   * Create a new, unopened subscription session. Every call returns an
   * independent session with its own connection and cache.
   */
  subscribe(options?: SubscribeOptions): SubscriptionSession
}

/**
 * One configuration for every service operation.
 *
 * @example
 * const flux = createFluxClient({ url: 'http://localhost:3000' })
 *
 * const found = await flux.queryOne('sensor-1')
 *
 * const session = flux.subscribe({ entityId: 'sensor-1' })
 * for await (const message of session) {
 *   // ...
 * }
 */
export function createFluxClient(options: FluxClientOptions): FluxClient {
  const {
    url,
    timeout = DEFAULT_TIMEOUT,
    connectTimeout = DEFAULT_CONNECT_TIMEOUT,
    receiveTimeout = DEFAULT_RECEIVE_TIMEOUT,
    fetch,
    logger,
  } = options

  const http = { url, timeout, fetch, logger }
  const query = createQueryClient(http)
  const publisher = createPublisher(http)
  const deleter = createDeleter(http)

  return {
    publish: (event, callOptions) => publisher.publish(event, callOptions),
    publishBatch: (events, callOptions) =>
      publisher.publishBatch(events, callOptions),
    queryOne: (entityId, callOptions) => query.queryOne(entityId, callOptions),
    queryAll: (filter, callOptions) => query.queryAll(filter, callOptions),
    queryHistory: (entityId, historyOptions) =>
      query.queryHistory(entityId, historyOptions),
    deleteEntity: (entityId, callOptions) =>
      deleter.deleteEntity(entityId, callOptions),
    deleteEntities: (filter, callOptions) =>
      deleter.deleteEntities(filter, callOptions),
    subscribe: (subscribeOptions = {}) =>
      createSubscriptionSession({
        url,
        entityId: subscribeOptions.entityId,
        signal: subscribeOptions.signal,
        connectTimeout,
        receiveTimeout,
        logger,
      }),
  }
}

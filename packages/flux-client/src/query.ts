import {
  FormatError,
  NotFoundError,
  entityListSchema,
  entitySchema,
  err,
  historyListSchema,
} from '@fluxstate/core'
import type {
  Entity,
  EntityFilter,
  HistoryEvent,
  QueryError,
  RequestError,
  Result,
} from '@fluxstate/core'
import { decodeBody, resolveHttpConfig, send, toServerError } from './http.js'
import type { CallOptions, HistoryOptions, HttpClientOptions } from './types.js'

export interface QueryClient {
  /**
   * Fetch one entity. A 404 resolves to `NotFoundError`, distinct from
   * `ServerError`.
   */
  queryOne(
    entityId: string,
    options?: CallOptions,
  ): Promise<Result<Entity, QueryError>>
  /** Fetch every entity, optionally narrowed by namespace and/or id prefix. */
  queryAll(
    filter?: EntityFilter,
    options?: CallOptions,
  ): Promise<Result<Entity[], QueryError>>
  /**
   * Stored events for one entity, newest first. An entity with no events
   * yields an empty list, not `NotFoundError`.
   *
   * @throws {FormatError} for an empty id, an unparsable `since` or a
   * non-integer `limit`.
   */
  queryHistory(
    entityId: string,
    options?: HistoryOptions,
  ): Promise<Result<HistoryEvent[], RequestError>>
}

const ENTITIES_PATH = '/api/state/entities'
const EVENTS_PATH = '/api/events'
const HISTORY_LIMIT_MAX = 500

function toTimestamp(since: string | Date): string {
  const time = typeof since === 'string' ? Date.parse(since) : since.getTime()
  if (Number.isNaN(time)) {
    throw new FormatError(`Invalid 'since' timestamp '${String(since)}'. Use ISO-8601`)
  }
  return typeof since === 'string' ? since : since.toISOString()
}

function historySearch(entityId: string, options: HistoryOptions): string {
  if (entityId.length === 0) {
    throw new FormatError(`'entityId' must be a non-empty string`)
  }
  const qs = new URLSearchParams({ entity: entityId })
  if (options.since !== undefined) qs.set('since', toTimestamp(options.since))
  if (options.limit !== undefined) {
    if (!Number.isInteger(options.limit)) {
      throw new FormatError(`'limit' must be an integer, got ${options.limit}`)
    }
    qs.set('limit', String(Math.min(HISTORY_LIMIT_MAX, Math.max(1, options.limit))))
  }
  return qs.toString()
}

/**
 * Creates a stateless client for `/api/state/entities`. Safe to share across
 * concurrent callers. No call is retried.
 *
 * @example
 * const query = createQueryClient({ url: 'http://localhost:3000' })
 * const result = await query.queryOne('sensor-1')
 * if (result.ok) console.log(result.value.properties)
 * else if (result.error instanceof NotFoundError) console.log('no such entity')
 */
export function createQueryClient(options: HttpClientOptions): QueryClient {
  const config = resolveHttpConfig(options)

  return {
    async queryOne(entityId, callOptions = {}) {
      const sent = await send(
        config,
        'GET',
        `${ENTITIES_PATH}/${encodeURIComponent(entityId)}`,
        callOptions,
      )
      if (!sent.ok) return sent
      const res = sent.value
      if (res.status === 404) return err(new NotFoundError(entityId))
      if (!res.ok) return err(toServerError(res))
      return decodeBody(res, entitySchema)
    },

    async queryAll(filter = {}, callOptions = {}) {
      const qs = new URLSearchParams()
      if (filter.namespace) qs.set('namespace', filter.namespace)
      if (filter.prefix) qs.set('prefix', filter.prefix)
      const q = qs.toString()

      const sent = await send(
        config,
        'GET',
        `${ENTITIES_PATH}${q ? `?${q}` : ''}`,
        callOptions,
      )
      if (!sent.ok) return sent
      const res = sent.value
      if (!res.ok) return err(toServerError(res))
      return decodeBody(res, entityListSchema)
    },

    async queryHistory(entityId, historyOptions = {}) {
      const sent = await send(
        config,
        'GET',
        `${EVENTS_PATH}?${historySearch(entityId, historyOptions)}`,
        { timeout: historyOptions.timeout },
      )
      if (!sent.ok) return sent
      const res = sent.value
      if (!res.ok) return err(toServerError(res))
      return decodeBody(res, historyListSchema)
    },
  }
}

import {
  FormatError,
  batchDeleteReceiptSchema,
  deleteReceiptSchema,
  err,
} from '@fluxstate/core'
import type {
  BatchDeleteReceipt,
  DeleteFilter,
  DeleteReceipt,
  RequestError,
  Result,
} from '@fluxstate/core'
import { decodeBody, resolveHttpConfig, send, toServerError } from './http.js'
import type { CallOptions, HttpClientOptions } from './types.js'

export interface Deleter {
  /**
   * `DELETE /api/state/entities/:id`. The service publishes a tombstone event
   * and answers with its id; deleting an unknown entity is not an error.
   */
  deleteEntity(
    entityId: string,
    options?: CallOptions,
  ): Promise<Result<DeleteReceipt, RequestError>>
  /**
   * `POST /api/state/entities/delete` for every entity in a namespace, under
   * an id prefix, or in an explicit list. Per-entity failures are listed in
   * the receipt.
   */
  deleteEntities(
    filter: DeleteFilter,
    options?: CallOptions,
  ): Promise<Result<BatchDeleteReceipt, RequestError>>
}

type WireDeleteFilter =
  | { namespace: string }
  | { prefix: string }
  | { entity_ids: string[] }

function requireNonEmpty(field: string, value: string): string {
  if (value.length === 0) {
    throw new FormatError(`'${field}' must be a non-empty string`)
  }
  return value
}

// An empty namespace or prefix would match every entity.
function toWireFilter(filter: DeleteFilter): WireDeleteFilter {
  if ('entityIds' in filter) return { entity_ids: [...filter.entityIds] }
  if ('namespace' in filter) {
    return { namespace: requireNonEmpty('namespace', filter.namespace) }
  }
  return { prefix: requireNonEmpty('prefix', filter.prefix) }
}

/**
 * Creates a stateless client for entity deletion.
 *
 * @example
 * const deleter = createDeleter({ url: 'http://localhost:3000' })
 * await deleter.deleteEntity('sensors/temp-1')
 * await deleter.deleteEntities({ prefix: 'sensors/temp-' })
 */
export function createDeleter(options: HttpClientOptions): Deleter {
  const config = resolveHttpConfig(options)

  return {
    async deleteEntity(entityId, callOptions = {}) {
      const id = requireNonEmpty('entityId', entityId)
      const sent = await send(
        config,
        'DELETE',
        `/api/state/entities/${encodeURIComponent(id)}`,
        callOptions,
      )
      if (!sent.ok) return sent
      const res = sent.value
      if (!res.ok) return err(toServerError(res))
      return decodeBody(res, deleteReceiptSchema)
    },

    async deleteEntities(filter, callOptions = {}) {
      const sent = await send(config, 'POST', '/api/state/entities/delete', {
        ...callOptions,
        body: toWireFilter(filter),
      })
      if (!sent.ok) return sent
      const res = sent.value
      if (!res.ok) return err(toServerError(res))
      return decodeBody(res, batchDeleteReceiptSchema)
    },
  }
}

import {
  batchReceiptSchema,
  err,
  publishReceiptSchema,
  toWireEvent,
} from '@fluxstate/core'
import type {
  BatchReceipt,
  FluxEvent,
  PublishReceipt,
  RequestError,
  Result,
} from '@fluxstate/core'
import { decodeBody, resolveHttpConfig, send, toServerError } from './http.js'
import type { CallOptions, HttpClientOptions } from './types.js'

export interface Publisher {
  /** `POST /api/events`. Resolves with the service-assigned event id. */
  publish(
    event: FluxEvent,
    options?: CallOptions,
  ): Promise<Result<PublishReceipt, RequestError>>
  /**
   * `POST /api/events/batch`. The service validates each event on its own;
   * per-event failures are listed in the receipt, not returned as an error.
   */
  publishBatch(
    events: ReadonlyArray<FluxEvent>,
    options?: CallOptions,
  ): Promise<Result<BatchReceipt, RequestError>>
}

/**
 * Creates a stateless publisher. Build events with `buildEvent`.
 *
 * @example
 * const publisher = createPublisher({ url: 'http://localhost:3000' })
 * const event = buildEvent({
 *   stream: 'sensors',
 *   source: 'demo',
 *   entityId: 'sensor-1',
 *   properties: parseProperties(['temperature=22.5', 'active=true']),
 * })
 * const result = await publisher.publish(event)
 */
export function createPublisher(options: HttpClientOptions): Publisher {
  const config = resolveHttpConfig(options)

  return {
    async publish(event, callOptions = {}) {
      const sent = await send(config, 'POST', '/api/events', {
        ...callOptions,
        body: toWireEvent(event),
      })
      if (!sent.ok) return sent
      const res = sent.value
      if (!res.ok) return err(toServerError(res))
      return decodeBody(res, publishReceiptSchema)
    },

    async publishBatch(events, callOptions = {}) {
      const sent = await send(config, 'POST', '/api/events/batch', {
        ...callOptions,
        body: { events: events.map(toWireEvent) },
      })
      if (!sent.ok) return sent
      const res = sent.value
      if (!res.ok) return err(toServerError(res))
      return decodeBody(res, batchReceiptSchema)
    },
  }
}

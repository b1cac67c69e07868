/**
 * Tests for entity deletion against a fetch stand-in and the stub service.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { FormatError, ServerError, TimeoutError } from '@fluxstate/core'
import type { DeleteFilter, Entity } from '@fluxstate/core'
import { createDeleter, createQueryClient, silentLogger } from '@fluxstate/client'
import { createStubService } from './stubService.js'
import type { StubService } from './stubService.js'

const BASE = 'http://localhost:3000'

function respond(status: number, body: string) {
  return vi.fn(async (_input: string, _init?: RequestInit) => new Response(body, { status }))
}

describe('createDeleter (fetch stand-in)', () => {
  it('deletes one entity by its encoded id', async () => {
    const fetch = respond(200, '{"entity_id":"rooms/a b","eventId":"evt-7"}')
    const deleter = createDeleter({ url: BASE, fetch, logger: silentLogger })

    const result = await deleter.deleteEntity('rooms/a b')

    expect(result).toEqual({ ok: true, value: { entityId: 'rooms/a b', eventId: 'evt-7' } })
    expect(fetch.mock.calls[0]?.[0]).toBe(`${BASE}/api/state/entities/rooms%2Fa%20b`)
    expect(fetch.mock.calls[0]?.[1]?.method).toBe('DELETE')
    expect(fetch.mock.calls[0]?.[1]?.body).toBeUndefined()
  })

  it.each<[DeleteFilter, string]>([
    [{ namespace: 'sensors' }, '{"namespace":"sensors"}'],
    [{ prefix: 'sensors/temp-' }, '{"prefix":"sensors/temp-"}'],
    [{ entityIds: ['a', 'b'] }, '{"entity_ids":["a","b"]}'],
  ])('posts the batch filter %j', async (filter, body) => {
    const fetch = respond(200, '{"deleted":2,"failed":0,"errors":[]}')
    const deleter = createDeleter({ url: BASE, fetch, logger: silentLogger })

    const result = await deleter.deleteEntities(filter)

    expect(result).toEqual({ ok: true, value: { deleted: 2, failed: 0, errors: [] } })
    expect(fetch.mock.calls[0]?.[0]).toBe(`${BASE}/api/state/entities/delete`)
    expect(fetch.mock.calls[0]?.[1]?.method).toBe('POST')
    expect(fetch.mock.calls[0]?.[1]?.body).toBe(body)
  })

  it('rejects an empty id, namespace or prefix before sending', async () => {
    const fetch = respond(200, '{}')
    const deleter = createDeleter({ url: BASE, fetch, logger: silentLogger })

    await expect(deleter.deleteEntity('')).rejects.toThrow(FormatError)
    await expect(deleter.deleteEntities({ namespace: '' })).rejects.toThrow(
      "'namespace' must be a non-empty string",
    )
    await expect(deleter.deleteEntities({ prefix: '' })).rejects.toThrow(
      "'prefix' must be a non-empty string",
    )
    expect(fetch).not.toHaveBeenCalled()
  })

  it('maps an error status to ServerError', async () => {
    const deleter = createDeleter({
      url: BASE,
      fetch: respond(403, 'forbidden'),
      logger: silentLogger,
    })

    const result = await deleter.deleteEntity('sensor-1')

    if (result.ok) throw new Error('expected failure')
    expect(result.error).toBeInstanceOf(ServerError)
    expect(result.error).toMatchObject({ status: 403, detail: 'forbidden' })
  })

  it('reports a receipt of the wrong shape as ServerError', async () => {
    const deleter = createDeleter({
      url: BASE,
      fetch: respond(200, '{"deleted":"all"}'),
      logger: silentLogger,
    })

    const result = await deleter.deleteEntities({ prefix: 'x' })

    expect(!result.ok && result.error).toBeInstanceOf(ServerError)
  })

  it('maps an elapsed deadline to TimeoutError', async () => {
    const fetch = vi.fn(async (_input: string, _init?: RequestInit): Promise<Response> => {
      throw Object.assign(new Error('aborted'), { name: 'TimeoutError' })
    })
    const deleter = createDeleter({ url: BASE, fetch, logger: silentLogger })

    const result = await deleter.deleteEntity('sensor-1', { timeout: 50 })

    expect(!result.ok && result.error).toBeInstanceOf(TimeoutError)
  })
})

describe('createDeleter (stub service)', () => {
  let service: StubService | undefined

  afterEach(async () => {
    await service?.close()
    service = undefined
  })

  const entity = (id: string): Entity => ({
    id,
    properties: { on: true },
    lastUpdated: '2024-01-01T00:00:00Z',
  })

  it('removes entities from the state store', async () => {
    service = await createStubService({
      entities: [
        entity('sensors/temp-1'),
        entity('sensors/temp-2'),
        entity('sensors/hum-1'),
        entity('rooms/kitchen'),
      ],
    })
    const deleter = createDeleter({ url: service.url, logger: silentLogger })
    const query = createQueryClient({ url: service.url, logger: silentLogger })

    expect(await deleter.deleteEntity('rooms/kitchen')).toEqual({
      ok: true,
      value: { entityId: 'rooms/kitchen', eventId: 'evt-1' },
    })
    expect(await deleter.deleteEntities({ prefix: 'sensors/temp-' })).toEqual({
      ok: true,
      value: { deleted: 2, failed: 0, errors: [] },
    })

    const left = await query.queryAll()
    expect(left.ok && left.value.map((e) => e.id)).toEqual(['sensors/hum-1'])
  })
})

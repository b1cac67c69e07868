import { WebSocket } from 'ws'
import type { RawData } from 'ws'
import { Store } from '@tanstack/store'
import {
  ConnectionLostError,
  ServerError,
  TimeoutError,
  UnreachableError,
  parseSubscriptionMessage,
} from '@fluxstate/core'
import type {
  Entity,
  SessionError,
  SessionStatus,
  SubscribeFrame,
  SubscriptionMessage,
} from '@fluxstate/core'
import { requireTimeout, resolveSubscriptionUrl } from './endpoint.js'
import { readDetail } from './http.js'
import { createConsoleLogger } from './logger.js'
import type { SubscriptionOptions } from './types.js'

export const DEFAULT_CONNECT_TIMEOUT = 10_000
export const DEFAULT_RECEIVE_TIMEOUT = 1_000

export interface SubscriptionSession extends AsyncIterable<SubscriptionMessage> {
  /** TanStack Store holding the current {@link SessionStatus}. */
  readonly store: Store<SessionStatus>
  readonly status: SessionStatus
  /** The derived WebSocket endpoint, e.g. `ws://localhost:3000/api/ws`. */
  readonly url: string
  /** Entity filter sent with the subscribe frame, if any. */
  readonly entityId: string | undefined
  /** Why the session ended in `'failed'`; `undefined` otherwise. */
  readonly error: SessionError | undefined
  /**
   * Latest known state per entity id for the current run, as a copy.
   * Discarded when the session closes or fails.
   */
  readonly entities: ReadonlyMap<string, Entity>
  /** Latest known state of one entity, if it has been seen in this run. */
  get(entityId: string): Entity | undefined

  /**
   * Connect and send the subscribe frame. Resolves once the frame is sent,
   * or immediately if the session is cancelled meanwhile. Rejects with
   * `UnreachableError`, `TimeoutError` or `ServerError` and leaves the session
   * `'failed'`. Allowed from `'disconnected'`, `'closed'` and `'failed'`;
   * reopening starts from an empty cache.
   */
  open(): Promise<void>

  /**
   * Close the connection and end iteration. Idempotent. Messages already
   * yielded stay yielded; queued ones are dropped.
   */
  cancel(): void

  /**
   * Yields one message per inbound frame, in arrival order. Opens the session
   * first when it is still `'disconnected'`. Ends after `cancel()`; throws the
   * session error after `'failed'` once earlier messages are drained.
   * Breaking out of the loop cancels the session. One consumer at a time.
   */
  messages(): AsyncGenerator<SubscriptionMessage, void, undefined>
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  return Buffer.from(data).toString('utf8')
}

/**
 * Creates a subscription session against the service's `/api/ws` endpoint.
 *
 * The session owns its connection and its entity cache; two sessions never
 * share either. Snapshot and update frames both replace the cached entity
 * for their id wholesale before the message is handed to the consumer.
 *
 * @example
 * const session = createSubscriptionSession({
 *   url: 'http://localhost:3000',
 *   entityId: 'sensor-1',
 * })
 *
 * for await (const message of session) {
 *   console.log(formatMessage(message))
 * }
 */
export function createSubscriptionSession(
  options: SubscriptionOptions,
): SubscriptionSession {
  const {
    entityId,
    connectTimeout = DEFAULT_CONNECT_TIMEOUT,
    receiveTimeout = DEFAULT_RECEIVE_TIMEOUT,
    signal,
    logger = createConsoleLogger('session'),
  } = options
  const url = resolveSubscriptionUrl(options.url)
  requireTimeout('connectTimeout', connectTimeout)
  requireTimeout('receiveTimeout', receiveTimeout)

  const store = new Store<SessionStatus>('disconnected')
  const cache = new Map<string, Entity>()
  const queue: SubscriptionMessage[] = []

  let socket: WebSocket | null = null
  // Bumped on every open(); handlers from an older socket compare and bail.
  let generation = 0
  let framesReceived = 0
  let lastSocketError: Error | undefined
  let terminalError: SessionError | undefined
  let cancelled = false
  let consuming = false
  let connectTimer: ReturnType<typeof setTimeout> | null = null
  let closeTimer: ReturnType<typeof setTimeout> | null = null
  let pendingOpen: { resolve: () => void; reject: (error: SessionError) => void } | null = null
  let wake: (() => void) | null = null

  function setStatus(next: SessionStatus) {
    if (store.state === next) return
    logger.debug(`${store.state} → ${next}`)
    store.setState(() => next)
  }

  function wakeConsumer() {
    const resume = wake
    wake = null
    resume?.()
  }

  // Resolves on the next frame, state change, or after `ms`, whichever is first.
  function waitForActivity(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(resume, ms)
      function resume() {
        clearTimeout(timer)
        if (wake === resume) wake = null
        resolve()
      }
      wake = resume
    })
  }

  function clearTimers() {
    if (connectTimer) {
      clearTimeout(connectTimer)
      connectTimer = null
    }
    if (closeTimer) {
      clearTimeout(closeTimer)
      closeTimer = null
    }
  }

  function fail(gen: number, error: SessionError) {
    if (gen !== generation) return
    const status = store.state
    if (status === 'failed' || status === 'closing' || status === 'closed') return

    clearTimers()
    terminalError = error
    cache.clear()
    const ws = socket
    socket = null
    setStatus('failed')
    logger.warn(error.message)
    ws?.terminate()

    const pending = pendingOpen
    pendingOpen = null
    pending?.reject(error)
    wakeConsumer()
  }

  function finishClose(gen: number) {
    if (gen !== generation || store.state !== 'closing') return
    clearTimers()
    socket = null
    setStatus('closed')
  }

  function handleFrame(gen: number, data: RawData) {
    if (gen !== generation) return
    const status = store.state
    if (status !== 'subscribing' && status !== 'streaming') return

    framesReceived++
    if (status === 'subscribing') setStatus('streaming')

    const message = parseSubscriptionMessage(rawToString(data))
    switch (message.type) {
      case 'snapshot':
      case 'update':
        // Every frame carries the complete property set: replace, never merge.
        cache.set(message.entity.id, message.entity)
        break
      case 'unrecognized':
        logger.debug(`unrecognized frame: ${message.raw}`)
        break
    }
    queue.push(message)
    wakeConsumer()
  }

  function handleClose(gen: number, code: number, reason: string) {
    if (gen !== generation) return
    switch (store.state) {
      case 'closing':
        finishClose(gen)
        break
      case 'connecting':
        fail(gen, new UnreachableError(url, lastSocketError))
        break
      case 'subscribing':
      case 'streaming':
        fail(
          gen,
          new ConnectionLostError(url, code, reason, framesReceived, lastSocketError),
        )
        break
    }
  }

  function handleError(gen: number, error: Error) {
    if (gen !== generation) return
    lastSocketError = error
    if (store.state === 'connecting') {
      fail(gen, new UnreachableError(url, error))
    }
    // After the handshake a 'close' always follows 'error'; it decides.
  }

  function openSocket(gen: number) {
    const ws = new WebSocket(url)
    socket = ws

    connectTimer = setTimeout(() => {
      connectTimer = null
      fail(gen, new TimeoutError(url, connectTimeout))
    }, connectTimeout)

    ws.on('open', () => {
      if (gen !== generation || store.state !== 'connecting') return
      if (connectTimer) {
        clearTimeout(connectTimer)
        connectTimer = null
      }
      const frame: SubscribeFrame = entityId
        ? { type: 'subscribe', entityId }
        : { type: 'subscribe' }
      ws.send(JSON.stringify(frame))
      setStatus('subscribing')
      const pending = pendingOpen
      pendingOpen = null
      pending?.resolve()
    })

    // Non-101 answer to the upgrade request: surface status and body.
    ws.on('unexpected-response', (_req, res) => {
      const chunks: Buffer[] = []
      res.on('data', (chunk: Buffer) => chunks.push(chunk))
      res.on('end', () => {
        fail(
          gen,
          new ServerError(
            res.statusCode ?? 0,
            readDetail(Buffer.concat(chunks).toString('utf8')),
          ),
        )
      })
      res.on('error', (error: Error) => handleError(gen, error))
    })

    ws.on('message', (data) => handleFrame(gen, data))
    ws.on('error', (error) => handleError(gen, error))
    ws.on('close', (code, reason) => handleClose(gen, code, reason.toString('utf8')))
  }

  function open(): Promise<void> {
    const status = store.state
    if (status !== 'disconnected' && status !== 'closed' && status !== 'failed') {
      return Promise.reject(
        new Error(`[fluxstate:session] open() called while ${status}`),
      )
    }

    generation++
    cache.clear()
    queue.length = 0
    framesReceived = 0
    lastSocketError = undefined
    terminalError = undefined
    cancelled = false

    if (signal?.aborted) {
      cancelled = true
      setStatus('closed')
      return Promise.resolve()
    }

    setStatus('connecting')
    const gen = generation
    return new Promise<void>((resolve, reject) => {
      pendingOpen = { resolve, reject }
      openSocket(gen)
    })
  }

  function cancel() {
    const status = store.state
    if (status === 'closing' || status === 'closed') return

    cancelled = true
    queue.length = 0
    cache.clear()
    const pending = pendingOpen
    pendingOpen = null

    if (status === 'disconnected' || status === 'failed') {
      if (status === 'disconnected') setStatus('closed')
      wakeConsumer()
      return
    }

    clearTimers()
    setStatus('closing')
    const gen = generation
    const ws = socket
    if (ws && ws.readyState === WebSocket.OPEN) {
      ws.close(1000, 'client cancelled')
      // A peer that never answers the close handshake is cut off.
      closeTimer = setTimeout(() => ws.terminate(), receiveTimeout)
    } else if (ws) {
      ws.terminate()
    } else {
      finishClose(gen)
    }

    pending?.resolve()
    wakeConsumer()
  }

  async function* messages(): AsyncGenerator<SubscriptionMessage, void, undefined> {
    if (consuming) {
      throw new Error('[fluxstate:session] session already has a consumer')
    }
    consuming = true
    try {
      if (store.state === 'disconnected') await open()

      while (true) {
        const next = queue.shift()
        if (next !== undefined) {
          yield next
          continue
        }
        if (cancelled) return

        const status = store.state
        if (status === 'failed') {
          throw terminalError ?? new Error('[fluxstate:session] session failed')
        }
        if (status === 'closing' || status === 'closed') return

        // An idle wait that elapses is not an error; loop and look again.
        await waitForActivity(receiveTimeout)
      }
    } finally {
      consuming = false
      const status = store.state
      if (status === 'connecting' || status === 'subscribing' || status === 'streaming') {
        cancel()
      }
    }
  }

  signal?.addEventListener('abort', () => cancel(), { once: true })

  return {
    store,
    get status() {
      return store.state
    },
    url,
    entityId,
    get error() {
      return terminalError
    },
    get entities() {
      return new Map(cache)
    },
    get(id: string) {
      return cache.get(id)
    },
    open,
    cancel,
    messages,
    [Symbol.asyncIterator]() {
      return messages()
    },
  }
}

/**
 * Event stream client: one streaming subscription per `open()` call.
 *
 * The request carries no timeout. The stream stays open for hours and only the
 * caller's abort signal ends it early.
 */

import { TransientStreamError, errorMessage } from '../../core/errors.js'
import type { EventStream, EventStreamFrame, EventStreamOpenOptions } from '../../core/ports/eventStream.js'
import type { FetchFn } from '../remote/recordStoreClient.js'
import { SseDecoder } from './sseDecoder.js'

export interface EventStreamClientOptions {
  baseUrl: string
  projectId: string
  apiKey: string
  fetch?: FetchFn
}

export class EventStreamClient implements EventStream {
  readonly #url: string
  readonly #apiKey: string
  readonly #fetch: FetchFn

  constructor(opts: EventStreamClientOptions) {
    const baseUrl = opts.baseUrl.replace(/\/+$/, '')
    this.#url = `${baseUrl}/v1/public/projects/${encodeURIComponent(opts.projectId)}/database/events/subscribe`
    this.#apiKey = opts.apiKey
    this.#fetch = opts.fetch ?? ((input, init) => fetch(input, init))
  }

  async open(opts: EventStreamOpenOptions): Promise<AsyncIterable<EventStreamFrame>> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.#apiKey}`,
      'Content-Type': 'application/json',
      Accept: 'text/event-stream',
    }
    if (opts.lastEventId) headers['Last-Event-ID'] = opts.lastEventId

    let res: Response
    try {
      res = await this.#fetch(this.#url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ event_types: opts.eventTypes }),
        signal: opts.signal,
      })
    } catch (error) {
      throw new TransientStreamError(`failed to connect to event stream: ${errorMessage(error)}`, { cause: error })
    }

    if (!res.ok) {
      const text = await res.text().catch(() => res.statusText)
      throw new TransientStreamError(`subscription failed with status ${res.status}: ${text}`)
    }
    if (!res.body) {
      throw new TransientStreamError('event stream response has no body')
    }

    return readFrames(res.body, opts.signal)
  }
}

async function* readFrames(
  body: ReadableStream<Uint8Array>,
  signal: AbortSignal,
): AsyncGenerator<EventStreamFrame> {
  const reader = body.getReader()
  const text = new TextDecoder()
  const sse = new SseDecoder()
  let finished = false

  try {
    while (true) {
      let chunk: Uint8Array | undefined
      try {
        const result = await reader.read()
        chunk = result.done ? undefined : result.value
      } catch (error) {
        if (signal.aborted) return
        throw new TransientStreamError(`error reading event stream: ${errorMessage(error)}`, { cause: error })
      }
      if (chunk === undefined) break
      yield* sse.push(text.decode(chunk, { stream: true }))
    }
    finished = true
    yield* sse.push(text.decode())
    yield* sse.end()
  } finally {
    if (!finished) await reader.cancel().catch(() => undefined)
  }
}

/**
 * Core Ports - Event Stream
 *
 * A single long-lived subscription to the external event source. Each call to
 * `open` performs one connection attempt; the subscriber owns reconnection.
 */

export type EventStreamFrame = {
  /** SSE last event ID: the latest `id:` seen on this stream, if any. */
  id: string | undefined
  /** SSE `event:` field; `message` when absent. */
  event: string
  data: string
}

export interface EventStreamOpenOptions {
  eventTypes: readonly string[]
  /** Last event ID seen on a previous connection, sent as `Last-Event-ID`. */
  lastEventId?: string
  signal: AbortSignal
}

export interface EventStream {
  /**
   * Connect; resolves once the source has accepted the subscription. The
   * returned iterable yields frames until the source closes the stream.
   * Both the connect and the iteration reject with `TransientStreamError`
   * when the connection fails or drops.
   */
  open(opts: EventStreamOpenOptions): Promise<AsyncIterable<EventStreamFrame>>
}

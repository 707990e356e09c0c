/**
 * Event Subscriber: keeps the leaderboard in step with the event source.
 *
 * Lifecycle: connecting → streaming → disconnected → (fixed delay) →
 * connecting … until the abort signal fires. Any connect failure, read error
 * or server-side close counts as a disconnect.
 *
 * Frames are handled strictly one after another, so broadcasts for a
 * competition leave in event order. A frame that cannot be decoded, names no
 * competition, or repeats a recently handled event ID is dropped without
 * affecting the stream.
 */

import { setTimeout as delay } from 'node:timers/promises'
import { MalformedEventError, errorMessage } from '../core/errors.js'
import {
  EventFrameSchema,
  LEADERBOARD_EVENT_TYPES,
  competitionIdOf,
  createLeaderboardUpdate,
  type DomainEvent,
  type LeaderboardEntry,
} from '../core/leaderboard.js'
import type { EventStream, EventStreamFrame } from '../core/ports/eventStream.js'
import type { Logger } from '../core/ports/logger.js'

export const DEFAULT_RECONNECT_DELAY_MS = 5_000
export const DEFAULT_DEDUPE_WINDOW = 1_000

export type SubscriberState = 'connecting' | 'streaming' | 'disconnected' | 'stopped'

/** The calculator operations the subscriber drives. */
export interface LeaderboardSource {
  calculateLeaderboard(competitionId: string): Promise<LeaderboardEntry[]>
  invalidateCache(competitionId: string): void
}

/** The hub operations the subscriber drives. */
export interface LeaderboardBroadcaster {
  broadcast(competitionId: string, payload: string): void
  getClientCount(competitionId: string): number
}

export interface EventSubscriberOptions {
  eventStream: EventStream
  calculator: LeaderboardSource
  hub: LeaderboardBroadcaster
  eventTypes?: readonly string[]
  reconnectDelayMs?: number
  /** How many recent event IDs are remembered for duplicate suppression. */
  dedupeWindow?: number
  logger?: Logger
  now?: () => Date
}

// ============================================================================
// Frame Decoding
// ============================================================================

/** Decode one SSE `data` payload into a domain event. */
export function decodeEventFrame(data: string): DomainEvent {
  let raw: unknown
  try {
    raw = JSON.parse(data)
  } catch (error) {
    throw new MalformedEventError(`event frame is not valid JSON: ${errorMessage(error)}`, { cause: error })
  }
  const parsed = EventFrameSchema.safeParse(raw)
  if (!parsed.success) {
    throw new MalformedEventError(`event frame has an unexpected shape: ${parsed.error.message}`, {
      cause: parsed.error,
    })
  }
  return {
    id: parsed.data.id,
    type: parsed.data.event_type,
    source: parsed.data.source,
    data: parsed.data.event_data,
    createdAt: parsed.data.created_at,
  }
}

// ============================================================================
// Subscriber
// ============================================================================

export class EventSubscriber {
  readonly #eventStream: EventStream
  readonly #calculator: LeaderboardSource
  readonly #hub: LeaderboardBroadcaster
  readonly #eventTypes: readonly string[]
  readonly #reconnectDelayMs: number
  readonly #dedupeWindow: number
  readonly #logger: Logger
  readonly #now: () => Date
  readonly #seenIds = new Set<string>()
  readonly #seenOrder: string[] = []
  #lastEventId: string | undefined
  #state: SubscriberState = 'connecting'

  constructor(opts: EventSubscriberOptions) {
    this.#eventStream = opts.eventStream
    this.#calculator = opts.calculator
    this.#hub = opts.hub
    this.#eventTypes = opts.eventTypes ?? LEADERBOARD_EVENT_TYPES
    this.#reconnectDelayMs = opts.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS
    this.#dedupeWindow = opts.dedupeWindow ?? DEFAULT_DEDUPE_WINDOW
    this.#logger = opts.logger ?? console
    this.#now = opts.now ?? (() => new Date())
  }

  get state(): SubscriberState {
    return this.#state
  }

  get lastEventId(): string | undefined {
    return this.#lastEventId
  }

  /** Run until `signal` aborts. Resolves once the loop has stopped. */
  async subscribe(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.#streamOnce(signal)
        if (!signal.aborted) this.#logger.log('[EventSubscriber] event stream closed by server')
      } catch (error) {
        if (signal.aborted) break
        this.#logger.error(
          `[EventSubscriber] subscription error: ${errorMessage(error)}, retrying in ${this.#reconnectDelayMs}ms`,
        )
      }

      this.#state = 'disconnected'
      if (signal.aborted) break
      try {
        await delay(this.#reconnectDelayMs, undefined, { signal })
      } catch (error) {
        if (signal.aborted) break
        throw error
      }
    }

    this.#state = 'stopped'
    this.#logger.log('[EventSubscriber] event subscription cancelled')
  }

  /**
   * Invalidate, recompute and broadcast one competition's leaderboard.
   * Returns false when the recompute failed; nothing is broadcast then.
   */
  async refreshCompetition(competitionId: string): Promise<boolean> {
    this.#calculator.invalidateCache(competitionId)

    let rankings: LeaderboardEntry[]
    try {
      rankings = await this.#calculator.calculateLeaderboard(competitionId)
    } catch (error) {
      this.#logger.error(
        `[EventSubscriber] error calculating leaderboard for competition ${competitionId}: ${errorMessage(error)}`,
      )
      return false
    }

    const payload = JSON.stringify(createLeaderboardUpdate(rankings, this.#now()))
    this.#logger.log(
      `[EventSubscriber] broadcasting leaderboard update to ${this.#hub.getClientCount(competitionId)} clients ` +
        `for competition ${competitionId}`,
    )
    this.#hub.broadcast(competitionId, payload)
    return true
  }

  // ── Internals ────────────────────────────────────────────────────────

  async #streamOnce(signal: AbortSignal): Promise<void> {
    this.#state = 'connecting'
    const frames = await this.#eventStream.open({
      eventTypes: this.#eventTypes,
      lastEventId: this.#lastEventId,
      signal,
    })

    this.#state = 'streaming'
    this.#logger.log(`[EventSubscriber] connected to event stream, listening for: ${this.#eventTypes.join(', ')}`)

    for await (const frame of frames) {
      if (signal.aborted) return
      await this.#handleFrame(frame)
    }
  }

  async #handleFrame(frame: EventStreamFrame): Promise<void> {
    let event: DomainEvent
    try {
      event = decodeEventFrame(frame.data)
    } catch (error) {
      this.#logger.warn(`[EventSubscriber] dropping frame: ${errorMessage(error)}`)
      return
    }

    if (this.#seenIds.has(event.id)) {
      this.#logger.log(`[EventSubscriber] skipping already processed event ${event.id}`)
      return
    }
    this.#remember(event.id)
    this.#lastEventId = frame.id || event.id

    this.#logger.log(`[EventSubscriber] received event: type=${event.type}, id=${event.id}`)

    const competitionId = competitionIdOf(event)
    if (!competitionId) {
      this.#logger.warn(`[EventSubscriber] dropping event ${event.id}: missing competition id`)
      return
    }

    if (!this.#eventTypes.includes(event.type)) {
      this.#logger.log(`[EventSubscriber] ignoring event type: ${event.type}`)
      return
    }

    this.#logger.log(`[EventSubscriber] processing ${event.type} for competition ${competitionId}`)
    await this.refreshCompetition(competitionId)
  }

  #remember(eventId: string): void {
    this.#seenIds.add(eventId)
    this.#seenOrder.push(eventId)
    while (this.#seenOrder.length > this.#dedupeWindow) {
      const oldest = this.#seenOrder.shift()
      if (oldest !== undefined) this.#seenIds.delete(oldest)
    }
  }
}

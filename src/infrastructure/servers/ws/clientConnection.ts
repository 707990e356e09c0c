/**
 * One viewer's WebSocket, seen through the hub's `HubConnection` contract.
 *
 * Outbound messages go through a bounded queue drained by a single writer:
 * the next message is handed to the socket only after the previous write
 * completed. A viewer that stops reading therefore fills its queue, at which
 * point `enqueue` refuses and the hub drops it.
 *
 * `enqueue` is the hub's broadcast path and bumps `broadcastSeq`; `reply` is
 * for direct answers (snapshots, pongs, errors) and leaves it alone. A
 * snapshot computed before the latest broadcast compares the sequence and is
 * discarded instead of overwriting newer rankings.
 *
 * `close()` stops accepting messages; whatever is already queued is still
 * written before the socket is closed.
 */

import { WebSocket } from 'ws'
import { nanoid } from 'nanoid'
import type { HubConnection } from '../../../application/connectionHub.js'

export const DEFAULT_SEND_BUFFER_SIZE = 256

/** The part of a `ws` socket the writer needs. */
export interface OutboundSocket {
  readonly readyState: number
  send(data: string, cb: (err?: Error) => void): void
  close(code: number, reason: string): void
  terminate(): void
}

export class ClientConnection implements HubConnection {
  readonly id = nanoid()
  readonly competitionId: string
  readonly #ws: OutboundSocket
  readonly #capacity: number
  readonly #queue: string[] = []
  #writing = false
  #closed = false
  #broadcastSeq = 0
  /** Cleared on each heartbeat, set again by the viewer's pong. */
  isAlive = true

  constructor(ws: OutboundSocket, competitionId: string, capacity = DEFAULT_SEND_BUFFER_SIZE) {
    this.#ws = ws
    this.competitionId = competitionId
    this.#capacity = capacity
  }

  get isClosed(): boolean {
    return this.#closed
  }

  /** Messages waiting behind the one currently being written. */
  get pendingCount(): number {
    return this.#queue.length
  }

  /** Number of hub broadcasts accepted so far. */
  get broadcastSeq(): number {
    return this.#broadcastSeq
  }

  enqueue(payload: string): boolean {
    if (!this.#push(payload)) return false
    this.#broadcastSeq++
    return true
  }

  reply(payload: string): boolean {
    return this.#push(payload)
  }

  close(): void {
    if (this.#closed) return
    this.#closed = true
    this.#drain()
  }

  #push(payload: string): boolean {
    if (this.#closed || this.#queue.length >= this.#capacity) return false
    this.#queue.push(payload)
    this.#drain()
    return true
  }

  #drain(): void {
    if (this.#writing) return
    if (this.#ws.readyState !== WebSocket.OPEN) {
      this.#queue.length = 0
      return
    }

    const next = this.#queue.shift()
    if (next === undefined) {
      if (this.#closed) this.#ws.close(1000, 'Connection closed')
      return
    }

    this.#writing = true
    this.#ws.send(next, (err) => {
      this.#writing = false
      if (err) {
        this.#queue.length = 0
        this.#ws.terminate()
        return
      }
      this.#drain()
    })
  }
}

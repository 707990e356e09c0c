/**
 * Connection Hub: registry and broadcaster of live leaderboard subscribers.
 *
 * Architecture:
 * - Single writer: register / unregister / broadcast arrive as commands on an
 *   RxJS Subject and are applied one at a time by the run loop. The loop
 *   observes on the queue scheduler, so a command issued while another is
 *   being applied (e.g. a connection unregistering itself from inside its
 *   close handler) runs after it instead of re-entering.
 * - Broadcast never waits on a client: a connection whose outbound buffer is
 *   full is unregistered and closed on the spot.
 * - Commands issued before `run()` are held and applied in order once the
 *   loop starts; commands issued after `shutdown()` are ignored.
 */

import { Subject, observeOn, queueScheduler, type Subscription } from 'rxjs'
import type { Logger } from '../core/ports/logger.js'

// ============================================================================
// Types
// ============================================================================

/** The hub's view of one live subscriber. */
export interface HubConnection {
  readonly id: string
  readonly competitionId: string
  /** Non-blocking enqueue; `false` when the outbound buffer is full or closed. */
  enqueue(payload: string): boolean
  /** Close the outbound buffer. Must be idempotent. */
  close(): void
}

type HubCommand =
  | { kind: 'register'; connection: HubConnection }
  | { kind: 'unregister'; connection: HubConnection }
  | { kind: 'broadcast'; competitionId: string; payload: string }

export interface ConnectionHubOptions {
  logger?: Logger
}

// ============================================================================
// Hub
// ============================================================================

export class ConnectionHub {
  readonly #commands = new Subject<HubCommand>()
  readonly #clients = new Map<string, Set<HubConnection>>()
  readonly #backlog: HubCommand[] = []
  readonly #logger: Logger
  #loop: Subscription | undefined
  #stopped = false

  constructor(opts: ConnectionHubOptions = {}) {
    this.#logger = opts.logger ?? console
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  /** Start applying commands. Calling it again, or after shutdown, does nothing. */
  run(): void {
    if (this.#loop || this.#stopped) return
    this.#loop = this.#commands
      .pipe(observeOn(queueScheduler))
      .subscribe((command) => this.#apply(command))
    for (const command of this.#backlog.splice(0)) this.#commands.next(command)
  }

  /** Stop the loop and close every registered connection. Idempotent. */
  shutdown(): void {
    if (this.#stopped) return
    this.#stopped = true
    this.#logger.log('[Hub] shutting down')
    this.#commands.complete()
    this.#loop?.unsubscribe()
    this.#backlog.length = 0
    for (const connections of this.#clients.values()) {
      for (const connection of connections) connection.close()
    }
    this.#clients.clear()
  }

  get isRunning(): boolean {
    return this.#loop !== undefined && !this.#stopped
  }

  // ── Commands ─────────────────────────────────────────────────────────

  register(connection: HubConnection): void {
    this.#submit({ kind: 'register', connection })
  }

  unregister(connection: HubConnection): void {
    this.#submit({ kind: 'unregister', connection })
  }

  broadcast(competitionId: string, payload: string): void {
    this.#submit({ kind: 'broadcast', competitionId, payload })
  }

  // ── Diagnostics ──────────────────────────────────────────────────────

  getClientCount(competitionId: string): number {
    return this.#clients.get(competitionId)?.size ?? 0
  }

  getTotalClientCount(): number {
    let total = 0
    for (const connections of this.#clients.values()) total += connections.size
    return total
  }

  getCompetitionIds(): string[] {
    return [...this.#clients.keys()]
  }

  // ── Run Loop ─────────────────────────────────────────────────────────

  #submit(command: HubCommand): void {
    if (this.#stopped) return
    if (!this.#loop) {
      this.#backlog.push(command)
      return
    }
    this.#commands.next(command)
  }

  #apply(command: HubCommand): void {
    switch (command.kind) {
      case 'register':
        this.#register(command.connection)
        break
      case 'unregister':
        this.#unregister(command.connection)
        break
      case 'broadcast':
        this.#broadcast(command.competitionId, command.payload)
        break
    }
  }

  #register(connection: HubConnection): void {
    let connections = this.#clients.get(connection.competitionId)
    if (!connections) {
      connections = new Set()
      this.#clients.set(connection.competitionId, connections)
    }
    connections.add(connection)
    this.#logger.log(
      `[Hub] client registered for competition ${connection.competitionId} (total: ${connections.size})`,
    )
  }

  #unregister(connection: HubConnection): void {
    if (!this.#remove(connection)) return
    connection.close()
    this.#logger.log(
      `[Hub] client unregistered for competition ${connection.competitionId} ` +
        `(remaining: ${this.getClientCount(connection.competitionId)})`,
    )
  }

  #broadcast(competitionId: string, payload: string): void {
    const connections = this.#clients.get(competitionId)
    if (!connections) return
    for (const connection of [...connections]) {
      if (connection.enqueue(payload)) continue
      this.#remove(connection)
      connection.close()
      this.#logger.warn(`[Hub] send buffer full, disconnecting client ${connection.id}`)
    }
  }

  /** Drop a connection from its set; removes the set once empty. */
  #remove(connection: HubConnection): boolean {
    const connections = this.#clients.get(connection.competitionId)
    if (!connections || !connections.delete(connection)) return false
    if (connections.size === 0) this.#clients.delete(connection.competitionId)
    return true
  }
}

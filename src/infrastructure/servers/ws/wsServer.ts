/**
 * WebSocket Server: live leaderboard feed per competition.
 *
 * Architecture:
 * - Attaches to an existing http.Server via the `upgrade` event and accepts
 *   only `/ws/competitions/{competitionId}`.
 * - Each accepted socket becomes a `ClientConnection` registered with the hub;
 *   close or error unregisters it.
 * - A fresh viewer is sent the current leaderboard right away, so it does not
 *   depend on the next event to see anything. `{"type":"refresh"}` repeats that.
 *   A snapshot that resolves after a broadcast reached the viewer is dropped.
 * - Heartbeat: the server pings every 30s and terminates sockets that did not
 *   answer the previous ping.
 */

import { WebSocketServer as WSServer, WebSocket } from 'ws'
import type { IncomingMessage, Server as HttpServer } from 'node:http'
import type { Duplex } from 'node:stream'
import type { ConnectionHub } from '../../../application/connectionHub.js'
import { errorMessage } from '../../../core/errors.js'
import { createLeaderboardUpdate, type LeaderboardEntry } from '../../../core/leaderboard.js'
import type { Logger } from '../../../core/ports/logger.js'
import { ClientConnection, DEFAULT_SEND_BUFFER_SIZE } from './clientConnection.js'
import {
  parseClientMessage,
  parseCompetitionPath,
  serializeServerMessage,
  type ClientMessage,
  type ServerMessage,
} from './protocol.js'

// ============================================================================
// Types
// ============================================================================

export interface WsServerDeps {
  hub: ConnectionHub
  calculator: { calculateLeaderboard(competitionId: string): Promise<LeaderboardEntry[]> }
  sendBufferSize?: number
  heartbeatIntervalMs?: number
  logger?: Logger
}

// ============================================================================
// WebSocket Server
// ============================================================================

export class LeaderboardWsServer {
  readonly #wss: WSServer
  readonly #deps: WsServerDeps
  readonly #logger: Logger
  readonly #connections = new Map<WebSocket, ClientConnection>()
  #heartbeatTimer: ReturnType<typeof setInterval> | undefined
  #closing = false

  constructor(deps: WsServerDeps) {
    this.#deps = deps
    this.#logger = deps.logger ?? console
    this.#wss = new WSServer({ noServer: true })
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  attach(server: HttpServer): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.#handleUpgrade(req, socket, head)
    })

    this.#heartbeatTimer = setInterval(() => this.#heartbeat(), this.#deps.heartbeatIntervalMs ?? 30_000)
    this.#heartbeatTimer.unref()
  }

  /** Stop accepting upgrades. Live connections are closed by the hub's shutdown. */
  close(): void {
    this.#closing = true
    if (this.#heartbeatTimer) {
      clearInterval(this.#heartbeatTimer)
      this.#heartbeatTimer = undefined
    }
    this.#wss.close()
  }

  /** Drop every socket without a close handshake. */
  terminateAll(): void {
    for (const ws of this.#connections.keys()) ws.terminate()
    this.#connections.clear()
  }

  /** Sockets accepted and not yet closed. */
  get connectionCount(): number {
    return this.#connections.size
  }

  // ── Connection Handling ──────────────────────────────────────────────

  #handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (this.#closing) {
      rejectUpgrade(socket, '503 Service Unavailable')
      return
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`)
    const competitionId = parseCompetitionPath(url.pathname)
    if (!competitionId) {
      rejectUpgrade(socket, '404 Not Found')
      return
    }

    this.#wss.handleUpgrade(req, socket, head, (ws) => this.#onConnection(ws, competitionId))
  }

  #onConnection(ws: WebSocket, competitionId: string): void {
    const connection = new ClientConnection(ws, competitionId, this.#deps.sendBufferSize ?? DEFAULT_SEND_BUFFER_SIZE)
    this.#connections.set(ws, connection)
    this.#deps.hub.register(connection)

    ws.on('pong', () => {
      connection.isAlive = true
    })

    ws.on('message', (raw) => {
      let msg: ClientMessage
      try {
        msg = parseClientMessage(String(raw))
      } catch {
        this.#send(connection, { type: 'error', code: 'INVALID_MESSAGE', message: 'Malformed message' })
        return
      }
      switch (msg.type) {
        case 'ping':
          this.#send(connection, { type: 'pong' })
          break
        case 'refresh':
          this.#sendSnapshot(connection)
          break
      }
    })

    ws.on('close', () => {
      this.#connections.delete(ws)
      this.#deps.hub.unregister(connection)
    })

    ws.on('error', (err) => {
      this.#logger.error('[WsServer] client error:', err.message)
      this.#connections.delete(ws)
      this.#deps.hub.unregister(connection)
    })

    this.#sendSnapshot(connection)
  }

  #sendSnapshot(connection: ClientConnection): void {
    const seq = connection.broadcastSeq
    const superseded = () => connection.broadcastSeq !== seq

    this.#deps.calculator
      .calculateLeaderboard(connection.competitionId)
      .then((rankings) => {
        if (superseded()) return
        this.#send(connection, createLeaderboardUpdate(rankings))
      })
      .catch((error: unknown) => {
        this.#logger.error(
          `[WsServer] snapshot for competition ${connection.competitionId} failed: ${errorMessage(error)}`,
        )
        if (superseded()) return
        this.#send(connection, {
          type: 'error',
          code: 'LEADERBOARD_UNAVAILABLE',
          message: 'Leaderboard is temporarily unavailable',
        })
      })
  }

  /** Direct reply to one viewer; shares the broadcast queue so ordering holds. */
  #send(connection: ClientConnection, msg: ServerMessage): void {
    if (connection.isClosed) return
    if (!connection.reply(serializeServerMessage(msg))) {
      this.#deps.hub.unregister(connection)
    }
  }

  #heartbeat(): void {
    for (const [ws, connection] of this.#connections) {
      if (!connection.isAlive) {
        ws.terminate()
        continue
      }
      connection.isAlive = false
      if (ws.readyState === WebSocket.OPEN) ws.ping()
    }
  }
}

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.once('finish', () => socket.destroy())
  socket.end(`HTTP/1.1 ${status}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`)
}

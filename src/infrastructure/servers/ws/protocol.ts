/**
 * WebSocket Protocol: typed messages between viewers and the leaderboard server.
 *
 * Client → server messages are Zod-validated; server → client messages are
 * plain JSON. Leaderboard updates are serialized once per broadcast and the
 * same string is fanned out to every viewer.
 */

import { z } from 'zod'
import type { LeaderboardUpdateMessage } from '../../../core/leaderboard.js'

// ============================================================================
// Client → Server Messages
// ============================================================================

export const PingMessageSchema = z.object({
  type: z.literal('ping'),
})

/** Ask for the current leaderboard outside the broadcast cycle. */
export const RefreshMessageSchema = z.object({
  type: z.literal('refresh'),
})

export const ClientMessageSchema = z.discriminatedUnion('type', [
  PingMessageSchema,
  RefreshMessageSchema,
])

export type ClientMessage = z.infer<typeof ClientMessageSchema>

// ============================================================================
// Server → Client Messages
// ============================================================================

export type ErrorMessage = {
  type: 'error'
  code: 'INVALID_MESSAGE' | 'LEADERBOARD_UNAVAILABLE'
  message: string
}

export type PongMessage = {
  type: 'pong'
}

export type ServerMessage = LeaderboardUpdateMessage | ErrorMessage | PongMessage

// ============================================================================
// Helpers
// ============================================================================

export function parseClientMessage(raw: string): ClientMessage {
  return ClientMessageSchema.parse(JSON.parse(raw))
}

export function serializeServerMessage(msg: ServerMessage): string {
  return JSON.stringify(msg)
}

/** Competition ID from an upgrade path of the form `/ws/competitions/{id}`. */
export function parseCompetitionPath(pathname: string): string | null {
  const match = /^\/ws\/competitions\/([^/]+)\/?$/.exec(pathname)
  if (!match?.[1]) return null
  try {
    const id = decodeURIComponent(match[1])
    return id.trim() ? id : null
  } catch {
    return null
  }
}

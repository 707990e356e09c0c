/**
 * HTTP API: Hono routes for health, diagnostics and on-demand leaderboard reads.
 *
 * Design:
 * - Single `createHttpApp()` factory builds the full Hono app.
 * - No auth: the service sits behind the platform's gateway.
 * - Record-store failures surface as 502, anything else as 500.
 */

import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { z } from 'zod'
import type { ConnectionHub } from '../../../application/connectionHub.js'
import type { SubscriberState } from '../../../application/eventSubscriber.js'
import { FetchError } from '../../../core/errors.js'
import type { LeaderboardEntry } from '../../../core/leaderboard.js'
import type { Logger } from '../../../core/ports/logger.js'

// ============================================================================
// Request Schemas
// ============================================================================

const CompetitionParamSchema = z.object({
  id: z.string().trim().min(1),
})

// ============================================================================
// Dependencies
// ============================================================================

export interface HttpAppDeps {
  hub: Pick<ConnectionHub, 'getTotalClientCount' | 'getClientCount' | 'getCompetitionIds'>
  calculator: { calculateLeaderboard(competitionId: string): Promise<LeaderboardEntry[]> }
  subscriber?: { readonly state: SubscriberState }
  logger?: Logger
}

// ============================================================================
// App Factory
// ============================================================================

export function createHttpApp(deps: HttpAppDeps): Hono {
  const app = new Hono()
  const logger = deps.logger ?? console

  // ── CORS ──
  app.use('/api/*', cors({ origin: '*', allowMethods: ['GET', 'OPTIONS'] }))

  // ── Error handling ──
  app.onError((err, c) => {
    if (err instanceof z.ZodError) {
      return c.json({ error: err.issues.map((issue) => issue.message).join('; ') }, 400)
    }
    if (err instanceof FetchError) {
      logger.error('[HttpServer] record store error:', err.message)
      return c.json({ error: 'Record store unavailable' }, 502)
    }
    logger.error('[HttpServer] unhandled error:', err)
    return c.json({ error: 'Internal server error' }, 500)
  })

  // ── Health ──
  app.get('/health', (c) => c.json({ status: 'healthy' }))

  // ── Diagnostics ──
  app.get('/api/stats', (c) => {
    const competitions: Record<string, number> = {}
    for (const id of deps.hub.getCompetitionIds()) {
      competitions[id] = deps.hub.getClientCount(id)
    }
    return c.json({
      total_clients: deps.hub.getTotalClientCount(),
      competitions,
      subscriber_state: deps.subscriber?.state ?? null,
    })
  })

  // ── Leaderboard ──
  app.get('/api/competitions/:id/leaderboard', async (c) => {
    const { id } = CompetitionParamSchema.parse({ id: c.req.param('id') })
    const rankings = await deps.calculator.calculateLeaderboard(id)
    return c.json({ competition_id: id, data: rankings })
  })

  return app
}

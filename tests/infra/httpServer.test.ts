import { describe, expect, it, vi } from 'vitest'
import { FetchError } from '../../src/core/errors.js'
import type { LeaderboardEntry } from '../../src/core/leaderboard.js'
import { createHttpApp, type HttpAppDeps } from '../../src/infrastructure/servers/http/httpServer.js'
import { silentLogger } from '../fixtures/records.js'

const entry: LeaderboardEntry = {
  submission_id: 'S1',
  team_id: 'team-S1',
  team_name: 'Team S1',
  track_id: 'track-1',
  track_name: 'Main',
  title: 'Project S1',
  average_score: 9,
  score_count: 2,
  rank: 1,
  updated_at: '2026-03-01T12:00:00.000Z',
}

function createTestApp(overrides: Partial<HttpAppDeps> = {}) {
  const counts: Record<string, number> = { H1: 2, H2: 1 }
  const deps: HttpAppDeps = {
    hub: {
      getTotalClientCount: () => 3,
      getClientCount: (id) => counts[id] ?? 0,
      getCompetitionIds: () => ['H1', 'H2'],
    },
    calculator: { calculateLeaderboard: vi.fn(async () => [entry]) },
    subscriber: { state: 'streaming' },
    logger: silentLogger(),
    ...overrides,
  }
  return createHttpApp(deps)
}

describe('HTTP API', () => {
  it('GET /health', async () => {
    const res = await createTestApp().request('/health')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'healthy' })
  })

  it('GET /api/stats reports viewers per competition', async () => {
    const res = await createTestApp().request('/api/stats')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      total_clients: 3,
      competitions: { H1: 2, H2: 1 },
      subscriber_state: 'streaming',
    })
  })

  it('GET /api/competitions/:id/leaderboard returns the rankings', async () => {
    const calculateLeaderboard = vi.fn(async () => [entry])
    const app = createTestApp({ calculator: { calculateLeaderboard } })

    const res = await app.request('/api/competitions/H1/leaderboard')

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ competition_id: 'H1', data: [entry] })
    expect(calculateLeaderboard).toHaveBeenCalledWith('H1')
  })

  it('maps record store failures to 502', async () => {
    const app = createTestApp({
      calculator: {
        calculateLeaderboard: async () => {
          throw new FetchError('failed to fetch submissions: timeout')
        },
      },
    })

    const res = await app.request('/api/competitions/H1/leaderboard')

    expect(res.status).toBe(502)
    expect(await res.json()).toEqual({ error: 'Record store unavailable' })
  })

  it('maps unexpected failures to 500', async () => {
    const app = createTestApp({
      calculator: {
        calculateLeaderboard: async () => {
          throw new Error('boom')
        },
      },
    })

    const res = await app.request('/api/competitions/H1/leaderboard')

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'Internal server error' })
  })

  it('allows cross-origin reads of the API', async () => {
    const res = await createTestApp().request('/api/stats', { headers: { Origin: 'https://viewer.test' } })
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*')
  })
})

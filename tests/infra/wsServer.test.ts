/**
 * End-to-end tests for the viewer WebSocket endpoint over a loopback listener.
 */

import { once } from 'node:events'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { WebSocket } from 'ws'
import { createApp, type App } from '../../src/app/createApp.js'
import { startServer, type RunningServer } from '../../src/app/startServer.js'
import { loadAppConfig } from '../../src/config/appConfig.js'
import type { LeaderboardEntry, Submission } from '../../src/core/leaderboard.js'
import type { ServerMessage } from '../../src/infrastructure/servers/ws/protocol.js'
import { fakeRecordStore, score, silentLogger, submission } from '../fixtures/records.js'

class Inbox {
  readonly #messages: ServerMessage[] = []
  readonly #waiters: Array<(msg: ServerMessage) => void> = []

  constructor(ws: WebSocket) {
    ws.on('message', (raw) => {
      const msg: ServerMessage = JSON.parse(String(raw))
      const waiter = this.#waiters.shift()
      if (waiter) waiter(msg)
      else this.#messages.push(msg)
    })
  }

  next(): Promise<ServerMessage> {
    const msg = this.#messages.shift()
    if (msg) return Promise.resolve(msg)
    return new Promise((resolve) => this.#waiters.push(resolve))
  }
}

function idsOf(msg: ServerMessage): string[] {
  if (msg.type !== 'leaderboard_update') throw new Error(`expected leaderboard_update, got ${msg.type}`)
  return msg.data.map((e: LeaderboardEntry) => e.submission_id)
}

describe('Leaderboard WebSocket server', () => {
  let app: App
  let running: RunningServer
  let data: ReturnType<typeof initialRecords>
  let store: ReturnType<typeof fakeRecordStore>
  const sockets: WebSocket[] = []

  function initialRecords() {
    return {
      H1: { submissions: [submission('S1'), submission('S2')], scores: [score('S2', 8), score('S2', 10)] },
    }
  }

  async function connect(path: string): Promise<{ ws: WebSocket; inbox: Inbox }> {
    const ws = new WebSocket(`ws://127.0.0.1:${running.port}${path}`)
    sockets.push(ws)
    const inbox = new Inbox(ws)
    await once(ws, 'open')
    return { ws, inbox }
  }

  beforeEach(async () => {
    data = initialRecords()
    const config = loadAppConfig({ RECORD_STORE_API_KEY: 'test-key', RECORD_STORE_PROJECT_ID: 'proj-1' })
    store = fakeRecordStore(data)
    app = createApp(config, { recordStore: store, logger: silentLogger() })
    running = await startServer(app, { port: 0, host: '127.0.0.1', subscribe: false })
  })

  afterEach(async () => {
    for (const ws of sockets.splice(0)) ws.terminate()
    await running.close()
  })

  it('sends the current leaderboard on connect', async () => {
    const { inbox } = await connect('/ws/competitions/H1')
    const snapshot = await inbox.next()

    expect(snapshot.type).toBe('leaderboard_update')
    expect(idsOf(snapshot)).toEqual(['S2', 'S1'])
  })

  it('pushes a recomputed leaderboard after a refresh', async () => {
    const { inbox } = await connect('/ws/competitions/H1')
    await inbox.next()

    data.H1.scores.push(score('S1', 10), score('S1', 10))
    expect(await app.subscriber.refreshCompetition('H1')).toBe(true)

    expect(idsOf(await inbox.next())).toEqual(['S1', 'S2'])
  })

  it('drops a connect snapshot that resolves after a newer broadcast', async () => {
    let release: (rows: Submission[]) => void = () => undefined
    store.listSubmissions.mockImplementationOnce(
      () => new Promise<Submission[]>((resolve) => {
        release = resolve
      }),
    )

    const { ws, inbox } = await connect('/ws/competitions/H1')
    await vi.waitFor(() => expect(store.listSubmissions).toHaveBeenCalledTimes(1))

    data.H1.submissions.push(submission('S3'))
    expect(await app.subscriber.refreshCompetition('H1')).toBe(true)
    expect(idsOf(await inbox.next())).toEqual(['S2', 'S1', 'S3'])

    release([submission('S1'), submission('S2')])
    await vi.waitFor(() => expect(store.listScores).toHaveBeenCalledTimes(2))
    await new Promise((resolve) => setTimeout(resolve, 20))

    ws.send(JSON.stringify({ type: 'ping' }))
    expect(await inbox.next()).toEqual({ type: 'pong' })
  })

  it('answers ping with pong', async () => {
    const { ws, inbox } = await connect('/ws/competitions/H1')
    await inbox.next()

    ws.send(JSON.stringify({ type: 'ping' }))

    expect(await inbox.next()).toEqual({ type: 'pong' })
  })

  it('re-sends the snapshot on request', async () => {
    const { ws, inbox } = await connect('/ws/competitions/H1')
    await inbox.next()

    ws.send(JSON.stringify({ type: 'refresh' }))

    expect(idsOf(await inbox.next())).toEqual(['S2', 'S1'])
  })

  it('reports malformed client messages', async () => {
    const { ws, inbox } = await connect('/ws/competitions/H1')
    await inbox.next()

    ws.send('{"type":"subscribe"}')

    expect(await inbox.next()).toEqual({ type: 'error', code: 'INVALID_MESSAGE', message: 'Malformed message' })
  })

  it('counts connected viewers', async () => {
    const { inbox } = await connect('/ws/competitions/H1')
    await inbox.next()

    const res = await app.httpApp.request('/api/stats')
    expect(await res.json()).toEqual({
      total_clients: 1,
      competitions: { H1: 1 },
      subscriber_state: 'connecting',
    })
  })

  it('rejects upgrades outside /ws/competitions/{id}', async () => {
    const ws = new WebSocket(`ws://127.0.0.1:${running.port}/ws/other`)
    sockets.push(ws)
    const [error] = await once(ws, 'error')

    expect(error).toBeInstanceOf(Error)
    expect(String(error)).toContain('Unexpected server response: 404')
  })

  it('closes viewers cleanly on shutdown', async () => {
    const { ws, inbox } = await connect('/ws/competitions/H1')
    await inbox.next()

    const closed = once(ws, 'close')
    await running.close()
    const [code] = await closed

    expect(code).toBe(1000)
    expect(app.hub.getTotalClientCount()).toBe(0)
  })
})

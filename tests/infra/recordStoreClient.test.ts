import { describe, expect, it, vi } from 'vitest'
import { FetchError } from '../../src/core/errors.js'
import { RecordStoreClient, type FetchFn } from '../../src/infrastructure/remote/recordStoreClient.js'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

function clientWith(fetch: FetchFn) {
  return new RecordStoreClient({
    baseUrl: 'https://records.test/',
    projectId: 'proj-1',
    apiKey: 'test-key',
    timeoutMs: 1_000,
    fetch,
  })
}

describe('RecordStoreClient', () => {
  it('queries submissions by competition', async () => {
    const fetch = vi.fn<FetchFn>(async () =>
      jsonResponse({ rows: [{ id: 'S1', hackathon_id: 'H1', team_name: 'Team 1', title: 'Demo' }] }),
    )
    const rows = await clientWith(fetch).listSubmissions('H1')

    expect(rows).toEqual([
      {
        id: 'S1',
        hackathon_id: 'H1',
        team_id: '',
        team_name: 'Team 1',
        track_id: '',
        track_name: '',
        title: 'Demo',
      },
    ])
    const [url, init] = fetch.mock.calls[0] ?? []
    expect(url).toBe('https://records.test/v1/public/projects/proj-1/database/tables/submissions/query')
    expect(init?.method).toBe('POST')
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-key', 'Content-Type': 'application/json' })
    expect(init?.body).toBe('{"filter":{"hackathon_id":"H1"}}')
    expect(init?.signal).toBeInstanceOf(AbortSignal)
  })

  it('queries scores with an $in filter', async () => {
    const fetch = vi.fn<FetchFn>(async () =>
      jsonResponse({ rows: [{ id: 'R1', submission_id: 'S1', judge_id: 'J1', score: 8.5 }] }),
    )
    const rows = await clientWith(fetch).listScores(['S1', 'S2'])

    expect(rows).toEqual([{ id: 'R1', submission_id: 'S1', judge_id: 'J1', score: 8.5 }])
    const [url, init] = fetch.mock.calls[0] ?? []
    expect(url).toBe('https://records.test/v1/public/projects/proj-1/database/tables/scores/query')
    expect(init?.body).toBe('{"filter":{"submission_id":{"$in":["S1","S2"]}}}')
  })

  it('skips the request for an empty id list', async () => {
    const fetch = vi.fn<FetchFn>()
    expect(await clientWith(fetch).listScores([])).toEqual([])
    expect(fetch).not.toHaveBeenCalled()
  })

  it('reports non-2xx responses with their status', async () => {
    const client = clientWith(async () => new Response('nope', { status: 503 }))
    const failure = client.listSubmissions('H1')

    await expect(failure).rejects.toBeInstanceOf(FetchError)
    await expect(failure).rejects.toThrow('submissions query failed with status 503: nope')
    await expect(failure).rejects.toMatchObject({ status: 503, code: 'FETCH_FAILED' })
  })

  it('wraps transport failures', async () => {
    const client = clientWith(async () => {
      throw new TypeError('fetch failed')
    })
    await expect(client.listScores(['S1'])).rejects.toThrow('scores query failed: fetch failed')
  })

  it('rejects bodies that are not JSON', async () => {
    const client = clientWith(async () => new Response('<html>', { status: 200 }))
    await expect(client.listSubmissions('H1')).rejects.toThrow(/^submissions query returned invalid JSON: /)
  })

  it('rejects rows that do not match the schema', async () => {
    const client = clientWith(async () => jsonResponse({ rows: [{ submission_id: 'S1', score: 'high' }] }))
    await expect(client.listScores(['S1'])).rejects.toThrow(/^scores query returned unexpected rows: /)
  })
})

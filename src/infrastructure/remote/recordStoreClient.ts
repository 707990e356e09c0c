/**
 * Record store client: typed fetch wrapper for the table query API.
 *
 * Every call is bounded by `timeoutMs`. Failures of any kind reject with
 * `FetchError`.
 */

import { z } from 'zod'
import { FetchError, errorMessage } from '../../core/errors.js'
import { ScoreRecordSchema, SubmissionSchema, type ScoreRecord, type Submission } from '../../core/leaderboard.js'
import type { RecordStore } from '../../core/ports/recordStore.js'

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>

export interface RecordStoreClientOptions {
  baseUrl: string
  projectId: string
  apiKey: string
  timeoutMs?: number
  fetch?: FetchFn
}

export class RecordStoreClient implements RecordStore {
  readonly #baseUrl: string
  readonly #projectId: string
  readonly #apiKey: string
  readonly #timeoutMs: number
  readonly #fetch: FetchFn

  constructor(opts: RecordStoreClientOptions) {
    this.#baseUrl = opts.baseUrl.replace(/\/+$/, '')
    this.#projectId = opts.projectId
    this.#apiKey = opts.apiKey
    this.#timeoutMs = opts.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.#fetch = opts.fetch ?? ((input, init) => fetch(input, init))
  }

  listSubmissions(competitionId: string): Promise<Submission[]> {
    return this.#queryRows('submissions', { hackathon_id: competitionId }, SubmissionSchema)
  }

  async listScores(submissionIds: readonly string[]): Promise<ScoreRecord[]> {
    if (submissionIds.length === 0) return []
    return this.#queryRows('scores', { submission_id: { $in: [...submissionIds] } }, ScoreRecordSchema)
  }

  async #queryRows<T extends z.ZodTypeAny>(
    table: string,
    filter: Record<string, unknown>,
    rowSchema: T,
  ): Promise<z.infer<T>[]> {
    const url = `${this.#baseUrl}/v1/public/projects/${encodeURIComponent(this.#projectId)}/database/tables/${table}/query`

    let res: Response
    try {
      res = await this.#fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.#apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ filter }),
        signal: AbortSignal.timeout(this.#timeoutMs),
      })
    } catch (error) {
      throw new FetchError(`${table} query failed: ${errorMessage(error)}`, { cause: error })
    }

    if (!res.ok) {
      const text = await res.text().catch(() => res.statusText)
      throw new FetchError(`${table} query failed with status ${res.status}: ${text}`, { status: res.status })
    }

    let body: unknown
    try {
      body = await res.json()
    } catch (error) {
      throw new FetchError(`${table} query returned invalid JSON: ${errorMessage(error)}`, {
        status: res.status,
        cause: error,
      })
    }

    const parsed = z.object({ rows: z.array(rowSchema) }).safeParse(body)
    if (!parsed.success) {
      throw new FetchError(`${table} query returned unexpected rows: ${parsed.error.message}`, {
        status: res.status,
        cause: parsed.error,
      })
    }
    return parsed.data.rows
  }
}

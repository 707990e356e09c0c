/**
 * Leaderboard Calculator
 *
 * Derives a ranked leaderboard for one competition from the record store and
 * keeps it for a short TTL so bursts of events and page loads share one fetch.
 *
 * Cache rules:
 * - A hit returns the cached array itself; callers must not mutate it.
 * - Concurrent misses for the same competition share one in-flight fetch.
 * - `invalidateCache` detaches any in-flight fetch: its result is still
 *   returned to the callers already waiting on it but is never cached, and
 *   the next call starts a fresh fetch.
 */

import { FetchError, errorMessage } from '../core/errors.js'
import type { LeaderboardEntry } from '../core/leaderboard.js'
import type { RecordStore } from '../core/ports/recordStore.js'
import { rankSubmissions } from './ranking.js'

export const DEFAULT_CACHE_TTL_MS = 5_000

export interface LeaderboardCalculatorOptions {
  recordStore: RecordStore
  cacheTtlMs?: number
  /** Clock in epoch milliseconds. */
  now?: () => number
}

type CacheEntry = {
  rankings: LeaderboardEntry[]
  expiresAt: number
}

type InFlight = {
  token: symbol
  promise: Promise<LeaderboardEntry[]>
}

export class LeaderboardCalculator {
  readonly #recordStore: RecordStore
  readonly #cacheTtlMs: number
  readonly #now: () => number
  readonly #cache = new Map<string, CacheEntry>()
  readonly #inFlight = new Map<string, InFlight>()

  constructor(opts: LeaderboardCalculatorOptions) {
    this.#recordStore = opts.recordStore
    this.#cacheTtlMs = opts.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS
    this.#now = opts.now ?? Date.now
  }

  /** Rejects with `FetchError`; never retries. */
  calculateLeaderboard(competitionId: string): Promise<LeaderboardEntry[]> {
    const cached = this.#readCache(competitionId)
    if (cached) return Promise.resolve(cached)

    const pending = this.#inFlight.get(competitionId)
    if (pending) return pending.promise

    return this.#startComputation(competitionId)
  }

  invalidateCache(competitionId: string): void {
    this.#cache.delete(competitionId)
    this.#inFlight.delete(competitionId)
  }

  /** Number of competitions with a live (unexpired) cache entry. */
  get cachedCount(): number {
    const now = this.#now()
    let count = 0
    for (const entry of this.#cache.values()) {
      if (now <= entry.expiresAt) count++
    }
    return count
  }

  // ── Internals ────────────────────────────────────────────────────────

  #readCache(competitionId: string): LeaderboardEntry[] | undefined {
    const entry = this.#cache.get(competitionId)
    if (!entry) return undefined
    if (this.#now() > entry.expiresAt) {
      this.#cache.delete(competitionId)
      return undefined
    }
    return entry.rankings
  }

  #startComputation(competitionId: string): Promise<LeaderboardEntry[]> {
    const token = Symbol(competitionId)
    const isCurrent = () => this.#inFlight.get(competitionId)?.token === token

    const promise = this.#compute(competitionId)
      .then((rankings) => {
        if (isCurrent()) {
          this.#cache.set(competitionId, {
            rankings,
            expiresAt: this.#now() + this.#cacheTtlMs,
          })
        }
        return rankings
      })
      .finally(() => {
        if (isCurrent()) this.#inFlight.delete(competitionId)
      })

    this.#inFlight.set(competitionId, { token, promise })
    return promise
  }

  async #compute(competitionId: string): Promise<LeaderboardEntry[]> {
    const submissions = await this.#fetch('submissions', () =>
      this.#recordStore.listSubmissions(competitionId),
    )
    if (submissions.length === 0) return []

    const submissionIds = submissions.map((s) => s.id)
    const scores = await this.#fetch('scores', () => this.#recordStore.listScores(submissionIds))

    return rankSubmissions(submissions, scores, new Date(this.#now()))
  }

  async #fetch<T>(what: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call()
    } catch (error) {
      if (error instanceof FetchError) throw error
      throw new FetchError(`failed to fetch ${what}: ${errorMessage(error)}`, { cause: error })
    }
  }
}

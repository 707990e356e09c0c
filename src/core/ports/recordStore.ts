/**
 * Core Ports - Record Store
 *
 * Read-only view of the external record store that owns submissions and
 * scores. Implementations reject with `FetchError`.
 */

import type { ScoreRecord, Submission } from '../leaderboard.js'

export interface RecordStore {
  /** All submissions that belong to a competition. */
  listSubmissions(competitionId: string): Promise<Submission[]>

  /** All score records whose `submission_id` is in the given set. */
  listScores(submissionIds: readonly string[]): Promise<ScoreRecord[]>
}

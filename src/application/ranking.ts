import type { LeaderboardEntry, ScoreRecord, Submission } from '../core/leaderboard.js'

type ScoreTotals = { total: number; count: number }

/**
 * Sum and count score records per submission. A record that repeats an
 * already-seen `id` is counted once.
 */
export function aggregateScores(scores: readonly ScoreRecord[]): Map<string, ScoreTotals> {
  const totals = new Map<string, ScoreTotals>()
  const seenIds = new Set<string>()

  for (const score of scores) {
    if (score.id !== undefined) {
      if (seenIds.has(score.id)) continue
      seenIds.add(score.id)
    }
    const current = totals.get(score.submission_id) ?? { total: 0, count: 0 }
    current.total += score.score
    current.count += 1
    totals.set(score.submission_id, current)
  }

  return totals
}

/**
 * Build the ranked leaderboard for one competition.
 *
 * Scored submissions come first, ordered by average descending; unscored ones
 * follow. `Array.prototype.sort` is stable, so equal averages keep the order
 * in which the record store returned the submissions.
 */
export function rankSubmissions(
  submissions: readonly Submission[],
  scores: readonly ScoreRecord[],
  now: Date = new Date(),
): LeaderboardEntry[] {
  const totals = aggregateScores(scores)
  const updatedAt = now.toISOString()

  const entries: LeaderboardEntry[] = submissions.map((submission) => {
    const totalsForSubmission = totals.get(submission.id)
    const count = totalsForSubmission?.count ?? 0
    return {
      rank: 0,
      submission_id: submission.id,
      team_id: submission.team_id,
      team_name: submission.team_name,
      track_id: submission.track_id,
      track_name: submission.track_name,
      title: submission.title,
      average_score: totalsForSubmission && count > 0 ? totalsForSubmission.total / count : 0,
      score_count: count,
      updated_at: updatedAt,
    }
  })

  entries.sort(compareEntries)
  entries.forEach((entry, index) => {
    entry.rank = index + 1
  })
  return entries
}

function compareEntries(a: LeaderboardEntry, b: LeaderboardEntry): number {
  const aScored = a.score_count > 0
  const bScored = b.score_count > 0
  if (aScored !== bScored) return aScored ? -1 : 1
  if (!aScored) return 0
  return b.average_score - a.average_score
}

import { z } from 'zod'

// ============================================================================
// Record Store Rows
// ============================================================================

/** Submission row as returned by the record store. Missing labels read as "". */
export const SubmissionSchema = z.object({
  id: z.string().min(1),
  hackathon_id: z.string().default(''),
  team_id: z.string().default(''),
  team_name: z.string().default(''),
  track_id: z.string().default(''),
  track_name: z.string().default(''),
  title: z.string().default(''),
  submitted_at: z.string().optional(),
})

/** One judge's evaluation of one submission. */
export const ScoreRecordSchema = z.object({
  id: z.string().optional(),
  submission_id: z.string().min(1),
  judge_id: z.string().default(''),
  score: z.number().finite(),
  created_at: z.string().optional(),
})

export type Submission = z.infer<typeof SubmissionSchema>
export type ScoreRecord = z.infer<typeof ScoreRecordSchema>

// ============================================================================
// Leaderboard
// ============================================================================

export type LeaderboardEntry = {
  rank: number
  submission_id: string
  team_id: string
  team_name: string
  track_id: string
  track_name: string
  title: string
  average_score: number
  score_count: number
  updated_at: string
}

export type LeaderboardUpdateMessage = {
  type: 'leaderboard_update'
  data: LeaderboardEntry[]
  timestamp: string
}

export function createLeaderboardUpdate(
  rankings: LeaderboardEntry[],
  now: Date = new Date(),
): LeaderboardUpdateMessage {
  return { type: 'leaderboard_update', data: rankings, timestamp: now.toISOString() }
}

// ============================================================================
// Domain Events
// ============================================================================

export const LEADERBOARD_EVENT_TYPES = [
  'score.submitted',
  'score.updated',
  'submission.created',
  'submission.updated',
] as const

/** Wire shape of one event-source frame. */
export const EventFrameSchema = z.object({
  id: z.string().min(1),
  event_type: z.string().min(1),
  source: z.string().default(''),
  event_data: z.record(z.unknown()).default({}),
  created_at: z.string().optional(),
})

export type DomainEvent = {
  id: string
  type: string
  source: string
  data: Record<string, unknown>
  createdAt: string | undefined
}

/**
 * Competition the event belongs to. Events published by the scoring API carry
 * `hackathon_id`; `competition_id` is accepted as well.
 */
export function competitionIdOf(event: DomainEvent): string | null {
  for (const key of ['hackathon_id', 'competition_id']) {
    const value = event.data[key]
    if (typeof value === 'string' && value.length > 0) return value
  }
  return null
}

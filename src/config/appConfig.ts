import { z } from 'zod'
import { ConfigError } from '../core/errors.js'
import { LEADERBOARD_EVENT_TYPES } from '../core/leaderboard.js'

export type AppConfig = {
  recordStore: {
    baseUrl: string
    projectId: string
    apiKey: string
    timeoutMs: number
  }
  server: {
    port: number
    host: string
    sendBufferSize: number
  }
  leaderboard: {
    cacheTtlMs: number
  }
  events: {
    eventTypes: string[]
    reconnectDelayMs: number
  }
}

const DEFAULT_RECORD_STORE_BASE_URL = 'https://api.ainative.studio'

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const EnvSchema = z.object({
  RECORD_STORE_API_KEY: z.string().trim().min(1, 'is required'),
  RECORD_STORE_PROJECT_ID: z.string().trim().min(1, 'is required'),
  RECORD_STORE_BASE_URL: z.string().trim().url().default(DEFAULT_RECORD_STORE_BASE_URL),
  LEADERBOARD_PORT: z.coerce.number().int().min(0).max(65_535).default(9000),
  LEADERBOARD_HOST: z.string().trim().min(1).default('0.0.0.0'),
  LEADERBOARD_CACHE_TTL_MS: positiveInt(5_000),
  LEADERBOARD_FETCH_TIMEOUT_MS: positiveInt(10_000),
  LEADERBOARD_RECONNECT_DELAY_MS: positiveInt(5_000),
  LEADERBOARD_SEND_BUFFER_SIZE: positiveInt(256),
  LEADERBOARD_EVENT_TYPES: z.string().optional(),
})

/** Empty strings count as unset, so `FOO=` in a .env file falls back to the default. */
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value
  }
  return out
}

function parseEventTypes(raw: string | undefined): string[] {
  if (raw === undefined) return [...LEADERBOARD_EVENT_TYPES]
  const types = raw.split(',').map((t) => t.trim()).filter(Boolean)
  if (types.length === 0) {
    throw new ConfigError('LEADERBOARD_EVENT_TYPES must list at least one event type')
  }
  return types
}

/**
 * Build the service configuration from environment variables.
 *
 * Throws `ConfigError` naming every invalid or missing variable.
 */
export function loadAppConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    throw new ConfigError(`invalid configuration: ${problems.join('; ')}`)
  }
  const vars = parsed.data

  return {
    recordStore: {
      baseUrl: vars.RECORD_STORE_BASE_URL,
      projectId: vars.RECORD_STORE_PROJECT_ID,
      apiKey: vars.RECORD_STORE_API_KEY,
      timeoutMs: vars.LEADERBOARD_FETCH_TIMEOUT_MS,
    },
    server: {
      port: vars.LEADERBOARD_PORT,
      host: vars.LEADERBOARD_HOST,
      sendBufferSize: vars.LEADERBOARD_SEND_BUFFER_SIZE,
    },
    leaderboard: {
      cacheTtlMs: vars.LEADERBOARD_CACHE_TTL_MS,
    },
    events: {
      eventTypes: parseEventTypes(vars.LEADERBOARD_EVENT_TYPES),
      reconnectDelayMs: vars.LEADERBOARD_RECONNECT_DELAY_MS,
    },
  }
}

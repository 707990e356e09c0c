/**
 * Machine-readable error types shared by the leaderboard components.
 *
 * Each carries a stable `code` so callers can branch without string matching.
 */

/** Record-store call failed, timed out, or returned rows that do not parse. */
export class FetchError extends Error {
  readonly code = 'FETCH_FAILED'
  readonly status: number | undefined

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause })
    this.name = 'FetchError'
    this.status = opts.status
  }
}

/** Event-source connection could not be opened or dropped mid-stream. */
export class TransientStreamError extends Error {
  readonly code = 'STREAM_INTERRUPTED'

  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause })
    this.name = 'TransientStreamError'
  }
}

/** A single event frame could not be decoded or names no competition. */
export class MalformedEventError extends Error {
  readonly code = 'MALFORMED_EVENT'

  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause })
    this.name = 'MalformedEventError'
  }
}

export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG'

  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

import yargs, { type Argv } from 'yargs'
import { loadAppConfig } from '../../config/appConfig.js'
import { createApp } from '../../app/createApp.js'
import { startServer } from '../../app/startServer.js'
import type { LeaderboardEntry } from '../../core/leaderboard.js'
import type { FetchFn } from '../../infrastructure/remote/recordStoreClient.js'
import type { IO } from './io.js'

/**
 * CLI adapter: parse commands → wire the app → run.
 *
 * Commands:
 * - serve [--port] [--host]
 * - rank <competitionId> [--json]
 */
export async function runCli(opts: {
  argv: string[]
  env: Record<string, string | undefined>
  io: IO
  fetch?: FetchFn
  /** Resolves when the server should stop; defaults to SIGINT/SIGTERM. */
  waitForShutdown?: () => Promise<void>
}): Promise<number> {
  const { argv, env, io } = opts

  const parser = yargs(argv)
    .scriptName('leaderboard-live')
    .command(
      'serve',
      'Serve live leaderboards over WebSocket',
      (y: Argv) =>
        y
          .option('port', { type: 'number', describe: 'Port to listen on (overrides LEADERBOARD_PORT)' })
          .option('host', { type: 'string', describe: 'Interface to bind (overrides LEADERBOARD_HOST)' }),
      async (args) => {
        const app = createApp(loadAppConfig(env), { fetch: opts.fetch })
        const server = await startServer(app, { port: args.port, host: args.host })
        io.stdout(`Leaderboard server listening on port ${server.port}. Press Ctrl+C to stop.\n`)

        await (opts.waitForShutdown ?? waitForSignal)()
        await server.close()
      }
    )
    .command(
      'rank <competitionId>',
      'Compute one leaderboard and print it',
      (y: Argv) =>
        y
          .positional('competitionId', { type: 'string', demandOption: true })
          .option('json', { type: 'boolean', default: false, describe: 'Print raw JSON entries' }),
      async (args) => {
        const competitionId = String(args.competitionId).trim()
        if (!competitionId) throw new Error('rank requires a competitionId')

        const app = createApp(loadAppConfig(env), { fetch: opts.fetch })
        const rankings = await app.calculator.calculateLeaderboard(competitionId)

        if (args.json) {
          io.stdout(`${JSON.stringify(rankings, null, 2)}\n`)
          return
        }
        if (rankings.length === 0) {
          io.stdout(`No submissions for competition ${competitionId}.\n`)
          return
        }
        for (const entry of rankings) io.stdout(`${formatEntry(entry)}\n`)
      }
    )
    .demandCommand(1, 'Specify a command')
    .strict()
    .help()
    .exitProcess(false)
    .fail((msg, err) => {
      throw err ?? new Error(msg)
    })

  try {
    await parser.parseAsync()
    return 0
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

function formatEntry(entry: LeaderboardEntry): string {
  const score = entry.score_count > 0 ? entry.average_score.toFixed(2) : '-'
  const label = entry.title || entry.submission_id
  const team = entry.team_name ? ` (${entry.team_name})` : ''
  return `${String(entry.rank).padStart(3)}. ${score.padStart(6)}  [${entry.score_count}] ${label}${team}`
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = () => {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
      resolve()
    }
    process.once('SIGINT', onSignal)
    process.once('SIGTERM', onSignal)
  })
}

/**
 * Bring the service up: HTTP + WebSocket listener, hub loop, event subscriber.
 *
 * Shutdown order: cancel the subscriber, stop accepting upgrades and requests,
 * shut the hub down (which closes every viewer), then wait for the listener
 * and the subscriber loop to finish.
 */

import { createServer } from 'node:http'
import { getRequestListener } from '@hono/node-server'
import { errorMessage } from '../core/errors.js'
import type { App } from './createApp.js'

export const SHUTDOWN_GRACE_MS = 10_000

export type RunningServer = {
  /** Port actually bound (differs from the requested one when it was 0). */
  port: number
  close(): Promise<void>
}

export async function startServer(
  app: App,
  opts: { port?: number; host?: string; subscribe?: boolean } = {},
): Promise<RunningServer> {
  const { logger } = app
  const server = createServer(getRequestListener(app.httpApp.fetch))
  app.wsServer.attach(server)
  app.hub.run()

  const requestedPort = opts.port ?? app.config.server.port
  const host = opts.host ?? app.config.server.host
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(requestedPort, host, () => {
      server.off('error', reject)
      resolve()
    })
  })
  const address = server.address()
  const port = address !== null && typeof address === 'object' ? address.port : requestedPort
  logger.log(`[Server] leaderboard server listening on ${host}:${port}`)

  const controller = new AbortController()
  const subscription =
    opts.subscribe === false
      ? Promise.resolve()
      : app.subscriber.subscribe(controller.signal).catch((error: unknown) => {
          logger.error(`[Server] event subscriber stopped unexpectedly: ${errorMessage(error)}`)
        })

  const shutdown = async (): Promise<void> => {
    logger.log('[Server] shutting down...')
    controller.abort()
    app.wsServer.close()

    const closed = new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()))
    })
    server.closeIdleConnections()
    app.hub.shutdown()

    const grace = setTimeout(() => {
      server.closeAllConnections()
      app.wsServer.terminateAll()
    }, SHUTDOWN_GRACE_MS)
    grace.unref()
    try {
      await closed
    } finally {
      clearTimeout(grace)
    }
    await subscription
    logger.log('[Server] stopped')
  }

  let closing: Promise<void> | undefined
  return {
    port,
    close: () => (closing ??= shutdown()),
  }
}

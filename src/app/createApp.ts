import type { Hono } from 'hono'
import type { AppConfig } from '../config/appConfig.js'
import { ConnectionHub } from '../application/connectionHub.js'
import { EventSubscriber } from '../application/eventSubscriber.js'
import { LeaderboardCalculator } from '../application/leaderboardCalculator.js'
import type { EventStream } from '../core/ports/eventStream.js'
import type { Logger } from '../core/ports/logger.js'
import type { RecordStore } from '../core/ports/recordStore.js'
import { EventStreamClient } from '../infrastructure/events/eventStreamClient.js'
import { RecordStoreClient, type FetchFn } from '../infrastructure/remote/recordStoreClient.js'
import { createHttpApp } from '../infrastructure/servers/http/httpServer.js'
import { LeaderboardWsServer } from '../infrastructure/servers/ws/wsServer.js'

export type App = {
  config: AppConfig
  logger: Logger
  recordStore: RecordStore
  calculator: LeaderboardCalculator
  hub: ConnectionHub
  subscriber: EventSubscriber
  httpApp: Hono
  wsServer: LeaderboardWsServer
}

export type CreateAppOverrides = {
  fetch?: FetchFn
  logger?: Logger
  recordStore?: RecordStore
  eventStream?: EventStream
}

/** Wire every component from config. Nothing is started here. */
export function createApp(config: AppConfig, overrides: CreateAppOverrides = {}): App {
  const logger = overrides.logger ?? console

  const recordStore =
    overrides.recordStore ??
    new RecordStoreClient({
      baseUrl: config.recordStore.baseUrl,
      projectId: config.recordStore.projectId,
      apiKey: config.recordStore.apiKey,
      timeoutMs: config.recordStore.timeoutMs,
      fetch: overrides.fetch,
    })

  const eventStream =
    overrides.eventStream ??
    new EventStreamClient({
      baseUrl: config.recordStore.baseUrl,
      projectId: config.recordStore.projectId,
      apiKey: config.recordStore.apiKey,
      fetch: overrides.fetch,
    })

  const calculator = new LeaderboardCalculator({
    recordStore,
    cacheTtlMs: config.leaderboard.cacheTtlMs,
  })
  const hub = new ConnectionHub({ logger })
  const subscriber = new EventSubscriber({
    eventStream,
    calculator,
    hub,
    eventTypes: config.events.eventTypes,
    reconnectDelayMs: config.events.reconnectDelayMs,
    logger,
  })

  const httpApp = createHttpApp({ hub, calculator, subscriber, logger })
  const wsServer = new LeaderboardWsServer({
    hub,
    calculator,
    sendBufferSize: config.server.sendBufferSize,
    logger,
  })

  return { config, logger, recordStore, calculator, hub, subscriber, httpApp, wsServer }
}

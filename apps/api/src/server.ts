/**
 * Tabula API Server
 *
 * Elysia-based REST API for databases, sync enrollment, remote copies and
 * credentials.
 */

import { cors } from '@elysiajs/cors'
import { Elysia, type ElysiaConfig } from 'elysia'
import type { CredentialStore, DeviceAuthorizationFlow, LoopbackAuthorizationFlow } from '../lib/auth'
import { isDomainError } from '../lib/errors'
import type { Logger } from '../lib/logger'
import { httpMetricsMiddleware } from '../lib/metrics'
import type { RemoteBackups } from '../lib/remote'
import type { SnapshotStore } from '../lib/storage'
import type { SyncCoordinator, SyncScheduler } from '../lib/sync'
import {
  authController,
  databasesController,
  healthController,
  metricsController,
  oauthCallbackController,
  remoteController,
  syncController,
} from './routes'

/**
 * Dependencies for the API server
 */
export interface ServerDependencies {
  coordinator: SyncCoordinator
  scheduler: SyncScheduler
  snapshots: SnapshotStore
  credentials: CredentialStore
  deviceFlow: DeviceAuthorizationFlow
  loopbackFlow: LoopbackAuthorizationFlow
  backups: RemoteBackups
  logger?: Logger
}

export interface ServerOptions {
  /** Runtime adapter; the production entrypoint passes the Node adapter. */
  adapter?: ElysiaConfig<''>['adapter']
}

/**
 * Create the Elysia API server
 */
export function createServer(deps: ServerDependencies, options: ServerOptions = {}) {
  const { coordinator, scheduler, snapshots, credentials, deviceFlow, loopbackFlow, backups, logger } =
    deps
  const log = logger?.child({ component: 'http' })

  return new Elysia({ adapter: options.adapter })
    .use(cors())
    .use(httpMetricsMiddleware)
    .onError(({ error, set, request }) => {
      if (isDomainError(error)) {
        set.status = error.status
        return { error: error.message, code: error.code }
      }
      log?.error({ err: error, method: request.method, url: request.url }, 'Unhandled error')
      set.status = 500
      if (error instanceof Error) {
        return { error: error.message, code: 'INTERNAL_ERROR' }
      }
      return { error: 'Internal server error', code: 'INTERNAL_ERROR' }
    })
    .use(metricsController())
    .use(healthController({ scheduler }))
    .use(oauthCallbackController({ loopbackFlow }))
    .use(databasesController({ coordinator, snapshots }))
    .use(syncController({ coordinator, credentials }))
    .use(remoteController({ backups }))
    .use(authController({ credentials, deviceFlow, loopbackFlow }))
}

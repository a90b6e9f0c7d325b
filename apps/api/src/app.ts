/**
 * App: wires all services into a dependency graph.
 *
 * Callers own DB creation. App owns the service graph built from it.
 * Used by both the production entrypoint (index.ts) and the tests.
 */

import { OAuthClient, type RefreshTokenStore, type TabulaConfig } from '@tabula/core'
import {
  CoordinationRepository,
  type DrizzleDb,
  PendingAuthorizationRepository,
} from '@tabula/db'
import { CredentialStore, DeviceAuthorizationFlow, LoopbackAuthorizationFlow } from '../lib/auth'
import type { Logger } from '../lib/logger'
import { DriveObjectStore, RemoteBackups, type RemoteObjectStore } from '../lib/remote'
import { SnapshotStore } from '../lib/storage'
import { LeaseManager, SyncCoordinator, SyncScheduler } from '../lib/sync'
import { type ServerOptions, createServer } from './server'

/** How often expired authorizations and coordination rows are swept. */
const SWEEP_INTERVAL_MS = 60_000

export interface AppConfig {
  db: DrizzleDb
  config: TabulaConfig
  logger: Logger
  /** Defaults to Google Drive. */
  remote?: RemoteObjectStore
  /** Fetch used for the identity provider (tests pass a stub). */
  fetch?: typeof fetch
  /** Client-held refresh token storage, when this process is the shell. */
  refreshTokens?: RefreshTokenStore
  serverOptions?: ServerOptions
}

export class App {
  readonly coordination: CoordinationRepository
  readonly leases: LeaseManager
  readonly credentials: CredentialStore
  readonly snapshots: SnapshotStore
  readonly remote: RemoteObjectStore
  readonly backups: RemoteBackups
  readonly oauth: OAuthClient
  readonly deviceFlow: DeviceAuthorizationFlow
  readonly loopbackFlow: LoopbackAuthorizationFlow
  readonly scheduler: SyncScheduler
  readonly coordinator: SyncCoordinator
  readonly server: ReturnType<typeof createServer>

  private readonly logger: Logger
  private sweepTimer: ReturnType<typeof setTimeout> | null = null

  constructor(options: AppConfig) {
    const { db, config, logger } = options
    this.logger = logger

    this.coordination = new CoordinationRepository(db)
    this.leases = new LeaseManager(this.coordination, config.sync.leaseTtlMs)
    this.credentials = new CredentialStore(this.coordination, logger, {
      refreshTokens: options.refreshTokens,
    })
    this.snapshots = new SnapshotStore(config.snapshotDir)
    this.remote = options.remote ?? new DriveObjectStore({ folderId: config.driveFolderId })
    this.backups = new RemoteBackups({
      remote: this.remote,
      credentials: this.credentials,
      snapshots: this.snapshots,
      logger,
      timeoutMs: config.sync.remoteTimeoutMs,
    })

    this.oauth = new OAuthClient(config.oauth, {
      timeoutMs: config.sync.remoteTimeoutMs,
      fetch: options.fetch,
    })
    this.deviceFlow = new DeviceAuthorizationFlow(this.oauth, this.credentials, logger)
    this.loopbackFlow = new LoopbackAuthorizationFlow(
      this.oauth,
      new PendingAuthorizationRepository(db),
      logger,
      { publicUrl: config.publicUrl, timeoutMs: config.loopbackTimeoutMs },
    )

    this.scheduler = new SyncScheduler({
      leases: this.leases,
      credentials: this.credentials,
      snapshots: this.snapshots,
      remote: this.remote,
      logger,
      config: config.sync,
    })
    this.coordinator = new SyncCoordinator(this.leases, this.scheduler, this.snapshots, logger, {
      leaseWaitMs: config.sync.leaseWaitMs,
    })

    this.server = createServer(
      {
        coordinator: this.coordinator,
        scheduler: this.scheduler,
        snapshots: this.snapshots,
        credentials: this.credentials,
        deviceFlow: this.deviceFlow,
        loopbackFlow: this.loopbackFlow,
        backups: this.backups,
        logger,
      },
      options.serverOptions,
    )
  }

  /**
   * Resume loops for enrolled databases and start the periodic sweep.
   */
  start(): { resumed: number } {
    this.sweep()
    const resumed = this.coordinator.resume()
    this.scheduleSweep()
    return { resumed }
  }

  /**
   * Graceful shutdown: stop loops, then purge the access token.
   * Enrollment and snapshots are kept. Does not close the DB (caller owns it).
   */
  shutdown(): void {
    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer)
      this.sweepTimer = null
    }
    this.coordinator.shutdown()
    this.credentials.purgeAccessToken()
  }

  private sweep(): void {
    try {
      this.loopbackFlow.sweepExpired()
      this.coordination.purgeExpired()
    } catch (err) {
      this.logger.warn({ err }, 'Sweep of expired records failed')
    }
  }

  private scheduleSweep(): void {
    this.sweepTimer = setTimeout(() => {
      this.sweep()
      this.scheduleSweep()
    }, SWEEP_INTERVAL_MS)
  }
}

/**
 * Sync Coordinator
 *
 * Enrollment lifecycle for databases: enroll and unenroll, plus the
 * rename- and delete-time migration of sync state. Loops themselves run in
 * the SyncScheduler; the coordinator only starts them, rebinds them and
 * stops them.
 *
 * Rename and delete take the same per-name lease as the upload loops, with a
 * bounded wait, so they never interleave with an upload of that database
 * from any process.
 */

import { randomUUID } from 'node:crypto'
import type { DatabaseName, SyncStatus, SyncToken } from '@tabula/core'
import {
  AlreadyEnrolledError,
  DatabaseNotFoundError,
  LeaseUnavailableError,
  NameConflictError,
  NotEnrolledError,
} from '../errors'
import type { Logger } from '../logger'
import { syncLeaseContentionTotal } from '../metrics'
import type { SnapshotStore } from '../storage'
import type { LeaseManager } from './lease'
import type { SyncScheduler } from './scheduler'

/**
 * Configuration for the SyncCoordinator.
 */
export interface SyncCoordinatorConfig {
  /**
   * How long rename/delete wait for the lease before giving up.
   * @default 10000
   */
  leaseWaitMs?: number

  /**
   * Delay between lease attempts while waiting.
   * @default 100
   */
  leaseRetryMs?: number
}

const DEFAULT_CONFIG: Required<SyncCoordinatorConfig> = {
  leaseWaitMs: 10_000,
  leaseRetryMs: 100,
}

export interface DatabaseSummary {
  name: DatabaseName
  enrolled: boolean
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class SyncCoordinator {
  private readonly leases: LeaseManager
  private readonly scheduler: SyncScheduler
  private readonly snapshots: SnapshotStore
  private readonly config: Required<SyncCoordinatorConfig>
  private readonly _log: Logger

  constructor(
    leases: LeaseManager,
    scheduler: SyncScheduler,
    snapshots: SnapshotStore,
    logger: Logger,
    config?: SyncCoordinatorConfig,
  ) {
    this.leases = leases
    this.scheduler = scheduler
    this.snapshots = snapshots
    this.config = { ...DEFAULT_CONFIG, ...config }
    this._log = logger.child({ component: 'SyncCoordinator' })
  }

  /**
   * Mark `name` for periodic upload and start its loop. The database must
   * have a local snapshot.
   */
  async enroll(name: DatabaseName): Promise<SyncToken> {
    this.snapshots.assertName(name)
    if (!(await this.snapshots.exists(name))) {
      throw new DatabaseNotFoundError(name)
    }

    const token = randomUUID()
    if (!this.leases.createToken(name, token)) {
      throw new AlreadyEnrolledError(name)
    }

    this.scheduler.start(token, name)
    this._log.info({ database: name }, 'Database enrolled')
    return token
  }

  /**
   * Revoke the token and cancel this process's loop. Loops in other
   * processes notice the revoked token on their next tick and stop without
   * uploading; a tick already in flight does not write the marker.
   */
  unenroll(name: DatabaseName): void {
    const token = this.leases.getToken(name)
    if (token === undefined || !this.leases.revoke(name)) {
      throw new NotEnrolledError(name)
    }
    this.scheduler.stop(token)
    this._log.info({ database: name }, 'Database unenrolled')
  }

  isEnrolled(name: DatabaseName): boolean {
    return this.leases.getToken(name) !== undefined
  }

  /**
   * Move an enrolled database to a new name, keeping its token.
   */
  async rename(oldName: DatabaseName, newName: DatabaseName): Promise<void> {
    this.snapshots.assertName(oldName)
    this.snapshots.assertName(newName)

    const token = this.leases.getToken(oldName)
    if (token === undefined) {
      throw new NotEnrolledError(oldName)
    }
    if (oldName === newName || this.isEnrolled(newName) || (await this.snapshots.exists(newName))) {
      throw new NameConflictError(newName)
    }

    await this.withLease(oldName, async () => {
      this.leases.migrate(oldName, newName, token)

      try {
        if (await this.snapshots.exists(oldName)) {
          await this.snapshots.rename(oldName, newName)
        }
      } catch (err) {
        this.leases.migrate(newName, oldName, token)
        throw err
      }

      this.scheduler.rebind(token, newName)
    })

    this._log.info({ from: oldName, to: newName }, 'Database renamed')
  }

  /**
   * Remove every trace of `name` locally: token, lease, marker and snapshot.
   * The remote copy is kept.
   */
  async deleteAll(name: DatabaseName): Promise<void> {
    this.snapshots.assertName(name)

    await this.withLease(name, async () => {
      const token = this.leases.getToken(name)
      this.leases.purge(name)
      if (token !== undefined) {
        this.scheduler.stop(token)
      }

      const deleted = await this.snapshots.delete(name)
      if (token === undefined && !deleted) {
        throw new DatabaseNotFoundError(name)
      }
    })

    this._log.info({ database: name }, 'Database deleted')
  }

  status(name: DatabaseName): SyncStatus {
    const token = this.leases.getToken(name)
    if (token === undefined) {
      return { database: name, enrolled: false }
    }

    const marker = this.leases.getMarker(name)
    const job = this.scheduler.getJob(token)
    return {
      database: name,
      enrolled: true,
      lastSyncAt: marker?.syncedAt ? new Date(marker.syncedAt) : undefined,
      lastOutcome: job?.lastOutcome,
      lastError: job?.lastError,
    }
  }

  /**
   * Every database known locally or enrolled, sorted by name.
   */
  async list(): Promise<DatabaseSummary[]> {
    const enrolled = new Set(this.leases.listEnrolled().map((e) => e.name))
    const names = new Set([...(await this.snapshots.listDatabaseNames()), ...enrolled])
    return [...names].sort().map((name) => ({ name, enrolled: enrolled.has(name) }))
  }

  /**
   * Start loops for every database enrolled in the coordination store.
   * Returns the number of loops started.
   */
  resume(): number {
    let started = 0
    for (const { name, token } of this.leases.listEnrolled()) {
      if (this.scheduler.isRunning(token)) continue
      this.scheduler.start(token, name)
      started++
    }
    if (started > 0) {
      this._log.info({ count: started }, 'Resumed sync loops')
    }
    return started
  }

  /**
   * Stop all loops. Coordination keys and snapshots are left as they are.
   */
  shutdown(): void {
    this.scheduler.shutdown()
  }

  private async withLease<T>(name: DatabaseName, fn: () => Promise<T>): Promise<T> {
    const holder = randomUUID()
    const deadline = Date.now() + this.config.leaseWaitMs
    let contended = false

    while (!this.leases.acquire(name, holder)) {
      if (!contended) {
        contended = true
        syncLeaseContentionTotal.inc({ operation: 'migrate' })
      }
      if (Date.now() >= deadline) {
        throw new LeaseUnavailableError(name, this.config.leaseWaitMs)
      }
      await sleep(this.config.leaseRetryMs)
    }

    try {
      return await fn()
    } finally {
      this.leases.release(name, holder)
    }
  }
}

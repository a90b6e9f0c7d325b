/**
 * Sync Scheduler
 *
 * One self-rescheduling loop per enrolled database, keyed by sync token.
 * Loops re-resolve their bound name on every tick, so a rename done by any
 * process is picked up, and they stop by themselves once their token has
 * been revoked. Ticks only contend with each other through the per-name
 * lease.
 *
 * Uses setTimeout instead of setInterval so a slow upload never stacks a
 * second tick behind it.
 */

import { createHash, randomUUID } from 'node:crypto'
import type { DatabaseName, SyncConfig, SyncToken, TickOutcome } from '@tabula/core'
import type { CredentialStore } from '../auth/credential-store'
import type { Logger } from '../logger'
import {
  classifySyncError,
  syncBytesUploadedTotal,
  syncErrorsTotal,
  syncLeaseContentionTotal,
  syncLoopsActive,
  syncTicksTotal,
  syncUploadDuration,
} from '../metrics'
import type { RemoteObjectStore } from '../remote'
import type { SnapshotStore } from '../storage'
import type { LeaseManager } from './lease'

export interface SyncJob {
  token: SyncToken
  /** Name the loop is currently bound to. */
  name: DatabaseName
  lastOutcome?: TickOutcome
  lastError?: string
  lastTickAt?: Date
  timer?: ReturnType<typeof setTimeout>
}

export interface SyncSchedulerDeps {
  leases: LeaseManager
  credentials: CredentialStore
  snapshots: SnapshotStore
  remote: RemoteObjectStore
  logger: Logger
  config: Pick<SyncConfig, 'intervalMs' | 'remoteTimeoutMs' | 'skipUnchanged'>
}

export class SyncScheduler {
  private readonly leases: LeaseManager
  private readonly credentials: CredentialStore
  private readonly snapshots: SnapshotStore
  private readonly remote: RemoteObjectStore
  private readonly config: SyncSchedulerDeps['config']
  private readonly _log: Logger

  /** Running loops by sync token */
  private readonly jobs = new Map<SyncToken, SyncJob>()

  constructor(deps: SyncSchedulerDeps) {
    this.leases = deps.leases
    this.credentials = deps.credentials
    this.snapshots = deps.snapshots
    this.remote = deps.remote
    this.config = deps.config
    this._log = deps.logger.child({ component: 'SyncScheduler' })
  }

  /**
   * Start the loop for `token`. The first tick runs one interval from now.
   * Starting a token that already has a loop only rebinds it.
   */
  start(token: SyncToken, name: DatabaseName): void {
    const existing = this.jobs.get(token)
    if (existing) {
      existing.name = name
      return
    }

    const job: SyncJob = { token, name }
    this.jobs.set(token, job)
    this.schedule(job)
    syncLoopsActive.set(this.jobs.size)
    this._log.info({ database: name, intervalMs: this.config.intervalMs }, 'Sync loop started')
  }

  /**
   * Stop the loop for `token`. A tick already in flight finishes but does not
   * reschedule.
   */
  stop(token: SyncToken): void {
    const job = this.jobs.get(token)
    if (!job) return

    if (job.timer) clearTimeout(job.timer)
    this.jobs.delete(token)
    syncLoopsActive.set(this.jobs.size)
    this._log.info({ database: job.name }, 'Sync loop stopped')
  }

  /**
   * Point a running loop at a new name.
   */
  rebind(token: SyncToken, name: DatabaseName): void {
    const job = this.jobs.get(token)
    if (job) job.name = name
  }

  getJob(token: SyncToken): Readonly<SyncJob> | undefined {
    return this.jobs.get(token)
  }

  isRunning(token: SyncToken): boolean {
    return this.jobs.has(token)
  }

  get size(): number {
    return this.jobs.size
  }

  /**
   * Stop every loop. Coordination state is left untouched so the loops can
   * be resumed by the next process.
   */
  shutdown(): void {
    for (const job of this.jobs.values()) {
      if (job.timer) clearTimeout(job.timer)
    }
    this.jobs.clear()
    syncLoopsActive.set(0)
  }

  /**
   * Run one tick for `token` now. Never throws.
   */
  async tick(token: SyncToken): Promise<TickOutcome> {
    const job = this.jobs.get(token)
    if (!job) return 'stopped'

    let outcome: TickOutcome
    try {
      outcome = await this.runTick(job)
      if (outcome === 'synced') job.lastError = undefined
    } catch (err) {
      outcome = 'failed'
      job.lastError = err instanceof Error ? err.message : String(err)
      syncErrorsTotal.inc({ error_type: classifySyncError(err) })
      this._log.warn({ database: job.name, err }, 'Sync tick failed')
    }

    job.lastOutcome = outcome
    job.lastTickAt = new Date()
    syncTicksTotal.inc({ outcome })
    this._log.debug({ database: job.name, outcome }, 'Sync tick finished')

    if (outcome === 'stopped') {
      this.stop(token)
    }
    return outcome
  }

  private schedule(job: SyncJob): void {
    job.timer = setTimeout(async () => {
      job.timer = undefined
      await this.tick(job.token)
      if (this.jobs.get(job.token) === job) {
        this.schedule(job)
      }
    }, this.config.intervalMs)
  }

  private async runTick(job: SyncJob): Promise<TickOutcome> {
    if (!this.resolveBinding(job)) {
      return 'stopped'
    }
    const name = job.name

    const holder = randomUUID()
    if (!this.leases.acquire(name, holder)) {
      syncLeaseContentionTotal.inc({ operation: 'tick' })
      return 'locked'
    }

    try {
      // Unenroll or rename may have landed between the check and the lease
      if (this.leases.getToken(name) !== job.token) {
        return this.resolveBinding(job) ? 'locked' : 'stopped'
      }

      const credential = await this.credentials.get()
      if (!credential) {
        return 'unauthenticated'
      }

      const bytes = await this.snapshots.serializeSnapshot(name)
      if (!bytes) {
        return 'missing'
      }

      const digest = createHash('sha256').update(bytes).digest('hex')
      const marker = this.leases.getMarker(name)
      if (this.config.skipUnchanged && marker?.digest === digest) {
        return 'unchanged'
      }

      const endTimer = syncUploadDuration.startTimer()
      await this.remote.upload(name, bytes, {
        accessToken: credential.accessToken,
        signal: AbortSignal.timeout(this.config.remoteTimeoutMs),
      })
      endTimer()
      syncBytesUploadedTotal.inc(bytes.byteLength)

      const recorded = this.leases.recordSync(name, job.token, {
        syncedAt: Date.now(),
        digest,
        uploads: (marker?.uploads ?? 0) + 1,
      })
      if (!recorded) {
        return 'stopped'
      }

      this._log.info({ database: name, bytes: bytes.byteLength }, 'Snapshot uploaded')
      return 'synced'
    } finally {
      this.leases.release(name, holder)
    }
  }

  /**
   * Make sure the job is bound to the name its token lives under.
   * Returns false when the token no longer exists anywhere.
   */
  private resolveBinding(job: SyncJob): boolean {
    if (this.leases.getToken(job.name) === job.token) {
      return true
    }

    const renamed = this.leases.findNameByToken(job.token)
    if (renamed === undefined) {
      return false
    }

    this._log.info({ from: job.name, to: renamed }, 'Sync loop rebound after rename')
    job.name = renamed
    return true
  }
}

/**
 * Lease Manager
 *
 * Sync state in the shared coordination store, keyed by database name:
 *
 *   sync:token:{name}      enrollment token (no expiry)
 *   sync:lock:{name}       upload lease, holder id with a TTL
 *   sync:last_sync:{name}  LastSyncMarker JSON (no expiry)
 *
 * Every multi-key change runs in one transaction so other processes never
 * observe a half-migrated database.
 */

import type { DatabaseName, LastSyncMarker, SyncToken } from '@tabula/core'
import type { CoordinationRepository } from '@tabula/db'
import { z } from 'zod'
import { NameConflictError, NotEnrolledError } from '../errors'

export const TOKEN_PREFIX = 'sync:token:'
export const LOCK_PREFIX = 'sync:lock:'
export const LAST_SYNC_PREFIX = 'sync:last_sync:'

export const syncKeys = {
  token: (name: DatabaseName) => `${TOKEN_PREFIX}${name}`,
  lock: (name: DatabaseName) => `${LOCK_PREFIX}${name}`,
  lastSync: (name: DatabaseName) => `${LAST_SYNC_PREFIX}${name}`,
}

const markerSchema = z.object({
  syncedAt: z.number().nullable(),
  digest: z.string().nullable(),
  uploads: z.number().int().nonnegative().default(0),
})

export const EMPTY_MARKER: LastSyncMarker = { syncedAt: null, digest: null, uploads: 0 }

export interface Enrollment {
  name: DatabaseName
  token: SyncToken
}

export class LeaseManager {
  private readonly store: CoordinationRepository
  private readonly leaseTtlMs: number

  constructor(store: CoordinationRepository, leaseTtlMs: number) {
    this.store = store
    this.leaseTtlMs = leaseTtlMs
  }

  getToken(name: DatabaseName): SyncToken | undefined {
    return this.store.get(syncKeys.token(name))
  }

  /**
   * Enroll `name` with `token` and an empty marker.
   * Returns false when the name is already enrolled.
   */
  createToken(name: DatabaseName, token: SyncToken): boolean {
    return this.store.transaction(() => {
      if (!this.store.setIfAbsent(syncKeys.token(name), token)) {
        return false
      }
      this.store.set(syncKeys.lastSync(name), JSON.stringify(EMPTY_MARKER))
      return true
    })
  }

  /**
   * Remove token and marker. The lease is left to its holder, which releases
   * it by value. Returns false when the name was not enrolled.
   */
  revoke(name: DatabaseName): boolean {
    return this.store.transaction(() => {
      const removed = this.store.delete(syncKeys.token(name))
      this.store.delete(syncKeys.lastSync(name))
      return removed > 0
    })
  }

  /**
   * Remove token, lease and marker.
   */
  purge(name: DatabaseName): void {
    this.store.delete(syncKeys.token(name), syncKeys.lock(name), syncKeys.lastSync(name))
  }

  /**
   * Find the name a token is currently bound to.
   */
  findNameByToken(token: SyncToken): DatabaseName | undefined {
    const entry = this.store.scan(TOKEN_PREFIX).find((e) => e.value === token)
    return entry?.key.slice(TOKEN_PREFIX.length)
  }

  listEnrolled(): Enrollment[] {
    return this.store.scan(TOKEN_PREFIX).map((entry) => ({
      name: entry.key.slice(TOKEN_PREFIX.length),
      token: entry.value,
    }))
  }

  /**
   * Try to take the lease without waiting.
   */
  acquire(name: DatabaseName, holder: string): boolean {
    return this.store.setIfAbsent(syncKeys.lock(name), holder, { ttlMs: this.leaseTtlMs })
  }

  /**
   * Release the lease if `holder` still owns it.
   */
  release(name: DatabaseName, holder: string): boolean {
    return this.store.deleteIfValue(syncKeys.lock(name), holder)
  }

  leaseHolder(name: DatabaseName): string | undefined {
    return this.store.get(syncKeys.lock(name))
  }

  getMarker(name: DatabaseName): LastSyncMarker | undefined {
    const raw = this.store.get(syncKeys.lastSync(name))
    if (raw === undefined) return undefined

    let value: unknown
    try {
      value = JSON.parse(raw)
    } catch {
      return undefined
    }
    const parsed = markerSchema.safeParse(value)
    return parsed.success ? parsed.data : undefined
  }

  /**
   * Write the marker only while `token` is still bound to `name`.
   */
  recordSync(name: DatabaseName, token: SyncToken, marker: LastSyncMarker): boolean {
    return this.store.transaction(() => {
      if (this.getToken(name) !== token) {
        return false
      }
      this.store.set(syncKeys.lastSync(name), JSON.stringify(marker))
      return true
    })
  }

  /**
   * Move token and marker from `oldName` to `newName` in one transaction.
   * The token value is preserved.
   */
  migrate(oldName: DatabaseName, newName: DatabaseName, token: SyncToken): void {
    this.store.transaction(() => {
      if (this.getToken(oldName) !== token) {
        throw new NotEnrolledError(oldName)
      }
      if (this.getToken(newName) !== undefined) {
        throw new NameConflictError(newName)
      }

      const marker = this.store.get(syncKeys.lastSync(oldName)) ?? JSON.stringify(EMPTY_MARKER)
      this.store.set(syncKeys.token(newName), token)
      this.store.set(syncKeys.lastSync(newName), marker)
      this.store.delete(syncKeys.token(oldName), syncKeys.lastSync(oldName))
    })
  }
}

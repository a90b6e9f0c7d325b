/**
 * Coordination Repository
 *
 * Key-value store with optional per-key expiry, shared by every process that
 * opens the same database file. Expired rows are treated as absent and are
 * cleared lazily on read or by purgeExpired().
 */

import { and, eq, gt, inArray, isNotNull, isNull, lte, or, sql } from 'drizzle-orm'
import type { DrizzleDb } from '../database'
import { coordinationKeys } from '../schema'

export interface CoordinationEntry {
  key: string
  value: string
  expiresAt: Date | null
}

export interface SetOptions {
  /** Time to live in milliseconds. Omit for a key that never expires. */
  ttlMs?: number
}

export class CoordinationRepository {
  private db: DrizzleDb
  private clock: () => number

  constructor(db: DrizzleDb, clock: () => number = () => Date.now()) {
    this.db = db
    this.clock = clock
  }

  /**
   * Read a live key.
   */
  get(key: string): string | undefined {
    return this.find(key)?.value
  }

  /**
   * Read a live key together with its expiry.
   */
  find(key: string): CoordinationEntry | undefined {
    const now = this.now()
    const row = this.db
      .select()
      .from(coordinationKeys)
      .where(eq(coordinationKeys.key, key))
      .get()

    if (!row) return undefined
    if (row.expiresAt && row.expiresAt.getTime() <= now.getTime()) {
      this.db
        .delete(coordinationKeys)
        .where(and(eq(coordinationKeys.key, key), lte(coordinationKeys.expiresAt, now)))
        .run()
      return undefined
    }

    return { key: row.key, value: row.value, expiresAt: row.expiresAt }
  }

  /**
   * Unconditionally write a key, replacing any previous value and expiry.
   */
  set(key: string, value: string, options: SetOptions = {}): void {
    const now = this.now()
    const expiresAt = this.expiryFrom(now, options.ttlMs)

    this.db
      .insert(coordinationKeys)
      .values({ key, value, expiresAt, updatedAt: now })
      .onConflictDoUpdate({
        target: coordinationKeys.key,
        set: { value, expiresAt, updatedAt: now },
      })
      .run()
  }

  /**
   * Write a key only if it is absent or expired.
   * Returns true when this call wrote it.
   */
  setIfAbsent(key: string, value: string, options: SetOptions = {}): boolean {
    const now = this.now()
    const expiresAt = this.expiryFrom(now, options.ttlMs)

    const result = this.db
      .insert(coordinationKeys)
      .values({ key, value, expiresAt, updatedAt: now })
      .onConflictDoUpdate({
        target: coordinationKeys.key,
        set: { value, expiresAt, updatedAt: now },
        setWhere: and(isNotNull(coordinationKeys.expiresAt), lte(coordinationKeys.expiresAt, now)),
      })
      .run()

    return result.changes > 0
  }

  /**
   * Delete keys regardless of value. Returns the number of live keys removed.
   */
  delete(...keys: string[]): number {
    if (keys.length === 0) return 0
    const live = this.db
      .delete(coordinationKeys)
      .where(and(inArray(coordinationKeys.key, keys), this.liveAt(this.now())))
      .run()
    this.db.delete(coordinationKeys).where(inArray(coordinationKeys.key, keys)).run()
    return live.changes
  }

  /**
   * Delete a key only while it still holds `value`.
   */
  deleteIfValue(key: string, value: string): boolean {
    const result = this.db
      .delete(coordinationKeys)
      .where(
        and(
          eq(coordinationKeys.key, key),
          eq(coordinationKeys.value, value),
          this.liveAt(this.now()),
        ),
      )
      .run()
    return result.changes > 0
  }

  /**
   * List live entries whose key starts with `prefix`, ordered by key.
   */
  scan(prefix: string): CoordinationEntry[] {
    return this.db
      .select({
        key: coordinationKeys.key,
        value: coordinationKeys.value,
        expiresAt: coordinationKeys.expiresAt,
      })
      .from(coordinationKeys)
      .where(
        and(
          sql`substr(${coordinationKeys.key}, 1, ${prefix.length}) = ${prefix}`,
          this.liveAt(this.now()),
        ),
      )
      .orderBy(coordinationKeys.key)
      .all()
  }

  /**
   * Run `fn` inside an IMMEDIATE transaction so the write lock is taken up
   * front. Every method on this repository may be called from within `fn`.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(() => fn(), { behavior: 'immediate' })
  }

  /**
   * Remove every expired row. Returns the number removed.
   */
  purgeExpired(): number {
    const result = this.db
      .delete(coordinationKeys)
      .where(and(isNotNull(coordinationKeys.expiresAt), lte(coordinationKeys.expiresAt, this.now())))
      .run()
    return result.changes
  }

  private liveAt(now: Date) {
    return or(isNull(coordinationKeys.expiresAt), gt(coordinationKeys.expiresAt, now))
  }

  private expiryFrom(now: Date, ttlMs: number | undefined): Date | null {
    if (ttlMs === undefined) return null
    return new Date(now.getTime() + Math.max(1, Math.floor(ttlMs)))
  }

  private now(): Date {
    return new Date(this.clock())
  }
}

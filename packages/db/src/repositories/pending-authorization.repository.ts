/**
 * Pending Authorization Repository
 *
 * Persists loopback OAuth attempts keyed by their state nonce. A row is
 * resolved at most once (by the redirect) and consumed at most once (by the
 * polling client).
 */

import type { AuthState } from '@tabula/core'
import { and, eq, gt, isNull, lte } from 'drizzle-orm'
import type { DrizzleDb } from '../database'
import { pendingAuthorizations } from '../schema'

export type PendingAuthorization = typeof pendingAuthorizations.$inferSelect

export interface NewPendingAuthorization {
  state: AuthState
  codeVerifier: string
  redirectUri: string
  expiresAt: Date
}

export type AuthorizationOutcome = { code: string } | { error: string }

export class PendingAuthorizationRepository {
  private db: DrizzleDb

  constructor(db: DrizzleDb) {
    this.db = db
  }

  create(entry: NewPendingAuthorization): void {
    this.db
      .insert(pendingAuthorizations)
      .values({ ...entry, createdAt: new Date() })
      .run()
  }

  findByState(state: AuthState): PendingAuthorization | undefined {
    return this.db
      .select()
      .from(pendingAuthorizations)
      .where(eq(pendingAuthorizations.state, state))
      .get()
  }

  /**
   * Record the redirect outcome for an unexpired, unresolved attempt.
   * Returns false when the state is unknown, expired or already resolved.
   */
  resolve(state: AuthState, outcome: AuthorizationOutcome, now = new Date()): boolean {
    const result = this.db
      .update(pendingAuthorizations)
      .set({
        authorizationCode: 'code' in outcome ? outcome.code : null,
        error: 'error' in outcome ? outcome.error : null,
        resolvedAt: now,
      })
      .where(
        and(
          eq(pendingAuthorizations.state, state),
          isNull(pendingAuthorizations.authorizationCode),
          isNull(pendingAuthorizations.error),
          gt(pendingAuthorizations.expiresAt, now),
        ),
      )
      .run()
    return result.changes === 1
  }

  /**
   * Delete and return the attempt. Only one caller can consume a given state.
   */
  consume(state: AuthState): PendingAuthorization | undefined {
    return this.db
      .delete(pendingAuthorizations)
      .where(eq(pendingAuthorizations.state, state))
      .returning()
      .get()
  }

  deleteExpired(now = new Date()): number {
    return this.db
      .delete(pendingAuthorizations)
      .where(lte(pendingAuthorizations.expiresAt, now))
      .run().changes
  }
}

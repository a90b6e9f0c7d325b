/**
 * Drizzle ORM Schema
 *
 * Custom column type for automatic Date↔integer conversion. Identifier
 * aliases from @tabula/core are applied via $type<>().
 */

import type { AuthState } from '@tabula/core'
import { customType, index, sqliteTable, text } from 'drizzle-orm/sqlite-core'

/**
 * Custom column type: stores Date as integer (epoch ms) in SQLite.
 * Nullable columns omit .notNull(); Drizzle passes null through.
 */
const timestamp = customType<{ data: Date; driverData: number }>({
  dataType() {
    return 'integer'
  },
  toDriver(value: Date): number {
    return value.getTime()
  },
  fromDriver(value: number): Date {
    return new Date(value)
  },
})

/**
 * Shared key-value coordination store: sync tokens, leases, last-sync
 * markers and the current access token. A null expiry never expires.
 */
export const coordinationKeys = sqliteTable(
  'coordination_keys',
  {
    key: text('key').primaryKey(),
    value: text('value').notNull(),
    expiresAt: timestamp('expires_at'),
    updatedAt: timestamp('updated_at').notNull(),
  },
  (table) => [index('idx_coordination_keys_expires_at').on(table.expiresAt)],
)

/**
 * In-flight loopback authorizations, keyed by the single-use state nonce.
 */
export const pendingAuthorizations = sqliteTable(
  'pending_authorizations',
  {
    state: text('state').$type<AuthState>().primaryKey(),
    codeVerifier: text('code_verifier').notNull(),
    redirectUri: text('redirect_uri').notNull(),
    authorizationCode: text('authorization_code'),
    error: text('error'),
    createdAt: timestamp('created_at').notNull(),
    resolvedAt: timestamp('resolved_at'),
    expiresAt: timestamp('expires_at').notNull(),
  },
  (table) => [index('idx_pending_authorizations_expires_at').on(table.expiresAt)],
)

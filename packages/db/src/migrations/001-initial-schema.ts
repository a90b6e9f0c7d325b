/**
 * Migration 001: Initial Schema
 *
 * Creates all tables for durability:
 * - coordination_keys: Sync tokens, leases, markers and the access token
 * - pending_authorizations: Loopback OAuth attempts
 */

import type BetterSqlite3 from 'better-sqlite3'

type Database = BetterSqlite3.Database

export const version = 1

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS coordination_keys (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      expires_at INTEGER,
      updated_at INTEGER NOT NULL
    )
  `)

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_coordination_keys_expires_at ON coordination_keys(expires_at)
  `)

  db.exec(`
    CREATE TABLE IF NOT EXISTS pending_authorizations (
      state TEXT PRIMARY KEY,
      code_verifier TEXT NOT NULL,
      redirect_uri TEXT NOT NULL,
      authorization_code TEXT,
      error TEXT,
      created_at INTEGER NOT NULL,
      resolved_at INTEGER,
      expires_at INTEGER NOT NULL
    )
  `)

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_pending_authorizations_expires_at
      ON pending_authorizations(expires_at)
  `)
}

export function down(db: Database): void {
  db.exec('DROP TABLE IF EXISTS pending_authorizations')
  db.exec('DROP TABLE IF EXISTS coordination_keys')
}

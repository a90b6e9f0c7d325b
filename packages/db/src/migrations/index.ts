/**
 * Migration Runner
 *
 * Applies database migrations in order, tracking which have been applied.
 */

import type BetterSqlite3 from 'better-sqlite3'
import * as migration001 from './001-initial-schema'

type Database = BetterSqlite3.Database

export interface Migration {
  version: number
  up: (db: Database) => void
  down: (db: Database) => void
}

const migrations: Migration[] = [
  {
    version: migration001.version,
    up: migration001.up,
    down: migration001.down,
  },
]

function getCurrentVersion(db: Database): number {
  const row = db.prepare('SELECT MAX(version) AS version FROM schema_version').get()
  if (row && typeof row === 'object' && 'version' in row && typeof row.version === 'number') {
    return row.version
  }
  return 0
}

function initSchemaVersionTable(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `)
}

/**
 * Run all pending migrations.
 */
export function runMigrations(db: Database): { applied: number[]; current: number } {
  initSchemaVersionTable(db)

  const currentVersion = getCurrentVersion(db)
  const pendingMigrations = migrations.filter((m) => m.version > currentVersion)
  const applied: number[] = []
  const record = db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)')

  for (const migration of pendingMigrations) {
    db.transaction(() => {
      migration.up(db)
      record.run(migration.version, Date.now())
    })()
    applied.push(migration.version)
  }

  return {
    applied,
    current: applied.length > 0 ? applied[applied.length - 1] : currentVersion,
  }
}

/**
 * Rollback the last migration.
 */
export function rollbackMigration(db: Database): number | null {
  initSchemaVersionTable(db)
  const currentVersion = getCurrentVersion(db)
  if (currentVersion === 0) {
    return null
  }

  const migration = migrations.find((m) => m.version === currentVersion)
  if (!migration) {
    throw new Error(`Migration ${currentVersion} not found`)
  }

  db.transaction(() => {
    migration.down(db)
    db.prepare('DELETE FROM schema_version WHERE version = ?').run(currentVersion)
  })()

  return currentVersion
}

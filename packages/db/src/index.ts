/**
 * @tabula/db
 *
 * SQLite persistence layer for Tabula using Drizzle ORM on better-sqlite3.
 * The database file is the shared coordination store: every server process
 * that opens it sees the same sync tokens, leases and markers.
 *
 * Custom column types handle Date↔integer conversion.
 */

export {
  closeDatabase,
  createTestDatabase,
  initDatabase,
  type DatabaseConfig,
  type DrizzleDb,
} from './database'
export { rollbackMigration, runMigrations, type Migration } from './migrations'
export * from './repositories'
export * as schema from './schema'

/**
 * Sync Module
 *
 * Periodic upload of database snapshots to the remote object store, with
 * per-database leases in the shared coordination store.
 */

export {
  EMPTY_MARKER,
  LeaseManager,
  LAST_SYNC_PREFIX,
  LOCK_PREFIX,
  TOKEN_PREFIX,
  syncKeys,
  type Enrollment,
} from './lease'

export { SyncScheduler, type SyncJob, type SyncSchedulerDeps } from './scheduler'

export {
  SyncCoordinator,
  type DatabaseSummary,
  type SyncCoordinatorConfig,
} from './coordinator'

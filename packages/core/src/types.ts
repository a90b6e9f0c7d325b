/**
 * Core types for the Tabula synchronized-persistence service
 */

// =============================================================================
// Identifier Types
// =============================================================================

/**
 * Name of a database. Also the local snapshot filename stem and the remote
 * object name.
 * @example 'inventory'
 * @example 'q3-budget'
 */
export type DatabaseName = string

/**
 * Opaque handle marking a database as enrolled for periodic sync.
 * @example '3f0c1b9e-5f6a-4c2b-9a61-0d7e2f4b8c11'
 */
export type SyncToken = string

/**
 * Random nonce identifying one loopback authorization attempt.
 * @example 'Jx1m0N2q9bQp7tC4sVw8yZ3aLkE6rH5u'
 */
export type AuthState = string

// =============================================================================
// Sync Types
// =============================================================================

/**
 * Marker written after a successful upload.
 */
export interface LastSyncMarker {
  /**
   * When the last successful upload finished (ms since epoch).
   * Null until the first upload after enrollment.
   * @example 1705329000000
   */
  syncedAt: number | null

  /**
   * SHA-256 of the uploaded snapshot, hex encoded.
   * Null until the first upload after enrollment.
   */
  digest: string | null

  /**
   * Number of uploads since enrollment.
   */
  uploads: number
}

/**
 * Outcome of one scheduler tick.
 * - `stopped`: token revoked, loop terminated
 * - `locked`: lease held by another tick or process, skipped
 * - `unauthenticated`: no valid access token, skipped
 * - `missing`: no local snapshot for the bound name, skipped
 * - `unchanged`: snapshot digest matches the marker, skipped
 * - `synced`: snapshot uploaded and marker updated
 * - `failed`: transient failure, logged and skipped
 */
export type TickOutcome =
  | 'stopped'
  | 'locked'
  | 'unauthenticated'
  | 'missing'
  | 'unchanged'
  | 'synced'
  | 'failed'

/**
 * Enrollment status reported to shells.
 */
export interface SyncStatus {
  database: DatabaseName
  enrolled: boolean

  /**
   * Time of the last successful upload, if any.
   */
  lastSyncAt?: Date

  /**
   * Outcome of the most recent tick run by this process, if any.
   */
  lastOutcome?: TickOutcome

  /**
   * Error message of the most recent failed tick, cleared on success.
   */
  lastError?: string
}

// =============================================================================
// Credential Types
// =============================================================================

/**
 * Credential for the remote-storage account.
 */
export interface Credential {
  accessToken: string

  /**
   * Absolute expiry of the access token.
   */
  expiresAt: Date

  /**
   * Present only where the process holds the client-side refresh token.
   */
  refreshToken?: string
}

/**
 * Client-held storage for the long-lived refresh token.
 * Lives in the shell process, never in the coordination store.
 */
export interface RefreshTokenStore {
  get(): Promise<string | undefined>
  set(refreshToken: string): Promise<void>
  clear(): Promise<void>
}

/**
 * Tokens returned by the identity provider's token endpoint.
 */
export interface TokenGrant {
  accessToken: string

  /**
   * Access token lifetime in seconds.
   * @example 3599
   */
  expiresIn: number

  refreshToken?: string
  scope?: string
  tokenType?: string
}

/**
 * Result of starting a device authorization.
 */
export interface DeviceAuthorization {
  deviceCode: string

  /**
   * Code the user types at the verification URL.
   * @example 'WDJB-MJHT'
   */
  userCode: string

  /**
   * @example 'https://www.google.com/device'
   */
  verificationUrl: string

  pollIntervalSeconds: number

  /**
   * Absolute expiry of the device code.
   */
  expiresAt: Date
}

/**
 * Result of polling a device authorization.
 */
export type DevicePollResult =
  | { status: 'pending'; pollIntervalSeconds: number }
  | { status: 'granted'; grant: TokenGrant }
  | { status: 'denied' }
  | { status: 'expired' }

/**
 * Result of starting a loopback authorization.
 */
export interface LoopbackAuthorization {
  authorizationUrl: string
  state: AuthState

  /**
   * Absolute expiry of the attempt.
   */
  expiresAt: Date
}

/**
 * Result of polling a loopback authorization.
 */
export type LoopbackPollResult =
  | { status: 'pending' }
  | { status: 'ready'; code: string; codeVerifier: string; redirectUri: string }
  | { status: 'denied'; error: string }
  | { status: 'expired' }

// =============================================================================
// Configuration
// =============================================================================

/**
 * OAuth client registration and provider endpoints.
 */
export interface OAuthConfig {
  /**
   * Unset disables both acquisition flows.
   */
  clientId?: string
  clientSecret?: string

  /**
   * @example 'https://www.googleapis.com/auth/drive.file'
   */
  scope: string

  authorizationEndpoint: string
  tokenEndpoint: string
  deviceAuthorizationEndpoint: string
}

/**
 * Timing parameters for the sync engine.
 */
export interface SyncConfig {
  /**
   * Delay between ticks of one database's loop, in milliseconds.
   * @example 5000
   */
  intervalMs: number

  /**
   * Lease lifetime. Must exceed the worst-case upload time.
   * @example 30000
   */
  leaseTtlMs: number

  /**
   * Bounded wait for rename/delete to take the lease.
   * @example 10000
   */
  leaseWaitMs: number

  /**
   * Timeout applied to every remote call.
   * @example 20000
   */
  remoteTimeoutMs: number

  /**
   * Skip the upload when the snapshot digest matches the marker.
   */
  skipUnchanged: boolean
}

/**
 * Top-level service configuration.
 */
export interface TabulaConfig {
  apiHost: string
  apiPort: number

  /**
   * Base URL the identity provider redirects the browser to.
   * @example 'http://127.0.0.1:8000'
   */
  publicUrl: string

  /**
   * SQLite file holding the coordination store.
   * @example 'data/tabula.db'
   */
  dbPath: string

  /**
   * Directory of local snapshot files, one `{name}.json` per database.
   */
  snapshotDir: string

  logLevel: string

  sync: SyncConfig
  oauth: OAuthConfig

  /**
   * Lifetime of a loopback authorization attempt.
   * @example 300000
   */
  loopbackTimeoutMs: number

  /**
   * Optional Drive folder that receives uploads.
   */
  driveFolderId?: string
}

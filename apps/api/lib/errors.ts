/**
 * Domain Error Types
 *
 * Custom error classes with HTTP status codes for automatic error handling.
 * Elysia's error handler maps error.status to HTTP responses and error.code
 * to the machine-readable `code` field of the body.
 */

export class DatabaseNotFoundError extends Error {
  readonly status = 404
  readonly code = 'DATABASE_NOT_FOUND'

  constructor(name: string) {
    super(`Database ${name} not found`)
    this.name = 'DatabaseNotFoundError'
  }
}

export class RemoteObjectNotFoundError extends Error {
  readonly status = 404
  readonly code = 'REMOTE_OBJECT_NOT_FOUND'

  constructor(name: string) {
    super(`No remote copy of ${name}`)
    this.name = 'RemoteObjectNotFoundError'
  }
}

export class InvalidDatabaseNameError extends Error {
  readonly status = 400
  readonly code = 'INVALID_DATABASE_NAME'

  constructor(name: string, reason: string) {
    super(`Invalid database name "${name}": ${reason}`)
    this.name = 'InvalidDatabaseNameError'
  }
}

export class InvalidSnapshotError extends Error {
  readonly status = 400
  readonly code = 'INVALID_SNAPSHOT'

  constructor(reason: string) {
    super(`Invalid snapshot document: ${reason}`)
    this.name = 'InvalidSnapshotError'
  }
}

export class AlreadyEnrolledError extends Error {
  readonly status = 409
  readonly code = 'ALREADY_ENROLLED'

  constructor(name: string) {
    super(`Database ${name} is already enrolled for sync`)
    this.name = 'AlreadyEnrolledError'
  }
}

export class NotEnrolledError extends Error {
  readonly status = 404
  readonly code = 'NOT_ENROLLED'

  constructor(name: string) {
    super(`Database ${name} is not enrolled for sync`)
    this.name = 'NotEnrolledError'
  }
}

export class NameConflictError extends Error {
  readonly status = 409
  readonly code = 'NAME_CONFLICT'

  constructor(name: string) {
    super(`Database ${name} already exists`)
    this.name = 'NameConflictError'
  }
}

export class LeaseUnavailableError extends Error {
  readonly status = 423
  readonly code = 'LEASE_UNAVAILABLE'

  constructor(name: string, waitedMs: number) {
    super(`Sync lease for ${name} still held after ${waitedMs}ms`)
    this.name = 'LeaseUnavailableError'
  }
}

export class AuthenticationRequiredError extends Error {
  readonly status = 401
  readonly code = 'AUTHENTICATION_REQUIRED'

  constructor(message = 'No valid access token; log in first') {
    super(message)
    this.name = 'AuthenticationRequiredError'
  }
}

export class InvalidTokenExpiryError extends Error {
  readonly status = 400
  readonly code = 'INVALID_TOKEN_EXPIRY'

  constructor() {
    super('Access token expiry must be a valid date')
    this.name = 'InvalidTokenExpiryError'
  }
}

export class AuthorizationDeniedError extends Error {
  readonly status = 403
  readonly code = 'AUTHORIZATION_DENIED'

  constructor(reason = 'access_denied') {
    super(`Authorization denied: ${reason}`)
    this.name = 'AuthorizationDeniedError'
  }
}

export class AuthorizationExpiredError extends Error {
  readonly status = 410
  readonly code = 'AUTHORIZATION_EXPIRED'

  constructor() {
    super('Authorization request expired; start again')
    this.name = 'AuthorizationExpiredError'
  }
}

export class InvalidCallbackStateError extends Error {
  readonly status = 400
  readonly code = 'INVALID_CALLBACK_STATE'

  constructor() {
    super('Unknown, expired or already used authorization state')
    this.name = 'InvalidCallbackStateError'
  }
}

export class OAuthNotConfiguredError extends Error {
  readonly status = 503
  readonly code = 'OAUTH_NOT_CONFIGURED'

  constructor() {
    super('OAuth client is not configured (set TABULA_OAUTH_CLIENT_ID)')
    this.name = 'OAuthNotConfiguredError'
  }
}

export class TransientSyncError extends Error {
  readonly status = 503
  readonly code = 'TRANSIENT_SYNC_FAILURE'

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransientSyncError'
  }
}

export { OAuthRequestError as OAuthProviderError } from '@tabula/core'

/**
 * Type guard for domain errors with an HTTP status code.
 */
export function isDomainError(err: unknown): err is Error & { status: number; code?: string } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number'
}

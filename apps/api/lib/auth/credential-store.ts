/**
 * Credential Store
 *
 * Single source of truth for the remote-storage access token. The access
 * token and its expiry live in the coordination store under two global keys
 * with a TTL, so every process sees the same credential and an expired token
 * simply disappears. The refresh token is never written there: when the
 * process holds a client-side RefreshTokenStore it is forwarded to it.
 */

import type { Credential, RefreshTokenStore, TokenGrant } from '@tabula/core'
import type { CoordinationRepository } from '@tabula/db'
import { InvalidTokenExpiryError } from '../errors'
import type { Logger } from '../logger'

export const ACCESS_TOKEN_KEY = 'auth:access_token'
export const TOKEN_EXPIRY_KEY = 'auth:token_expiry'

/** Tokens are treated as expired this long before the provider says so. */
export const TOKEN_EXPIRY_SKEW_MS = 30_000

export interface CredentialStoreOptions {
  refreshTokens?: RefreshTokenStore
  clock?: () => number
}

export class CredentialStore {
  private readonly coordination: CoordinationRepository
  private readonly logger: Logger
  private readonly refreshTokens?: RefreshTokenStore
  private readonly clock: () => number

  constructor(
    coordination: CoordinationRepository,
    logger: Logger,
    options: CredentialStoreOptions = {},
  ) {
    this.coordination = coordination
    this.logger = logger.child({ component: 'CredentialStore' })
    this.refreshTokens = options.refreshTokens
    this.clock = options.clock ?? (() => Date.now())
  }

  /**
   * Store the access token until `expiresAt`. Repeating the call with the
   * same values is harmless.
   */
  async save(accessToken: string, expiresAt: Date, refreshToken?: string): Promise<void> {
    if (!Number.isFinite(expiresAt.getTime())) {
      throw new InvalidTokenExpiryError()
    }
    const ttlMs = Math.max(1000, expiresAt.getTime() - this.clock())

    this.coordination.transaction(() => {
      this.coordination.set(ACCESS_TOKEN_KEY, accessToken, { ttlMs })
      this.coordination.set(TOKEN_EXPIRY_KEY, String(expiresAt.getTime()), { ttlMs })
    })

    if (refreshToken && this.refreshTokens) {
      await this.refreshTokens.set(refreshToken)
    }

    this.logger.info({ expiresAt }, 'Access token stored')
  }

  /**
   * Store a provider grant, shortening its lifetime by the expiry skew.
   */
  async saveGrant(grant: TokenGrant): Promise<Credential> {
    const lifetimeMs = Math.max(1000, grant.expiresIn * 1000 - TOKEN_EXPIRY_SKEW_MS)
    const expiresAt = new Date(this.clock() + lifetimeMs)
    await this.save(grant.accessToken, expiresAt, grant.refreshToken)
    return { accessToken: grant.accessToken, expiresAt, refreshToken: grant.refreshToken }
  }

  /**
   * Current credential, or undefined when authentication is required.
   */
  async get(): Promise<Credential | undefined> {
    const accessToken = this.coordination.get(ACCESS_TOKEN_KEY)
    const expiry = Number(this.coordination.get(TOKEN_EXPIRY_KEY))

    if (!accessToken || !Number.isFinite(expiry) || expiry <= this.clock()) {
      return undefined
    }

    const refreshToken = this.refreshTokens ? await this.refreshTokens.get() : undefined
    return { accessToken, expiresAt: new Date(expiry), refreshToken }
  }

  /**
   * Remove the access token and expiry keys. Enrollment state is untouched.
   */
  purgeAccessToken(): void {
    const removed = this.coordination.delete(ACCESS_TOKEN_KEY, TOKEN_EXPIRY_KEY)
    if (removed > 0) {
      this.logger.info('Access token purged')
    }
  }
}

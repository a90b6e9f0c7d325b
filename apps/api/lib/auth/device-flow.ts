/**
 * Device Authorization Flow
 *
 * Idle → Requested → Polling → Granted | Denied | Expired.
 *
 * The server holds one session per device code in memory. Each poll makes a
 * single token request; the shell is expected to wait the returned interval
 * between polls.
 */

import {
  type DeviceAuthorization,
  type DevicePollResult,
  OAuthRequestError,
  type OAuthClient,
} from '@tabula/core'
import { OAuthNotConfiguredError } from '../errors'
import type { Logger } from '../logger'
import type { CredentialStore } from './credential-store'

/** Added to the poll interval each time the provider answers slow_down. */
export const SLOW_DOWN_INCREMENT_SECONDS = 5

interface DeviceSession {
  pollIntervalSeconds: number
  expiresAt: number
}

export class DeviceAuthorizationFlow {
  private readonly oauth: OAuthClient
  private readonly credentials: CredentialStore
  private readonly logger: Logger
  private readonly clock: () => number
  private readonly sessions = new Map<string, DeviceSession>()

  constructor(
    oauth: OAuthClient,
    credentials: CredentialStore,
    logger: Logger,
    clock: () => number = () => Date.now(),
  ) {
    this.oauth = oauth
    this.credentials = credentials
    this.logger = logger.child({ component: 'DeviceAuthorizationFlow' })
    this.clock = clock
  }

  async start(): Promise<DeviceAuthorization> {
    if (!this.oauth.configured) {
      throw new OAuthNotConfiguredError()
    }
    this.pruneExpired()

    const response = await this.oauth.requestDeviceCode()
    const expiresAt = this.clock() + response.expiresIn * 1000
    this.sessions.set(response.deviceCode, {
      pollIntervalSeconds: response.interval,
      expiresAt,
    })

    this.logger.info(
      { userCode: response.userCode, expiresIn: response.expiresIn },
      'Device authorization requested',
    )

    return {
      deviceCode: response.deviceCode,
      userCode: response.userCode,
      verificationUrl: response.verificationUrl,
      pollIntervalSeconds: response.interval,
      expiresAt: new Date(expiresAt),
    }
  }

  async poll(deviceCode: string): Promise<DevicePollResult> {
    const session = this.sessions.get(deviceCode)
    if (!session || session.expiresAt <= this.clock()) {
      this.sessions.delete(deviceCode)
      return { status: 'expired' }
    }

    const response = await this.oauth.pollDeviceToken(deviceCode)

    if (response.kind === 'grant') {
      this.sessions.delete(deviceCode)
      await this.credentials.saveGrant(response.grant)
      this.logger.info('Device authorization granted')
      return { status: 'granted', grant: response.grant }
    }

    switch (response.error) {
      case 'authorization_pending':
        return { status: 'pending', pollIntervalSeconds: session.pollIntervalSeconds }

      case 'slow_down':
        session.pollIntervalSeconds += SLOW_DOWN_INCREMENT_SECONDS
        this.logger.debug(
          { pollIntervalSeconds: session.pollIntervalSeconds },
          'Provider asked to slow down',
        )
        return { status: 'pending', pollIntervalSeconds: session.pollIntervalSeconds }

      case 'access_denied':
        this.sessions.delete(deviceCode)
        this.logger.info('Device authorization denied')
        return { status: 'denied' }

      case 'expired_token':
        this.sessions.delete(deviceCode)
        return { status: 'expired' }

      default:
        this.sessions.delete(deviceCode)
        throw new OAuthRequestError(
          `Device token request failed: ${response.description ?? response.error}`,
          response.error,
        )
    }
  }

  /** Number of device codes awaiting a decision. */
  get pending(): number {
    return this.sessions.size
  }

  private pruneExpired(): void {
    const now = this.clock()
    for (const [deviceCode, session] of this.sessions) {
      if (session.expiresAt <= now) {
        this.sessions.delete(deviceCode)
      }
    }
  }
}

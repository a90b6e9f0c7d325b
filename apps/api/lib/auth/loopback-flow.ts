/**
 * Loopback Redirect Flow
 *
 * Started → AwaitingCallback → CodeReceived | TimedOut.
 *
 * Each attempt is a PendingAuthorization row keyed by a random state. The
 * provider redirects the browser to `/oauth/callback`, which resolves the row
 * exactly once; the shell polls until the code is ready and exchanges it with
 * the provider itself.
 */

import {
  type AuthState,
  type LoopbackAuthorization,
  type LoopbackPollResult,
  type OAuthClient,
  createPkcePair,
  createState,
} from '@tabula/core'
import type { PendingAuthorizationRepository } from '@tabula/db'
import { InvalidCallbackStateError, OAuthNotConfiguredError } from '../errors'
import type { Logger } from '../logger'

export const CALLBACK_PATH = '/oauth/callback'

export interface LoopbackFlowOptions {
  /** Base URL the browser can reach this server at. */
  publicUrl: string
  /** Lifetime of one attempt. */
  timeoutMs: number
  clock?: () => number
}

export interface CallbackParams {
  state?: string
  code?: string
  error?: string
}

export type CallbackResult = { status: 'granted' } | { status: 'denied'; error: string }

export class LoopbackAuthorizationFlow {
  private readonly oauth: OAuthClient
  private readonly pending: PendingAuthorizationRepository
  private readonly logger: Logger
  private readonly redirectUri: string
  private readonly timeoutMs: number
  private readonly clock: () => number

  constructor(
    oauth: OAuthClient,
    pending: PendingAuthorizationRepository,
    logger: Logger,
    options: LoopbackFlowOptions,
  ) {
    this.oauth = oauth
    this.pending = pending
    this.logger = logger.child({ component: 'LoopbackAuthorizationFlow' })
    this.redirectUri = `${options.publicUrl.replace(/\/+$/, '')}${CALLBACK_PATH}`
    this.timeoutMs = options.timeoutMs
    this.clock = options.clock ?? (() => Date.now())
  }

  start(): LoopbackAuthorization {
    if (!this.oauth.configured) {
      throw new OAuthNotConfiguredError()
    }

    const state = createState()
    const pkce = createPkcePair()
    const expiresAt = new Date(this.clock() + this.timeoutMs)

    this.pending.create({
      state,
      codeVerifier: pkce.verifier,
      redirectUri: this.redirectUri,
      expiresAt,
    })

    return {
      authorizationUrl: this.oauth.buildAuthorizationUrl({
        state,
        codeChallenge: pkce.challenge,
        redirectUri: this.redirectUri,
      }),
      state,
      expiresAt,
    }
  }

  /**
   * Record the provider redirect. Rejects unknown, expired and already
   * resolved states without touching any row.
   */
  callback(params: CallbackParams): CallbackResult {
    const state = params.state
    if (!state) {
      this.logger.warn('Authorization callback without state rejected')
      throw new InvalidCallbackStateError()
    }

    const error = params.error ?? (params.code ? undefined : 'missing_code')
    const outcome = error !== undefined ? { error } : { code: params.code ?? '' }
    const resolved = this.pending.resolve(state, outcome, new Date(this.clock()))

    if (!resolved) {
      this.logger.warn({ state }, 'Authorization callback for unknown or used state rejected')
      throw new InvalidCallbackStateError()
    }

    if (error !== undefined) {
      this.logger.info({ error }, 'Loopback authorization denied')
      return { status: 'denied', error }
    }
    return { status: 'granted' }
  }

  poll(state: AuthState): LoopbackPollResult {
    const row = this.pending.findByState(state)
    if (!row) {
      return { status: 'expired' }
    }

    const settled = row.authorizationCode !== null || row.error !== null
    if (!settled && row.expiresAt.getTime() > this.clock()) {
      return { status: 'pending' }
    }

    const consumed = this.pending.consume(state)
    if (consumed?.authorizationCode) {
      return {
        status: 'ready',
        code: consumed.authorizationCode,
        codeVerifier: consumed.codeVerifier,
        redirectUri: consumed.redirectUri,
      }
    }
    if (consumed?.error) {
      return { status: 'denied', error: consumed.error }
    }
    return { status: 'expired' }
  }

  /**
   * Delete attempts whose window has passed.
   */
  sweepExpired(): number {
    const removed = this.pending.deleteExpired(new Date(this.clock()))
    if (removed > 0) {
      this.logger.debug({ removed }, 'Expired loopback authorizations swept')
    }
    return removed
  }
}

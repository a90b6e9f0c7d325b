/**
 * Login, refresh and logout for the networked shell.
 *
 * The device flow is driven entirely by the server. In the loopback flow the
 * server only collects the authorization code; the shell exchanges it with
 * the provider itself, keeps the refresh token and pushes the access token.
 */

import type { OAuthClient, RefreshTokenStore, TokenGrant } from '@tabula/core'
import type { TabulaClient } from './client'

/** Poll interval for the loopback flow, which has no provider-given one. */
export const LOOPBACK_POLL_INTERVAL_MS = 2000

export interface LoginDeps {
  client: TabulaClient
  oauth: OAuthClient
  refreshTokens: RefreshTokenStore
  print: (line: string) => void
  sleep?: (ms: number) => Promise<void>
}

export class LoginError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LoginError'
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

async function keepRefreshToken(store: RefreshTokenStore, grant: TokenGrant): Promise<void> {
  if (grant.refreshToken) {
    await store.set(grant.refreshToken)
  }
}

export async function deviceLogin(deps: LoginDeps): Promise<TokenGrant> {
  const { client, refreshTokens, print } = deps
  const sleep = deps.sleep ?? defaultSleep

  const login = await client.startDeviceLogin()
  print(`Open ${login.verificationUrl} and enter the code ${login.userCode}`)

  let intervalSeconds = login.pollIntervalSeconds
  for (;;) {
    await sleep(intervalSeconds * 1000)
    const result = await client.pollDeviceLogin(login.deviceCode)

    switch (result.status) {
      case 'pending':
        intervalSeconds = result.pollIntervalSeconds
        break
      case 'granted':
        await keepRefreshToken(refreshTokens, result.grant)
        return result.grant
      case 'denied':
        throw new LoginError('Authorization was denied')
      case 'expired':
        throw new LoginError('The device code expired before it was approved')
    }
  }
}

export async function loopbackLogin(deps: LoginDeps): Promise<TokenGrant> {
  const { client, oauth, refreshTokens, print } = deps
  const sleep = deps.sleep ?? defaultSleep

  const login = await client.startLoopbackLogin()
  print(`Open this URL in a browser to sign in:\n${login.authorizationUrl}`)

  for (;;) {
    await sleep(LOOPBACK_POLL_INTERVAL_MS)
    const result = await client.pollLoopbackLogin(login.state)

    switch (result.status) {
      case 'pending':
        break
      case 'ready': {
        const grant = await oauth.exchangeCode({
          code: result.code,
          codeVerifier: result.codeVerifier,
          redirectUri: result.redirectUri,
        })
        await client.pushToken(grant.accessToken, grant.expiresIn)
        await keepRefreshToken(refreshTokens, grant)
        return grant
      }
      case 'denied':
        throw new LoginError(result.error)
      case 'expired':
        throw new LoginError('The sign-in window expired')
    }
  }
}

/**
 * Trade the stored refresh token for a new access token and push it.
 */
export async function refreshLogin(deps: Omit<LoginDeps, 'print' | 'sleep'>): Promise<TokenGrant> {
  const { client, oauth, refreshTokens } = deps

  const refreshToken = await refreshTokens.get()
  if (!refreshToken) {
    throw new LoginError('No refresh token stored; run `tabula login` first')
  }

  const grant = await oauth.refresh(refreshToken)
  await client.pushToken(grant.accessToken, grant.expiresIn)
  await keepRefreshToken(refreshTokens, grant)
  return grant
}

export async function logout(deps: Pick<LoginDeps, 'client' | 'refreshTokens'>): Promise<void> {
  await deps.client.logout()
  await deps.refreshTokens.clear()
}

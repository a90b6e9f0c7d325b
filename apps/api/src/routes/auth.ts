/**
 * Auth Controller
 *
 * Access token status and the two acquisition flows. Device flow results are
 * returned to the shell in full, refresh token included, so the shell can
 * keep it; the server stores only the access token.
 */

import { Elysia, t } from 'elysia'
import type { CredentialStore, DeviceAuthorizationFlow, LoopbackAuthorizationFlow } from '../../lib/auth'
import { AuthorizationDeniedError, AuthorizationExpiredError } from '../../lib/errors'

/** Upper bound on a pushed token's lifetime: one year. */
const MAX_TOKEN_LIFETIME_SECONDS = 365 * 24 * 60 * 60

export interface AuthControllerDeps {
  credentials: CredentialStore
  deviceFlow: DeviceAuthorizationFlow
  loopbackFlow: LoopbackAuthorizationFlow
}

export function authController(deps: AuthControllerDeps) {
  const { credentials, deviceFlow, loopbackFlow } = deps

  return new Elysia({ prefix: '/api/v1/auth' })
    .get('/status', async () => {
      const credential = await credentials.get()
      if (!credential) {
        return { authenticated: false }
      }
      return { authenticated: true, expiresAt: credential.expiresAt.toISOString() }
    })

    .post(
      '/token',
      async ({ body }) => {
        const credential = await credentials.saveGrant({
          accessToken: body.accessToken,
          expiresIn: body.expiresIn,
        })
        return { authenticated: true, expiresAt: credential.expiresAt.toISOString() }
      },
      {
        body: t.Object({
          accessToken: t.String({ minLength: 1 }),
          expiresIn: t.Number({ minimum: 1, maximum: MAX_TOKEN_LIFETIME_SECONDS }),
        }),
      },
    )

    .delete('/token', () => {
      credentials.purgeAccessToken()
      return { success: true }
    })

    .post('/device', async () => {
      const authorization = await deviceFlow.start()
      return { ...authorization, expiresAt: authorization.expiresAt.toISOString() }
    })

    .post(
      '/device/poll',
      async ({ body }) => {
        const result = await deviceFlow.poll(body.deviceCode)
        if (result.status === 'denied') throw new AuthorizationDeniedError()
        if (result.status === 'expired') throw new AuthorizationExpiredError()
        return result
      },
      { body: t.Object({ deviceCode: t.String({ minLength: 1 }) }) },
    )

    .post('/loopback', () => {
      const authorization = loopbackFlow.start()
      return { ...authorization, expiresAt: authorization.expiresAt.toISOString() }
    })

    .get(
      '/loopback/:state',
      ({ params }) => {
        const result = loopbackFlow.poll(params.state)
        if (result.status === 'denied') throw new AuthorizationDeniedError(result.error)
        if (result.status === 'expired') throw new AuthorizationExpiredError()
        return result
      },
      { params: t.Object({ state: t.String() }) },
    )
}

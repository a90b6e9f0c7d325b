import { OAuthClient, type RefreshTokenStore } from '@tabula/core'
import { beforeEach, describe, expect, test, vi } from 'vitest'
import { type TabulaClient, createClient } from './client'
import { LOOPBACK_POLL_INTERVAL_MS, LoginError, deviceLogin, logout, loopbackLogin, refreshLogin } from './login'

const oauthConfig = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  scope: 'drive.file',
  authorizationEndpoint: 'https://idp.test/authorize',
  tokenEndpoint: 'https://idp.test/token',
  deviceAuthorizationEndpoint: 'https://idp.test/device/code',
}

class MemoryRefreshTokenStore implements RefreshTokenStore {
  value: string | undefined

  async get() {
    return this.value
  }

  async set(refreshToken: string) {
    this.value = refreshToken
  }

  async clear() {
    this.value = undefined
  }
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

/**
 * Routes requests to scripted responses by method and URL.
 */
function createRouter() {
  const routes = new Map<string, Response[]>()
  const calls: Array<{ key: string; body: string }> = []

  const fetchStub = vi.fn<typeof fetch>(async (input, init) => {
    const key = `${init?.method ?? 'GET'} ${String(input)}`
    calls.push({ key, body: typeof init?.body === 'string' ? init.body : '' })
    const next = routes.get(key)?.shift()
    if (!next) throw new Error(`No scripted response for ${key}`)
    return next
  })

  return {
    fetch: fetchStub,
    calls,
    on(method: string, url: string, ...responses: Response[]) {
      routes.set(`${method} ${url}`, [...(routes.get(`${method} ${url}`) ?? []), ...responses])
    },
  }
}

const API = 'http://tabula.test/api/v1'

describe('login', () => {
  let router: ReturnType<typeof createRouter>
  let client: TabulaClient
  let oauth: OAuthClient
  let refreshTokens: MemoryRefreshTokenStore
  let printed: string[]
  let slept: number[]

  beforeEach(() => {
    router = createRouter()
    client = createClient('http://tabula.test/', router.fetch)
    oauth = new OAuthClient(oauthConfig, { fetch: router.fetch })
    refreshTokens = new MemoryRefreshTokenStore()
    printed = []
    slept = []
  })

  function deps() {
    return {
      client,
      oauth,
      refreshTokens,
      print: (line: string) => printed.push(line),
      sleep: async (ms: number) => {
        slept.push(ms)
      },
    }
  }

  describe('device flow', () => {
    beforeEach(() => {
      router.on(
        'POST',
        `${API}/auth/device`,
        json(200, {
          deviceCode: 'device-code-1',
          userCode: 'WXYZ-1234',
          verificationUrl: 'https://idp.test/device',
          pollIntervalSeconds: 5,
          expiresAt: '2030-01-01T00:00:00.000Z',
        }),
      )
    })

    test('polls at the interval the server asks for and keeps the refresh token', async () => {
      router.on(
        'POST',
        `${API}/auth/device/poll`,
        json(200, { status: 'pending', pollIntervalSeconds: 10 }),
        json(200, {
          status: 'granted',
          grant: { accessToken: 'test-access', expiresIn: 3600, refreshToken: 'test-refresh' },
        }),
      )

      const grant = await deviceLogin(deps())

      expect(grant.accessToken).toBe('test-access')
      expect(printed).toEqual(['Open https://idp.test/device and enter the code WXYZ-1234'])
      expect(slept).toEqual([5000, 10_000])
      expect(refreshTokens.value).toBe('test-refresh')
      expect(router.calls[1].body).toBe(JSON.stringify({ deviceCode: 'device-code-1' }))
    })

    test('denied', async () => {
      router.on(
        'POST',
        `${API}/auth/device/poll`,
        json(403, { error: 'Authorization denied: access_denied', code: 'AUTHORIZATION_DENIED' }),
      )

      await expect(deviceLogin(deps())).rejects.toThrow(new LoginError('Authorization was denied'))
      expect(refreshTokens.value).toBeUndefined()
    })

    test('expired', async () => {
      router.on('POST', `${API}/auth/device/poll`, json(410, { error: 'expired', code: 'AUTHORIZATION_EXPIRED' }))

      await expect(deviceLogin(deps())).rejects.toThrow('The device code expired before it was approved')
    })
  })

  describe('loopback flow', () => {
    beforeEach(() => {
      router.on(
        'POST',
        `${API}/auth/loopback`,
        json(200, {
          authorizationUrl: 'https://idp.test/authorize?state=state-1',
          state: 'state-1',
          expiresAt: '2030-01-01T00:00:00.000Z',
        }),
      )
    })

    test('exchanges the code itself and pushes the access token', async () => {
      router.on(
        'GET',
        `${API}/auth/loopback/state-1`,
        json(200, { status: 'pending' }),
        json(200, {
          status: 'ready',
          code: 'auth-code',
          codeVerifier: 'verifier-1',
          redirectUri: 'http://127.0.0.1:8000/oauth/callback',
        }),
      )
      router.on(
        'POST',
        'https://idp.test/token',
        json(200, { access_token: 'test-access', expires_in: 3600, refresh_token: 'test-refresh' }),
      )
      router.on('POST', `${API}/auth/token`, json(200, { authenticated: true, expiresAt: '2030-01-01T00:00:00.000Z' }))

      const grant = await loopbackLogin(deps())

      expect(grant).toEqual({ accessToken: 'test-access', expiresIn: 3600, refreshToken: 'test-refresh' })
      expect(slept).toEqual([LOOPBACK_POLL_INTERVAL_MS, LOOPBACK_POLL_INTERVAL_MS])

      const exchange = new URLSearchParams(router.calls[3].body)
      expect(exchange.get('grant_type')).toBe('authorization_code')
      expect(exchange.get('code')).toBe('auth-code')
      expect(exchange.get('code_verifier')).toBe('verifier-1')

      expect(router.calls[4].body).toBe(JSON.stringify({ accessToken: 'test-access', expiresIn: 3600 }))
      expect(refreshTokens.value).toBe('test-refresh')
    })

    test('denied carries the server message', async () => {
      router.on(
        'GET',
        `${API}/auth/loopback/state-1`,
        json(403, { error: 'Authorization denied: access_denied', code: 'AUTHORIZATION_DENIED' }),
      )

      await expect(loopbackLogin(deps())).rejects.toThrow(
        'Loopback poll failed: Authorization denied: access_denied',
      )
    })
  })

  describe('refresh', () => {
    test('fails without a stored refresh token', async () => {
      await expect(refreshLogin(deps())).rejects.toThrow(LoginError)
      expect(router.fetch).not.toHaveBeenCalled()
    })

    test('pushes the refreshed access token and keeps the old refresh token', async () => {
      refreshTokens.value = 'test-refresh'
      router.on('POST', 'https://idp.test/token', json(200, { access_token: 'test-access-2', expires_in: 1800 }))
      router.on('POST', `${API}/auth/token`, json(200, { authenticated: true }))

      const grant = await refreshLogin(deps())

      expect(grant.accessToken).toBe('test-access-2')
      expect(new URLSearchParams(router.calls[0].body).get('refresh_token')).toBe('test-refresh')
      expect(router.calls[1].body).toBe(JSON.stringify({ accessToken: 'test-access-2', expiresIn: 1800 }))
      expect(refreshTokens.value).toBe('test-refresh')
    })
  })

  test('logout purges the server token and forgets the refresh token', async () => {
    refreshTokens.value = 'test-refresh'
    router.on('DELETE', `${API}/auth/token`, json(200, { success: true }))

    await logout(deps())

    expect(router.calls.map((c) => c.key)).toEqual([`DELETE ${API}/auth/token`])
    expect(refreshTokens.value).toBeUndefined()
  })
})

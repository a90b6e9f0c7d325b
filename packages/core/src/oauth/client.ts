/**
 * OAuth Provider Client
 *
 * Thin fetch-based client for the identity provider's device authorization,
 * authorization-code (PKCE) and refresh endpoints. Shared by the API (device
 * flow, consent URL) and the CLI (code exchange, refresh). Provider payloads
 * are snake_case; they are validated with zod and converted to camelCase.
 */

import { createHash, randomBytes } from 'node:crypto'
import { z } from 'zod'
import { snakeToCamelDeep } from '../case-convert'
import type { OAuthConfig, TokenGrant } from '../types'

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code'
const DEFAULT_TIMEOUT_MS = 20_000
const DEFAULT_POLL_INTERVAL_SECONDS = 5

/**
 * Google endpoints, used unless overridden by configuration.
 */
export const DEFAULT_OAUTH_ENDPOINTS = {
  authorizationEndpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
  tokenEndpoint: 'https://oauth2.googleapis.com/token',
  deviceAuthorizationEndpoint: 'https://oauth2.googleapis.com/device/code',
} as const

export const DEFAULT_OAUTH_SCOPE = 'https://www.googleapis.com/auth/drive.file'

/**
 * OAuth client settings from `TABULA_OAUTH_*` variables. The server and the
 * CLI both read them so code exchange and refresh hit the same provider.
 */
export function oauthConfigFromEnv(env: Record<string, string | undefined>): OAuthConfig {
  return {
    clientId: env.TABULA_OAUTH_CLIENT_ID || undefined,
    clientSecret: env.TABULA_OAUTH_CLIENT_SECRET || undefined,
    scope: env.TABULA_OAUTH_SCOPE || DEFAULT_OAUTH_SCOPE,
    authorizationEndpoint:
      env.TABULA_OAUTH_AUTHORIZATION_ENDPOINT || DEFAULT_OAUTH_ENDPOINTS.authorizationEndpoint,
    tokenEndpoint: env.TABULA_OAUTH_TOKEN_ENDPOINT || DEFAULT_OAUTH_ENDPOINTS.tokenEndpoint,
    deviceAuthorizationEndpoint:
      env.TABULA_OAUTH_DEVICE_ENDPOINT || DEFAULT_OAUTH_ENDPOINTS.deviceAuthorizationEndpoint,
  }
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
})

const errorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
})

const deviceCodeResponseSchema = z
  .object({
    device_code: z.string().min(1),
    user_code: z.string().min(1),
    verification_url: z.string().optional(),
    verification_uri: z.string().optional(),
    expires_in: z.coerce.number().int().positive(),
    interval: z.coerce.number().int().positive().optional(),
  })
  .refine((body) => body.verification_url ?? body.verification_uri, {
    message: 'Device authorization response has no verification URL',
  })

/**
 * Raised when the provider cannot be reached or answers with an error the
 * caller cannot act on.
 */
export class OAuthRequestError extends Error {
  readonly status = 502
  readonly code = 'OAUTH_PROVIDER_ERROR'

  constructor(
    message: string,
    readonly providerError?: string,
  ) {
    super(message)
    this.name = 'OAuthRequestError'
  }
}

/**
 * Device code issued by the provider.
 */
export interface DeviceCodeResponse {
  deviceCode: string
  userCode: string
  verificationUrl: string
  expiresIn: number
  interval: number
}

/**
 * Outcome of one device-code token request. Provider errors such as
 * `authorization_pending` are expected here and are not thrown.
 */
export type DeviceTokenResponse =
  | { kind: 'grant'; grant: TokenGrant }
  | { kind: 'error'; error: string; description?: string }

export interface PkcePair {
  verifier: string
  challenge: string
}

export interface OAuthClientOptions {
  /**
   * Timeout applied to every provider request.
   * @default 20000
   */
  timeoutMs?: number

  /**
   * Override for tests.
   */
  fetch?: typeof fetch
}

/**
 * Generate a URL-safe random state value.
 */
export function createState(bytes = 24): string {
  return randomBytes(bytes).toString('base64url')
}

/**
 * Generate a PKCE verifier and its S256 challenge.
 */
export function createPkcePair(): PkcePair {
  const verifier = randomBytes(32).toString('base64url')
  const challenge = createHash('sha256').update(verifier).digest('base64url')
  return { verifier, challenge }
}

export class OAuthClient {
  private readonly config: OAuthConfig
  private readonly timeoutMs: number
  private readonly fetchFn: typeof fetch

  constructor(config: OAuthConfig, options: OAuthClientOptions = {}) {
    this.config = config
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchFn = options.fetch ?? fetch
  }

  /**
   * Whether a client ID is configured.
   */
  get configured(): boolean {
    return Boolean(this.config.clientId)
  }

  /**
   * Build the consent URL for the authorization-code flow.
   */
  buildAuthorizationUrl(params: { state: string; codeChallenge: string; redirectUri: string }): string {
    const url = new URL(this.config.authorizationEndpoint)
    url.search = new URLSearchParams({
      client_id: this.requireClientId(),
      redirect_uri: params.redirectUri,
      response_type: 'code',
      scope: this.config.scope,
      state: params.state,
      code_challenge: params.codeChallenge,
      code_challenge_method: 'S256',
      access_type: 'offline',
      prompt: 'consent',
    }).toString()
    return url.toString()
  }

  /**
   * Ask the provider for a device code and user code.
   */
  async requestDeviceCode(): Promise<DeviceCodeResponse> {
    const res = await this.post(this.config.deviceAuthorizationEndpoint, {
      client_id: this.requireClientId(),
      scope: this.config.scope,
    })
    const body = await this.readJson(res)

    if (!res.ok) {
      throw this.toRequestError('Device authorization request failed', res.status, body)
    }

    const parsed = deviceCodeResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new OAuthRequestError(
        `Malformed device authorization response: ${parsed.error.issues[0]?.message}`,
      )
    }

    const data = parsed.data
    return {
      deviceCode: data.device_code,
      userCode: data.user_code,
      verificationUrl: data.verification_url ?? data.verification_uri ?? '',
      expiresIn: data.expires_in,
      interval: data.interval ?? DEFAULT_POLL_INTERVAL_SECONDS,
    }
  }

  /**
   * Poll the token endpoint once for a device code.
   */
  async pollDeviceToken(deviceCode: string): Promise<DeviceTokenResponse> {
    const res = await this.post(this.config.tokenEndpoint, {
      ...this.clientCredentials(),
      device_code: deviceCode,
      grant_type: DEVICE_CODE_GRANT,
    })
    const body = await this.readJson(res)

    if (res.ok) {
      return { kind: 'grant', grant: this.parseGrant(body) }
    }

    const error = errorResponseSchema.safeParse(body)
    if (error.success) {
      return {
        kind: 'error',
        error: error.data.error,
        description: error.data.error_description,
      }
    }
    throw this.toRequestError('Device token request failed', res.status, body)
  }

  /**
   * Exchange an authorization code (loopback flow) for tokens.
   */
  async exchangeCode(params: {
    code: string
    codeVerifier: string
    redirectUri: string
  }): Promise<TokenGrant> {
    const res = await this.post(this.config.tokenEndpoint, {
      ...this.clientCredentials(),
      code: params.code,
      code_verifier: params.codeVerifier,
      redirect_uri: params.redirectUri,
      grant_type: 'authorization_code',
    })
    const body = await this.readJson(res)
    if (!res.ok) {
      throw this.toRequestError('Token exchange failed', res.status, body)
    }
    return this.parseGrant(body)
  }

  /**
   * Exchange a refresh token for a new access token.
   * Providers usually omit the refresh token from the response.
   */
  async refresh(refreshToken: string): Promise<TokenGrant> {
    const res = await this.post(this.config.tokenEndpoint, {
      ...this.clientCredentials(),
      refresh_token: refreshToken,
      grant_type: 'refresh_token',
    })
    const body = await this.readJson(res)
    if (!res.ok) {
      throw this.toRequestError('Token refresh failed', res.status, body)
    }
    return this.parseGrant(body)
  }

  private parseGrant(body: unknown): TokenGrant {
    const parsed = tokenResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new OAuthRequestError(
        `Malformed token response: ${parsed.error.issues[0]?.message}`,
      )
    }
    return snakeToCamelDeep(parsed.data)
  }

  private async post(endpoint: string, form: Record<string, string>): Promise<Response> {
    try {
      return await this.fetchFn(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams(form).toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new OAuthRequestError(`Identity provider unreachable: ${reason}`)
    }
  }

  private async readJson(res: Response): Promise<unknown> {
    const text = await res.text()
    if (!text) return {}
    try {
      return JSON.parse(text)
    } catch {
      return { error: 'invalid_response', error_description: text.slice(0, 200) }
    }
  }

  private toRequestError(prefix: string, status: number, body: unknown): OAuthRequestError {
    const error = errorResponseSchema.safeParse(body)
    if (error.success) {
      const detail = error.data.error_description ?? error.data.error
      return new OAuthRequestError(`${prefix} (${status}): ${detail}`, error.data.error)
    }
    return new OAuthRequestError(`${prefix} (${status})`)
  }

  private clientCredentials(): Record<string, string> {
    const credentials: Record<string, string> = { client_id: this.requireClientId() }
    if (this.config.clientSecret) {
      credentials.client_secret = this.config.clientSecret
    }
    return credentials
  }

  private requireClientId(): string {
    if (!this.config.clientId) {
      throw new OAuthRequestError('OAuth client ID is not configured')
    }
    return this.config.clientId
  }
}

import type { LoopbackPollResult, TickOutcome, TokenGrant } from '@tabula/core'

export interface DatabaseSummary {
  name: string
  enrolled: boolean
}

export interface SyncStatus {
  database: string
  enrolled: boolean
  lastSyncAt?: string
  lastOutcome?: TickOutcome
  lastError?: string
}

export interface RemoteCopy {
  name: string
  size?: number
  modifiedAt?: string
}

export interface AuthStatus {
  authenticated: boolean
  expiresAt?: string
}

export interface DeviceLogin {
  deviceCode: string
  userCode: string
  verificationUrl: string
  pollIntervalSeconds: number
  expiresAt: string
}

export type DeviceLoginPoll =
  | { status: 'pending'; pollIntervalSeconds: number }
  | { status: 'granted'; grant: TokenGrant }
  | { status: 'denied' }
  | { status: 'expired' }

export interface LoopbackLogin {
  authorizationUrl: string
  state: string
  expiresAt: string
}

/**
 * Error answered by the API, with its HTTP status and machine-readable code.
 */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string,
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export interface TabulaClient {
  listDatabases(): Promise<DatabaseSummary[]>
  renameDatabase(name: string, newName: string): Promise<void>
  deleteDatabase(name: string): Promise<void>
  enableSync(name: string): Promise<void>
  disableSync(name: string): Promise<void>
  syncStatus(name: string): Promise<SyncStatus>
  listRemote(): Promise<RemoteCopy[]>
  restoreDatabase(name: string, source?: string): Promise<{ name: string; tables: number }>
  authStatus(): Promise<AuthStatus>
  pushToken(accessToken: string, expiresIn: number): Promise<AuthStatus>
  logout(): Promise<void>
  startDeviceLogin(): Promise<DeviceLogin>
  pollDeviceLogin(deviceCode: string): Promise<DeviceLoginPoll>
  startLoopbackLogin(): Promise<LoopbackLogin>
  pollLoopbackLogin(state: string): Promise<LoopbackPollResult>
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

async function toApiError(action: string, res: Response): Promise<ApiError> {
  const text = await res.text()
  const body = parseJson(text)
  if (body && typeof body === 'object' && 'error' in body && typeof body.error === 'string') {
    const code = 'code' in body && typeof body.code === 'string' ? body.code : undefined
    return new ApiError(`${action} failed: ${body.error}`, res.status, code)
  }
  return new ApiError(`${action} failed (${res.status}): ${text}`, res.status)
}

export function createClient(baseUrl: string, fetchFn: typeof fetch = fetch): TabulaClient {
  const api = `${baseUrl.replace(/\/$/, '')}/api/v1`

  async function call(action: string, path: string, init?: { method: string; body?: unknown }) {
    const res = await fetchFn(`${api}${path}`, {
      method: init?.method ?? 'GET',
      headers: init?.body !== undefined ? { 'Content-Type': 'application/json' } : undefined,
      body: init?.body !== undefined ? JSON.stringify(init.body) : undefined,
    })
    if (!res.ok) throw await toApiError(action, res)
    return res
  }

  const db = (name: string) => `/databases/${encodeURIComponent(name)}`

  return {
    async listDatabases() {
      const res = await call('List', '/databases')
      return res.json() as Promise<DatabaseSummary[]>
    },

    async renameDatabase(name, newName) {
      await call('Rename', `${db(name)}/rename`, { method: 'POST', body: { newName } })
    },

    async deleteDatabase(name) {
      await call('Delete', db(name), { method: 'DELETE' })
    },

    async enableSync(name) {
      await call('Enable sync', `${db(name)}/sync`, { method: 'POST' })
    },

    async disableSync(name) {
      await call('Disable sync', `${db(name)}/sync`, { method: 'DELETE' })
    },

    async syncStatus(name) {
      const res = await call('Status', `${db(name)}/sync`)
      return res.json() as Promise<SyncStatus>
    },

    async listRemote() {
      const res = await call('Remote list', '/remote')
      return res.json() as Promise<RemoteCopy[]>
    },

    async restoreDatabase(name, source) {
      const res = await call('Restore', `${db(name)}/restore`, { method: 'POST', body: { source } })
      return res.json() as Promise<{ name: string; tables: number }>
    },

    async authStatus() {
      const res = await call('Auth status', '/auth/status')
      return res.json() as Promise<AuthStatus>
    },

    async pushToken(accessToken, expiresIn) {
      const res = await call('Token upload', '/auth/token', {
        method: 'POST',
        body: { accessToken, expiresIn },
      })
      return res.json() as Promise<AuthStatus>
    },

    async logout() {
      await call('Logout', '/auth/token', { method: 'DELETE' })
    },

    async startDeviceLogin() {
      const res = await call('Device login', '/auth/device', { method: 'POST' })
      return res.json() as Promise<DeviceLogin>
    },

    async pollDeviceLogin(deviceCode) {
      try {
        const res = await call('Device poll', '/auth/device/poll', {
          method: 'POST',
          body: { deviceCode },
        })
        return (await res.json()) as DeviceLoginPoll
      } catch (err) {
        if (err instanceof ApiError && err.status === 403) return { status: 'denied' }
        if (err instanceof ApiError && err.status === 410) return { status: 'expired' }
        throw err
      }
    },

    async startLoopbackLogin() {
      const res = await call('Loopback login', '/auth/loopback', { method: 'POST' })
      return res.json() as Promise<LoopbackLogin>
    },

    async pollLoopbackLogin(state) {
      try {
        const res = await call('Loopback poll', `/auth/loopback/${encodeURIComponent(state)}`)
        return (await res.json()) as LoopbackPollResult
      } catch (err) {
        if (err instanceof ApiError && err.status === 403) {
          return { status: 'denied', error: err.message }
        }
        if (err instanceof ApiError && err.status === 410) return { status: 'expired' }
        throw err
      }
    },
  }
}

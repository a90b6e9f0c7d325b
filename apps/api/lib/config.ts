import { resolve } from 'node:path'
import { type TabulaConfig, oauthConfigFromEnv, parseDuration } from '@tabula/core'

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key]
  if (value === undefined) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue
}

function getEnvOptional(key: string): string | undefined {
  const value = process.env[key]
  return value ? value : undefined
}

function getEnvPath(key: string, defaultValue: string): string {
  const value = process.env[key] ?? defaultValue
  // Resolve relative paths from current working directory
  return value.startsWith('/') ? value : resolve(process.cwd(), value)
}

function getEnvDuration(key: string, defaultValue: string): number {
  return parseDuration(process.env[key] ?? defaultValue)
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key]
  if (value === undefined) return defaultValue
  return value === '1' || value.toLowerCase() === 'true'
}

const apiPort = getEnvNumber('TABULA_API_PORT', 8000)
const apiHost = getEnvString('TABULA_API_HOST', '127.0.0.1')

export const config: TabulaConfig = {
  apiHost,
  apiPort,
  publicUrl: getEnvString('TABULA_PUBLIC_URL', `http://${apiHost}:${apiPort}`).replace(/\/+$/, ''),
  dbPath: getEnvPath('TABULA_DB_PATH', 'data/tabula.db'),
  snapshotDir: getEnvPath('TABULA_SNAPSHOT_DIR', 'databases'),
  logLevel: getEnvString('TABULA_LOG_LEVEL', 'info'),

  sync: {
    intervalMs: getEnvDuration('TABULA_SYNC_INTERVAL', '5s'),
    leaseTtlMs: getEnvDuration('TABULA_SYNC_LEASE_TTL', '30s'),
    leaseWaitMs: getEnvDuration('TABULA_SYNC_LEASE_WAIT', '10s'),
    remoteTimeoutMs: getEnvDuration('TABULA_REMOTE_TIMEOUT', '20s'),
    skipUnchanged: getEnvBoolean('TABULA_SYNC_SKIP_UNCHANGED', true),
  },

  oauth: oauthConfigFromEnv(process.env),

  loopbackTimeoutMs: getEnvDuration('TABULA_LOOPBACK_TIMEOUT', '5m'),
  driveFolderId: getEnvOptional('TABULA_DRIVE_FOLDER_ID'),
}

/**
 * Shared test fixtures using Faker.js
 *
 * Provides factory functions for creating test data across all tests.
 */

import type { SnapshotDocument, TabulaConfig, TokenGrant } from '@tabula/core'
import { faker } from '@faker-js/faker'
import pino from 'pino'

export const silentLogger = pino({ level: 'silent' })

// =============================================================================
// Database Fixtures
// =============================================================================

export function createDatabaseName(): string {
  const word = faker.word.noun().toLowerCase().replace(/[^a-z0-9]+/g, '-')
  return `${word}-${faker.string.alphanumeric(6).toLowerCase()}`
}

export function createSnapshotDocument(name: string, rowCount = 3): SnapshotDocument {
  return {
    name,
    tables: [
      {
        name: 'items',
        columns: [
          { name: 'sku', type: 'string' },
          { name: 'qty', type: 'integer' },
        ],
        rows: Array.from({ length: rowCount }, () => ({
          sku: faker.string.alphanumeric(8).toUpperCase(),
          qty: faker.number.int({ min: 0, max: 500 }),
        })),
      },
    ],
  }
}

// =============================================================================
// Credential Fixtures
// =============================================================================

export function createTokenGrant(overrides?: Partial<TokenGrant>): TokenGrant {
  return {
    accessToken: `test-access-${faker.string.alphanumeric(12)}`,
    expiresIn: 3600,
    refreshToken: `test-refresh-${faker.string.alphanumeric(12)}`,
    ...overrides,
  }
}

// =============================================================================
// Config Fixtures
// =============================================================================

export function createTestConfig(snapshotDir: string, overrides?: Partial<TabulaConfig>): TabulaConfig {
  return {
    apiHost: '127.0.0.1',
    apiPort: 8787,
    publicUrl: 'http://127.0.0.1:8787',
    dbPath: ':memory:',
    snapshotDir,
    logLevel: 'silent',
    sync: {
      // Loops never fire on their own in tests; ticks are driven explicitly
      intervalMs: 60 * 60 * 1000,
      leaseTtlMs: 30_000,
      leaseWaitMs: 200,
      remoteTimeoutMs: 5_000,
      skipUnchanged: true,
    },
    oauth: {
      clientId: 'test-client',
      clientSecret: 'test-secret',
      scope: 'https://www.googleapis.com/auth/drive.file',
      authorizationEndpoint: 'https://idp.test/authorize',
      tokenEndpoint: 'https://idp.test/token',
      deviceAuthorizationEndpoint: 'https://idp.test/device/code',
    },
    loopbackTimeoutMs: 5 * 60 * 1000,
    ...overrides,
  }
}

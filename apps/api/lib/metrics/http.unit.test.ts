import { describe, expect, test } from 'vitest'
import { normalizePath } from './http'

describe('normalizePath', () => {
  test('replaces database names', () => {
    expect(normalizePath('/api/v1/databases/alpha')).toBe('/api/v1/databases/:name')
    expect(normalizePath('/api/v1/databases/alpha/sync')).toBe('/api/v1/databases/:name/sync')
  })

  test('replaces loopback states', () => {
    expect(normalizePath('/api/v1/auth/loopback/abc123')).toBe('/api/v1/auth/loopback/:state')
  })

  test('leaves other paths alone', () => {
    expect(normalizePath('/api/v1/databases')).toBe('/api/v1/databases')
    expect(normalizePath('/oauth/callback')).toBe('/oauth/callback')
  })
})

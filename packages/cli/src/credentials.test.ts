import { chmod, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { FileRefreshTokenStore, defaultCredentialsPath } from './credentials'

describe('FileRefreshTokenStore', () => {
  let home: string
  let store: FileRefreshTokenStore

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), 'tabula-cli-'))
    store = new FileRefreshTokenStore(join(home, 'nested', 'credentials.json'))
  })

  afterEach(async () => {
    await rm(home, { recursive: true, force: true })
  })

  test('returns undefined before anything is stored', async () => {
    expect(await store.get()).toBeUndefined()
  })

  test('stores the token readable by the owner only', async () => {
    await store.set('test-refresh-token')

    expect(await store.get()).toBe('test-refresh-token')
    expect((await stat(store.path)).mode & 0o777).toBe(0o600)

    const file = JSON.parse(await readFile(store.path, 'utf-8'))
    expect(file.refreshToken).toBe('test-refresh-token')
  })

  test('tightens the mode of an existing file', async () => {
    await store.set('test-refresh-1')
    await chmod(store.path, 0o644)
    await store.set('test-refresh-2')

    expect((await stat(store.path)).mode & 0o777).toBe(0o600)
    expect(await store.get()).toBe('test-refresh-2')
  })

  test('clear removes the file and tolerates a missing one', async () => {
    await store.set('test-refresh-token')
    await store.clear()
    await store.clear()

    expect(await store.get()).toBeUndefined()
  })

  test('a malformed file is reported', async () => {
    await store.set('test-refresh-token')
    await writeFile(store.path, JSON.stringify({ refreshToken: '' }))

    await expect(store.get()).rejects.toThrow('Malformed credentials file')
  })

  test('a file that is not JSON is reported the same way', async () => {
    await store.set('test-refresh-token')
    await writeFile(store.path, '{"refreshToken": "test-refr')

    await expect(store.get()).rejects.toThrow(
      `Malformed credentials file ${store.path}; run \`tabula login\` again`,
    )
  })

  test('default path honours TABULA_HOME', () => {
    expect(defaultCredentialsPath({ TABULA_HOME: '/srv/tabula' })).toBe('/srv/tabula/credentials.json')
  })
})

/**
 * SnapshotStore Unit Tests
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { DatabaseNotFoundError, InvalidDatabaseNameError, NameConflictError } from '../errors'
import { createDatabaseName, createSnapshotDocument } from '../../test/fixtures'
import { SnapshotStore } from './snapshot-store'

describe('SnapshotStore', () => {
  let dir: string
  let store: SnapshotStore

  const document = {
    name: 'alpha',
    tables: [
      {
        name: 'items',
        columns: [{ name: 'sku', type: 'string' }],
        rows: [{ sku: 'A-1' }],
      },
    ],
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tabula-snapshots-'))
    store = new SnapshotStore(dir)
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  test('write then read round-trips the document', async () => {
    await store.write('alpha', document)

    expect(await store.exists('alpha')).toBe(true)
    expect(await store.read('alpha')).toEqual(document)
  })

  test('generated names and documents are stored as-is', async () => {
    const name = createDatabaseName()
    const generated = createSnapshotDocument(name, 5)
    await store.write(name, generated)

    expect(await readdir(dir)).toEqual([`${name}.json`])
    expect(await store.read(name)).toEqual(generated)
  })

  test('write leaves no temp files behind', async () => {
    await store.write('alpha', document)
    await store.write('alpha', { ...document, tables: [] })

    expect(await readdir(dir)).toEqual(['alpha.json'])
  })

  test('write forces the embedded name to match the file', async () => {
    await store.write('beta', document)
    expect((await store.read('beta'))?.name).toBe('beta')
  })

  test('serializeSnapshot returns file bytes or undefined', async () => {
    await store.write('alpha', document)

    const bytes = await store.serializeSnapshot('alpha')
    expect(bytes?.toString('utf-8')).toBe(await readFile(join(dir, 'alpha.json'), 'utf-8'))
    expect(await store.serializeSnapshot('missing')).toBeUndefined()
  })

  test('delete reports whether a snapshot existed', async () => {
    await store.write('alpha', document)

    expect(await store.delete('alpha')).toBe(true)
    expect(await store.delete('alpha')).toBe(false)
    expect(await store.exists('alpha')).toBe(false)
  })

  test('rename moves the snapshot', async () => {
    await store.write('alpha', document)
    await store.rename('alpha', 'gamma')

    expect(await store.exists('alpha')).toBe(false)
    expect(await store.read('gamma')).toEqual({ ...document, name: 'gamma' })
  })

  test('rename refuses to overwrite and requires a source', async () => {
    await store.write('alpha', document)
    await store.write('beta', document)

    await expect(store.rename('alpha', 'beta')).rejects.toBeInstanceOf(NameConflictError)
    await expect(store.rename('missing', 'delta')).rejects.toBeInstanceOf(DatabaseNotFoundError)
  })

  test('listDatabaseNames ignores hidden and foreign files', async () => {
    await store.write('beta', document)
    await store.write('alpha', document)
    await writeFile(join(dir, 'notes.txt'), 'x')
    await writeFile(join(dir, '.alpha.json.tmp'), 'x')

    expect(await store.listDatabaseNames()).toEqual(['alpha', 'beta'])
  })

  test('listDatabaseNames on a missing directory is empty', async () => {
    const missing = new SnapshotStore(join(dir, 'nope'))
    expect(await missing.listDatabaseNames()).toEqual([])
  })

  test('rejects names that are not a single path segment', () => {
    expect(() => store.pathFor('../etc/passwd')).toThrow(InvalidDatabaseNameError)
    expect(() => store.pathFor('.hidden')).toThrow(InvalidDatabaseNameError)
    expect(() => store.pathFor('')).toThrow(InvalidDatabaseNameError)
  })
})

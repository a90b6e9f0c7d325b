/**
 * Sync E2E Tests
 *
 * Enrollment, the upload loop and rename/delete migration through the API.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { App } from '../src/app'
import { createSnapshotDocument, createTestConfig, silentLogger } from './fixtures'
import { type TestHarness, createTestHarness } from './harness'

describe('Sync', () => {
  let harness: TestHarness

  beforeEach(async () => {
    harness = createTestHarness()
    await harness.setup()
  })

  afterEach(async () => {
    await harness.teardown()
  })

  test('enrolled database is uploaded and the status reflects it', async () => {
    await harness.putDatabase('alpha', createSnapshotDocument('alpha'))
    await harness.signIn()

    const enroll = await harness.enroll('alpha')
    expect(enroll.status).toBe(201)
    expect(enroll.data.database).toBe('alpha')

    expect(await harness.tick(enroll.data.token)).toBe('synced')

    const local = await readFile(join(harness.snapshotDir, 'alpha.json'), 'utf-8')
    expect(harness.remote.text('alpha')).toBe(local)
    expect(harness.remote.uploads[0].accessToken).toBe('test-access-token')

    const status = await harness.syncStatus('alpha')
    expect(status.status).toBe(200)
    expect(status.data.enrolled).toBe(true)
    expect(status.data.lastOutcome).toBe('synced')
    expect(typeof status.data.lastSyncAt).toBe('string')
  })

  test('enrolling requires a credential', async () => {
    await harness.putDatabase('alpha', createSnapshotDocument('alpha'))

    const res = await harness.enroll('alpha')
    expect(res.status).toBe(401)
    expect(res.data).toEqual({
      error: 'No valid access token; log in first',
      code: 'AUTHENTICATION_REQUIRED',
    })
  })

  test('enrolling a database without a snapshot is a 404', async () => {
    await harness.signIn()

    const res = await harness.enroll('ghost')
    expect(res.status).toBe(404)
    expect(res.data).toEqual({ error: 'Database ghost not found', code: 'DATABASE_NOT_FOUND' })
    expect(harness.app.leases.getToken('ghost')).toBeUndefined()
    expect(harness.app.scheduler.size).toBe(0)
  })

  test('enrolling twice conflicts', async () => {
    await harness.putDatabase('alpha', createSnapshotDocument('alpha'))
    await harness.signIn()
    await harness.enroll('alpha')

    const res = await harness.enroll('alpha')
    expect(res.status).toBe(409)
    expect(res.data).toMatchObject({ code: 'ALREADY_ENROLLED' })
  })

  test('a revoked credential skips uploads but keeps the enrollment', async () => {
    await harness.putDatabase('beta', createSnapshotDocument('beta'))
    await harness.signIn()
    const { token } = (await harness.enroll('beta')).data

    await harness.delete('/api/v1/auth/token')

    expect(await harness.tick(token)).toBe('unauthenticated')
    expect(harness.remote.uploads).toHaveLength(0)
    expect(harness.app.leases.getToken('beta')).toBe(token)

    const status = await harness.syncStatus('beta')
    expect(status.data.enrolled).toBe(true)
    expect(status.data.lastOutcome).toBe('unauthenticated')
  })

  test('unenroll leaves no sync state behind after the next tick', async () => {
    await harness.putDatabase('alpha', createSnapshotDocument('alpha'))
    await harness.signIn()
    const { token } = (await harness.enroll('alpha')).data

    const res = await harness.unenroll('alpha')
    expect(res.status).toBe(200)
    expect(res.data).toEqual({ success: true })

    expect(await harness.tick(token)).toBe('stopped')
    expect(harness.app.coordination.scan('sync:')).toEqual([])
    expect(harness.remote.uploads).toHaveLength(0)

    const status = await harness.syncStatus('alpha')
    expect(status.data).toEqual({ database: 'alpha', enrolled: false })
  })

  test('unenrolling a database that is not enrolled is a 404', async () => {
    const res = await harness.unenroll('alpha')
    expect(res.status).toBe(404)
    expect(res.data).toMatchObject({ code: 'NOT_ENROLLED' })
  })

  test('rename keeps the token and the next upload uses the new name', async () => {
    await harness.putDatabase('alpha', createSnapshotDocument('alpha'))
    await harness.signIn()
    const { token } = (await harness.enroll('alpha')).data
    await harness.tick(token)

    const res = await harness.rename('alpha', 'gamma')
    expect(res.status).toBe(200)
    expect(res.data).toEqual({ name: 'gamma', enrolled: true })

    expect(harness.app.leases.getToken('gamma')).toBe(token)
    expect((await harness.syncStatus('alpha')).data.enrolled).toBe(false)

    expect(await harness.tick(token)).toBe('synced')
    expect(harness.remote.uploads.map((u) => u.name)).toEqual(['alpha', 'gamma'])
    // The remote copy under the old name is left alone
    expect(harness.remote.objects.has('alpha')).toBe(true)
  })

  test('rename waits for the lease and gives up with 423', async () => {
    await harness.putDatabase('alpha', createSnapshotDocument('alpha'))
    await harness.signIn()
    await harness.enroll('alpha')
    harness.app.leases.acquire('alpha', 'uploading-process')

    const res = await harness.rename('alpha', 'gamma')
    expect(res.status).toBe(423)
    expect(res.data).toMatchObject({ code: 'LEASE_UNAVAILABLE' })
    expect(harness.app.coordinator.isEnrolled('alpha')).toBe(true)
  })

  test('delete removes local state and keeps the remote copy', async () => {
    await harness.putDatabase('alpha', createSnapshotDocument('alpha'))
    await harness.signIn()
    const { token } = (await harness.enroll('alpha')).data
    await harness.tick(token)

    const res = await harness.delete('/api/v1/databases/alpha')
    expect(res.status).toBe(200)

    expect((await harness.get('/api/v1/databases/alpha')).status).toBe(404)
    expect(harness.app.coordination.scan('sync:')).toEqual([])
    expect(harness.app.scheduler.isRunning(token)).toBe(false)
    expect(harness.remote.objects.has('alpha')).toBe(true)
  })

  test('shutdown purges only the access token', async () => {
    await harness.putDatabase('alpha', createSnapshotDocument('alpha'))
    await harness.signIn()
    await harness.enroll('alpha')

    harness.app.shutdown()

    expect(harness.app.coordination.scan('auth:')).toEqual([])
    expect(harness.app.coordination.scan('sync:').map((e) => e.key)).toEqual([
      'sync:last_sync:alpha',
      'sync:token:alpha',
    ])
    expect(harness.app.scheduler.size).toBe(0)
  })

  test('a restarted process resumes enrolled loops', async () => {
    await harness.putDatabase('alpha', createSnapshotDocument('alpha'))
    await harness.signIn()
    const { token } = (await harness.enroll('alpha')).data
    harness.app.shutdown()

    const restarted = new App({
      db: harness.db,
      config: createTestConfig(harness.snapshotDir),
      logger: silentLogger,
      remote: harness.remote,
    })

    expect(restarted.start()).toEqual({ resumed: 1 })
    expect(restarted.scheduler.getJob(token)?.name).toBe('alpha')
    restarted.shutdown()
  })
})

describe('Sync across processes', () => {
  let first: TestHarness
  let second: TestHarness

  beforeEach(async () => {
    first = createTestHarness()
    await first.setup()
    second = createTestHarness({ db: first.db, snapshotDir: first.snapshotDir })
    await second.setup()
  })

  afterEach(async () => {
    await second.teardown()
    await first.teardown()
  })

  test('only one process uploads a database at a time', async () => {
    await first.putDatabase('alpha', createSnapshotDocument('alpha'))
    await first.signIn()
    const { token } = (await first.enroll('alpha')).data
    second.app.coordinator.resume()

    const open = first.remote.hold()
    const upload = first.tick(token)
    await vi.waitFor(() => expect(first.app.leases.leaseHolder('alpha')).toBeDefined())

    expect(await second.tick(token)).toBe('locked')

    open()
    expect(await upload).toBe('synced')
    expect(await second.tick(token)).toBe('unchanged')
    expect(second.remote.uploads).toHaveLength(0)
  })

  test('a credential stored by one process is seen by the other', async () => {
    await first.signIn('test-shared-token')

    const res = await second.get<{ authenticated: boolean }>('/api/v1/auth/status')
    expect(res.data.authenticated).toBe(true)
  })

  test('a rename in one process rebinds the loop in the other', async () => {
    await first.putDatabase('alpha', createSnapshotDocument('alpha'))
    await first.signIn()
    const { token } = (await first.enroll('alpha')).data
    second.app.coordinator.resume()

    await first.rename('alpha', 'gamma')

    expect(await second.tick(token)).toBe('synced')
    expect(second.app.scheduler.getJob(token)?.name).toBe('gamma')
    expect(second.remote.uploads.map((u) => u.name)).toEqual(['gamma'])
  })
})

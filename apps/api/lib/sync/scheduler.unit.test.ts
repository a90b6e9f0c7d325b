/**
 * SyncScheduler Unit Tests
 */

import { createHash } from 'node:crypto'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { CoordinationRepository } from '@tabula/db'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { createTestCoordination } from '../../test/db'
import { createSnapshotDocument, silentLogger } from '../../test/fixtures'
import { MemoryObjectStore } from '../../test/memory-object-store'
import { CredentialStore } from '../auth/credential-store'
import { SnapshotStore } from '../storage'
import { LeaseManager } from './lease'
import { SyncScheduler } from './scheduler'

const config = { intervalMs: 5000, remoteTimeoutMs: 1000, skipUnchanged: true }

describe('SyncScheduler', () => {
  let dir: string
  let coordination: CoordinationRepository
  let leases: LeaseManager
  let credentials: CredentialStore
  let snapshots: SnapshotStore
  let remote: MemoryObjectStore
  let scheduler: SyncScheduler

  function createScheduler(store = remote) {
    return new SyncScheduler({
      leases,
      credentials,
      snapshots,
      remote: store,
      logger: silentLogger,
      config,
    })
  }

  function enroll(name: string, token: string) {
    leases.createToken(name, token)
    scheduler.start(token, name)
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tabula-scheduler-'))
    coordination = createTestCoordination().coordination
    leases = new LeaseManager(coordination, 30_000)
    credentials = new CredentialStore(coordination, silentLogger)
    snapshots = new SnapshotStore(dir)
    remote = new MemoryObjectStore()
    scheduler = createScheduler()

    await credentials.save('test-access-token', new Date(Date.now() + 3_600_000))
  })

  afterEach(async () => {
    scheduler.shutdown()
    vi.useRealTimers()
    await rm(dir, { recursive: true, force: true })
  })

  test('uploads the snapshot and records the marker', async () => {
    await snapshots.write('alpha', createSnapshotDocument('alpha'))
    enroll('alpha', 'token-a')

    expect(await scheduler.tick('token-a')).toBe('synced')

    const bytes = await snapshots.serializeSnapshot('alpha')
    expect(remote.uploads).toHaveLength(1)
    expect(remote.uploads[0].name).toBe('alpha')
    expect(remote.uploads[0].accessToken).toBe('test-access-token')
    expect(remote.text('alpha')).toBe(bytes?.toString('utf-8'))

    const marker = leases.getMarker('alpha')
    expect(marker?.uploads).toBe(1)
    expect(marker?.digest).toBe(createHash('sha256').update(bytes ?? '').digest('hex'))
    expect(leases.leaseHolder('alpha')).toBeUndefined()
  })

  test('skips an unchanged snapshot', async () => {
    await snapshots.write('alpha', createSnapshotDocument('alpha'))
    enroll('alpha', 'token-a')

    await scheduler.tick('token-a')
    expect(await scheduler.tick('token-a')).toBe('unchanged')
    expect(remote.uploads).toHaveLength(1)
  })

  test('skips when there is no local snapshot', async () => {
    enroll('alpha', 'token-a')

    expect(await scheduler.tick('token-a')).toBe('missing')
    expect(remote.uploads).toHaveLength(0)
  })

  test('skips without a credential and keeps the loop', async () => {
    await snapshots.write('alpha', createSnapshotDocument('alpha'))
    enroll('alpha', 'token-a')
    credentials.purgeAccessToken()

    expect(await scheduler.tick('token-a')).toBe('unauthenticated')
    expect(remote.uploads).toHaveLength(0)
    expect(scheduler.isRunning('token-a')).toBe(true)
    expect(leases.getToken('alpha')).toBe('token-a')
  })

  test('stops once the token is revoked', async () => {
    await snapshots.write('alpha', createSnapshotDocument('alpha'))
    enroll('alpha', 'token-a')
    leases.revoke('alpha')

    expect(await scheduler.tick('token-a')).toBe('stopped')
    expect(scheduler.isRunning('token-a')).toBe(false)
    expect(remote.uploads).toHaveLength(0)
    expect(coordination.scan('sync:')).toEqual([])
  })

  test('skips while another holder has the lease', async () => {
    await snapshots.write('alpha', createSnapshotDocument('alpha'))
    enroll('alpha', 'token-a')
    leases.acquire('alpha', 'other-process')

    expect(await scheduler.tick('token-a')).toBe('locked')
    expect(remote.uploads).toHaveLength(0)
    expect(leases.leaseHolder('alpha')).toBe('other-process')
  })

  test('follows a rename made elsewhere', async () => {
    await snapshots.write('alpha', createSnapshotDocument('alpha'))
    enroll('alpha', 'token-a')

    leases.migrate('alpha', 'gamma', 'token-a')
    await snapshots.rename('alpha', 'gamma')

    expect(await scheduler.tick('token-a')).toBe('synced')
    expect(scheduler.getJob('token-a')?.name).toBe('gamma')
    expect(remote.uploads[0].name).toBe('gamma')
  })

  test('swallows upload failures and releases the lease', async () => {
    await snapshots.write('alpha', createSnapshotDocument('alpha'))
    enroll('alpha', 'token-a')
    remote.failNext(new Error('connection reset'))

    expect(await scheduler.tick('token-a')).toBe('failed')
    expect(scheduler.getJob('token-a')?.lastError).toBe('connection reset')
    expect(leases.leaseHolder('alpha')).toBeUndefined()
    expect(leases.getMarker('alpha')?.uploads).toBe(0)

    expect(await scheduler.tick('token-a')).toBe('synced')
    expect(scheduler.getJob('token-a')?.lastError).toBeUndefined()
  })

  test('does not write the marker if unenrolled during the upload', async () => {
    await snapshots.write('alpha', createSnapshotDocument('alpha'))
    enroll('alpha', 'token-a')
    const open = remote.hold()

    const tick = scheduler.tick('token-a')
    await vi.waitFor(() => expect(leases.leaseHolder('alpha')).toBeDefined())
    leases.revoke('alpha')
    open()

    expect(await tick).toBe('stopped')
    expect(coordination.scan('sync:')).toEqual([])
  })

  test('two processes never upload the same database at once', async () => {
    await snapshots.write('alpha', createSnapshotDocument('alpha'))
    enroll('alpha', 'token-a')

    const otherRemote = new MemoryObjectStore()
    const otherProcess = createScheduler(otherRemote)
    otherProcess.start('token-a', 'alpha')

    const open = remote.hold()
    const first = scheduler.tick('token-a')
    await vi.waitFor(() => expect(leases.leaseHolder('alpha')).toBeDefined())

    expect(await otherProcess.tick('token-a')).toBe('locked')
    open()
    expect(await first).toBe('synced')
    expect(await otherProcess.tick('token-a')).toBe('unchanged')
    expect(otherRemote.uploads).toHaveLength(0)

    otherProcess.shutdown()
  })

  test('the loop reschedules itself on the interval', async () => {
    vi.useFakeTimers()
    const tick = vi.spyOn(scheduler, 'tick')
    enroll('alpha', 'token-a')

    await vi.advanceTimersByTimeAsync(4999)
    expect(tick).not.toHaveBeenCalled()

    await vi.advanceTimersByTimeAsync(1)
    expect(tick).toHaveBeenCalledTimes(1)
    await tick.mock.results[0]?.value
    await vi.advanceTimersByTimeAsync(0)

    expect(vi.getTimerCount()).toBe(1)
    expect(scheduler.getJob('token-a')?.lastOutcome).toBe('missing')
  })

  test('shutdown clears every timer and keeps coordination state', () => {
    vi.useFakeTimers()
    enroll('alpha', 'token-a')
    enroll('beta', 'token-b')
    expect(vi.getTimerCount()).toBe(2)

    scheduler.shutdown()

    expect(vi.getTimerCount()).toBe(0)
    expect(scheduler.size).toBe(0)
    expect(leases.listEnrolled()).toHaveLength(2)
  })
})

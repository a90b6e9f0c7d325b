/**
 * Remote Backups
 *
 * Read side of the remote store: list the uploaded copies and restore one
 * into the local snapshot directory. Both act with the current credential.
 */

import type { DatabaseName, SnapshotDocument } from '@tabula/core'
import type { CredentialStore } from '../auth'
import {
  AuthenticationRequiredError,
  InvalidSnapshotError,
  RemoteObjectNotFoundError,
} from '../errors'
import type { Logger } from '../logger'
import { type SnapshotStore, parseSnapshotDocument } from '../storage'
import type { RemoteObject, RemoteObjectStore, RemoteRequestOptions } from './types'

export interface RemoteBackupsDeps {
  remote: RemoteObjectStore
  credentials: CredentialStore
  snapshots: SnapshotStore
  logger: Logger
  /** Bound on each remote request. */
  timeoutMs: number
}

export class RemoteBackups {
  private readonly remote: RemoteObjectStore
  private readonly credentials: CredentialStore
  private readonly snapshots: SnapshotStore
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor(deps: RemoteBackupsDeps) {
    this.remote = deps.remote
    this.credentials = deps.credentials
    this.snapshots = deps.snapshots
    this.timeoutMs = deps.timeoutMs
    this.logger = deps.logger.child({ component: 'RemoteBackups' })
  }

  async list(): Promise<RemoteObject[]> {
    const objects = await this.remote.list(await this.requestOptions())
    return [...objects].sort((a, b) => a.name.localeCompare(b.name))
  }

  /**
   * Download the remote copy of `source` and write it as the local snapshot
   * of `name`, replacing any snapshot already there.
   */
  async restore(name: DatabaseName, source: DatabaseName = name): Promise<SnapshotDocument> {
    this.snapshots.assertName(name)
    this.snapshots.assertName(source)

    const bytes = await this.remote.download(source, await this.requestOptions())
    if (!bytes) {
      throw new RemoteObjectNotFoundError(source)
    }

    let value: unknown
    try {
      value = JSON.parse(Buffer.from(bytes).toString('utf-8'))
    } catch (err) {
      throw new InvalidSnapshotError(
        `remote copy of ${source} is not JSON (${err instanceof Error ? err.message : String(err)})`,
      )
    }

    const document = { ...parseSnapshotDocument(value), name }
    await this.snapshots.write(name, document)
    this.logger.info({ database: name, source, bytes: bytes.byteLength }, 'Snapshot restored')
    return document
  }

  private async requestOptions(): Promise<RemoteRequestOptions> {
    const credential = await this.credentials.get()
    if (!credential) {
      throw new AuthenticationRequiredError()
    }
    return { accessToken: credential.accessToken, signal: AbortSignal.timeout(this.timeoutMs) }
  }
}

/**
 * Remote Object Store
 *
 * Mirror target for snapshots. Objects are keyed by database name and
 * uploads overwrite in place, so repeating an upload is harmless.
 */

import type { DatabaseName } from '@tabula/core'

export interface RemoteRequestOptions {
  /** Bearer token for the storage account. */
  accessToken: string
  /** Aborts the request; the scheduler passes a timeout signal. */
  signal?: AbortSignal
}

export interface RemoteObject {
  name: DatabaseName
  size?: number
  modifiedAt?: Date
}

export interface RemoteObjectStore {
  upload(name: DatabaseName, bytes: Uint8Array, options: RemoteRequestOptions): Promise<void>
  download(name: DatabaseName, options: RemoteRequestOptions): Promise<Uint8Array | undefined>
  list(options: RemoteRequestOptions): Promise<RemoteObject[]>
}

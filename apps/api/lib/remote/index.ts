export { RemoteBackups, type RemoteBackupsDeps } from './backups'
export { DriveObjectStore, quoteQueryValue, type DriveObjectStoreOptions } from './drive'
export type {
  RemoteObject,
  RemoteObjectStore,
  RemoteRequestOptions,
} from './types'

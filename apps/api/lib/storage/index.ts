export { SnapshotStore, parseSnapshotDocument } from './snapshot-store'

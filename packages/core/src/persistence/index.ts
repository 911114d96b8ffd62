/**
 * Persistence Module
 *
 * Snapshot codec and storage backends.
 */

export {
  SNAPSHOT_FORMAT,
  SNAPSHOT_VERSION,
  SUPPORTED_SNAPSHOT_MAJOR,
  SnapshotDocumentSchema,
  type SnapshotDocument,
  type SnapshotRecord,
  type SnapshotTotal,
  type SnapshotQuota,
} from './schemas.js'
export { encodeSnapshot, decodeSnapshot, type DecodedSnapshot } from './codec.js'
export type { SnapshotStore } from './types.js'
export { JsonFileSnapshotStore } from './json-store.js'
export { SqliteSnapshotStore } from './sqlite-store.js'

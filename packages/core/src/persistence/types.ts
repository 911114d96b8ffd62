/**
 * Snapshot Store Types
 */

import type { SnapshotDocument } from './schemas.js'

/**
 * Storage backend for snapshot documents
 */
export interface SnapshotStore {
  /** File extension used for generated snapshot paths, without the dot */
  readonly extension: string
  /** Persist a document; replaces whatever is at `path` */
  write(path: string, document: SnapshotDocument): Promise<void>
  /**
   * Read the document at `path` without validating it.
   * Throws PersistenceError when the file is missing or unreadable.
   */
  read(path: string): Promise<unknown>
}

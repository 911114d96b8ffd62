/**
 * Snapshot helpers shared by the CLI commands
 *
 * Every command edits a snapshot in place: open it into a fresh tracker,
 * apply one operation, write it back to the same path.
 */

import { existsSync } from 'fs'
import { extname } from 'path'
import {
  createTrackerFromConfig,
  loadConfig,
  silentLogger,
  type AccountingTracker,
  type Clock,
  type StoreKind,
} from '@callmeter/core'

export interface SnapshotOptions {
  /** Time source for window counts (defaults to the system clock) */
  clock?: Clock
  /** Environment for configuration (defaults to process.env) */
  env?: NodeJS.ProcessEnv
}

/**
 * Pick the snapshot backend from the file extension, falling back to CALLMETER_STORE
 */
export function storeKindForPath(path: string, fallback: StoreKind): StoreKind {
  const ext = extname(path).toLowerCase()
  if (ext === '.db' || ext === '.sqlite') return 'sqlite'
  if (ext === '.json') return 'json'
  return fallback
}

/**
 * Load a snapshot into a new tracker
 *
 * @param allowMissing - Start from an empty tracker when the file does not exist
 * @throws PersistenceError when the snapshot cannot be read or validated
 */
export async function openSnapshot(
  path: string,
  options: SnapshotOptions & { allowMissing?: boolean } = {}
): Promise<AccountingTracker> {
  const config = loadConfig(options.env)
  const tracker = createTrackerFromConfig(
    { ...config, store: storeKindForPath(path, config.store), autoPruneIntervalMs: 0 },
    // Commands print their own errors
    { clock: options.clock, logger: silentLogger }
  )

  if (options.allowMissing && !existsSync(path)) {
    return tracker
  }
  await tracker.load(path)
  return tracker
}

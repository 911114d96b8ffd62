/**
 * Configuration
 *
 * Environment-driven settings for building a tracker, validated with zod.
 *
 * Environment variables:
 * - CALLMETER_SNAPSHOT_DIR: directory for generated snapshot paths (default ~/.callmeter)
 * - CALLMETER_DEBUG: `true`/`false`/`1`/`0`, tracker diagnostics (default false)
 * - CALLMETER_AUTO_PRUNE_MS: auto-prune interval, 0 disables (default 0)
 * - CALLMETER_STORE: `json` or `sqlite` (default json)
 */

import { z } from 'zod'
import { AccountingTracker, DEFAULT_SNAPSHOT_DIR } from '../accounting/AccountingTracker.js'
import type { Clock } from '../accounting/clock.js'
import type { Logger } from '../utils/logger.js'
import { JsonFileSnapshotStore } from '../persistence/json-store.js'
import { SqliteSnapshotStore } from '../persistence/sqlite-store.js'
import type { SnapshotStore } from '../persistence/types.js'
import { ConfigurationError } from '../errors/index.js'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

export const ConfigSchema = z.object({
  CALLMETER_SNAPSHOT_DIR: z.string().min(1).default(DEFAULT_SNAPSHOT_DIR),
  CALLMETER_DEBUG: booleanFlag.default('false'),
  CALLMETER_AUTO_PRUNE_MS: z.coerce.number().int().nonnegative().default(0),
  CALLMETER_STORE: z.enum(['json', 'sqlite']).default('json'),
})

export type StoreKind = z.output<typeof ConfigSchema>['CALLMETER_STORE']

export interface CallmeterConfig {
  snapshotDir: string
  debug: boolean
  autoPruneIntervalMs: number
  store: StoreKind
}

/**
 * Read configuration from the environment
 *
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CallmeterConfig {
  const parsed = ConfigSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue?.path.join('.') ?? 'environment'
    throw new ConfigurationError(`Invalid ${variable}: ${issue?.message ?? 'rejected'}`, {
      cause: parsed.error,
      context: { variable },
    })
  }

  return {
    snapshotDir: parsed.data.CALLMETER_SNAPSHOT_DIR,
    debug: parsed.data.CALLMETER_DEBUG,
    autoPruneIntervalMs: parsed.data.CALLMETER_AUTO_PRUNE_MS,
    store: parsed.data.CALLMETER_STORE,
  }
}

export function createSnapshotStore(kind: StoreKind): SnapshotStore {
  return kind === 'sqlite' ? new SqliteSnapshotStore() : new JsonFileSnapshotStore()
}

export interface TrackerOverrides {
  clock?: Clock
  logger?: Logger
}

/**
 * Build a tracker from configuration
 */
export function createTrackerFromConfig(
  config: CallmeterConfig = loadConfig(),
  overrides: TrackerOverrides = {}
): AccountingTracker {
  return new AccountingTracker({
    clock: overrides.clock,
    logger: overrides.logger,
    debug: config.debug,
    snapshotDir: config.snapshotDir,
    store: createSnapshotStore(config.store),
    autoPruneIntervalMs: config.autoPruneIntervalMs,
  })
}

/**
 * @callmeter/core - API call accounting and quota enforcement
 */

// Version
export const VERSION = '0.1.0'

// Accounting
export * from './accounting/index.js'

// Persistence
export * from './persistence/index.js'

// Configuration
export {
  ConfigSchema,
  loadConfig,
  createSnapshotStore,
  createTrackerFromConfig,
  type CallmeterConfig,
  type StoreKind,
  type TrackerOverrides,
} from './config/config.js'

// Error handling
export * from './errors/index.js'

// Logging
export * from './utils/index.js'

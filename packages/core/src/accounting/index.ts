/**
 * Accounting Module
 *
 * Re-exports for call accounting and quota enforcement.
 */

// Types
export type {
  CallRecord,
  QuotaLimit,
  QuotaType,
  CountWindow,
  AggregateCount,
  QuotaDecision,
  KeyUsageSummary,
  UsageReport,
} from './types.js'

// Constants
export { WINDOW_60S_MS, WINDOW_24H_MS, MAX_WINDOW_MS } from './constants.js'

// Clock
export { systemClock, ManualClock, type Clock } from './clock.js'

// Building blocks
export { CallLedger, type OperationTotal } from './CallLedger.js'
export { QuotaRegistry, QuotaLimitSchema } from './QuotaRegistry.js'
export { maskApiKey } from './mask.js'

// Main class
export {
  AccountingTracker,
  createAccountingTracker,
  DEFAULT_SNAPSHOT_DIR,
  type AccountingTrackerOptions,
} from './AccountingTracker.js'

// Request-layer helper
export { meteredCall, type MeteringPolicy, type MeteredCallOptions } from './metered-call.js'

/**
 * Error Classes Module
 *
 * @example
 * ```typescript
 * import { OutOfQuotaError } from '@callmeter/core'
 *
 * try {
 *   tracker.checkQuota(apiKey)
 * } catch (error) {
 *   if (error instanceof OutOfQuotaError) {
 *     console.warn(`${error.quotaType}: ${error.current}/${error.limit}`)
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  MeterError,
  AccountingInactiveError,
  OutOfQuotaError,
  PersistenceError,
  QuotaConfigurationError,
  LedgerOrderError,
  ConfigurationError,
  getErrorMessage,
  isMeterError,
} from './MeterError.js'

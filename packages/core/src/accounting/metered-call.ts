/**
 * Metered remote calls
 *
 * Wraps one request-layer invocation in a quota policy so callers do not
 * have to sequence check and record themselves.
 */

import type { AccountingTracker } from './AccountingTracker.js'
import { maskApiKey } from './mask.js'
import { AccountingInactiveError } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('meteredCall')

/**
 * - `pre-check`: check quota, run, record after the call settles
 * - `strict`: check and record in one step before running
 * - `record-only`: run, record after the call settles, never check
 */
export type MeteringPolicy = 'pre-check' | 'strict' | 'record-only'

export interface MeteredCallOptions {
  policy?: MeteringPolicy
}

/**
 * Record a call that has already gone out. A tracker stopped while the call
 * was in flight cannot take the record; that is logged rather than thrown so
 * the call's own outcome reaches the caller.
 */
function recordSettled(tracker: AccountingTracker, apiKey: string, operation: string): void {
  try {
    tracker.recordCall(apiKey, operation)
  } catch (error) {
    if (!(error instanceof AccountingInactiveError)) {
      throw error
    }
    log.warn('Call finished after accounting stopped; not recorded', {
      apiKey: maskApiKey(apiKey),
      operation,
    })
  }
}

/**
 * Run `fn` as one metered call of `operation` for `apiKey`.
 * Errors from `fn` propagate unchanged; the call is still recorded. If the
 * tracker is stopped while `fn` runs, `fn`'s result or error is still returned
 * and the missed record is logged at WARN.
 *
 * @example
 * ```typescript
 * const quote = await meteredCall(tracker, apiKey, 'Get_Quote', () => client.getQuote('AAPL'))
 * ```
 */
export async function meteredCall<T>(
  tracker: AccountingTracker,
  apiKey: string,
  operation: string,
  fn: () => Promise<T>,
  options: MeteredCallOptions = {}
): Promise<T> {
  const policy = options.policy ?? 'pre-check'

  if (policy === 'strict') {
    tracker.recordIfAllowed(apiKey, operation)
    return fn()
  }

  // A stopped tracker rejects before the remote call is made
  if (!tracker.isRunning) {
    throw new AccountingInactiveError(operation)
  }
  if (policy === 'pre-check') {
    tracker.checkQuota(apiKey)
  }

  let result: T
  try {
    result = await fn()
  } catch (error) {
    recordSettled(tracker, apiKey, operation)
    throw error
  }
  recordSettled(tracker, apiKey, operation)
  return result
}

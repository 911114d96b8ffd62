/**
 * Accounting Types
 *
 * Type definitions shared by the ledger, quota registry, tracker and snapshot codec.
 */

/**
 * One recorded remote call. Frozen on creation.
 */
export interface CallRecord {
  /** Epoch milliseconds */
  readonly timestamp: number
  /** Full, unmasked api key */
  readonly apiKey: string
  /** Canonical operation name supplied by the request layer, e.g. `Get_Quote` */
  readonly operation: string
}

/**
 * Configured limits for one api key. Unset fields are unlimited.
 */
export interface QuotaLimit {
  /** Max calls in any sliding 60-second window */
  calls60s?: number
  /** Max calls in any sliding 24-hour window */
  calls24h?: number
  /** Max calls since the last reset */
  totalCap?: number
}

/**
 * Which threshold a quota violation refers to
 */
export type QuotaType = 'total' | 'calls_60s' | 'calls_24h'

/**
 * Window selector for ledger counts
 */
export type CountWindow = 'all' | '60s' | '24h'

/**
 * Derived call counts for a key (optionally scoped to one operation)
 */
export interface AggregateCount {
  /** Calls inside the requested window; lifetime when the window is `all` */
  total: number
  last60s: number
  last24h: number
}

/**
 * Non-throwing result of a quota evaluation
 */
export interface QuotaDecision {
  allowed: boolean
  counts: AggregateCount
  /** Configured limits, absent when the key is unlimited */
  limit?: QuotaLimit
  /** First exceeded threshold, present only when `allowed` is false */
  violation?: {
    quotaType: QuotaType
    current: number
    limit: number
  }
}

/**
 * Usage of one api key in a summary report
 */
export interface KeyUsageSummary {
  /** Masked api key for display */
  apiKey: string
  totals: AggregateCount
  /** Per-operation breakdown keyed by operation name */
  operations: Record<string, AggregateCount>
  quota?: QuotaLimit
}

/**
 * Output of `AccountingTracker.summary()`
 */
export interface UsageReport {
  /** ISO timestamp taken from the tracker's clock */
  generatedAt: string
  keys: KeyUsageSummary[]
}

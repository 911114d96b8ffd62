/**
 * Call Ledger
 *
 * Append-only record of call events backing every count the tracker reports.
 *
 * - Records arrive in non-decreasing timestamp order, so every per-key/per-operation
 *   timestamp list stays sorted without re-sorting and window counts are a binary search.
 * - A window includes records with `timestamp >= now - windowMs` (inclusive lower bound).
 * - Lifetime totals are kept separately and survive pruning; only `clear()` drops them.
 */

import type { Clock } from './clock.js'
import type { AggregateCount, CallRecord, CountWindow } from './types.js'
import { MAX_WINDOW_MS, WINDOW_24H_MS, WINDOW_60S_MS } from './constants.js'
import { LedgerOrderError } from '../errors/index.js'

/**
 * Lifetime call count for one key/operation pair
 */
export interface OperationTotal {
  apiKey: string
  operation: string
  count: number
}

/**
 * Number of entries in a sorted list that are >= cutoff
 */
function countSince(timestamps: number[], cutoff: number): number {
  let lo = 0
  let hi = timestamps.length
  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if ((timestamps[mid] ?? 0) < cutoff) {
      lo = mid + 1
    } else {
      hi = mid
    }
  }
  return timestamps.length - lo
}

function emptyCount(): AggregateCount {
  return { total: 0, last60s: 0, last24h: 0 }
}

export class CallLedger {
  private records: CallRecord[] = []
  /** apiKey -> operation -> sorted timestamps still held in the ledger */
  private readonly index = new Map<string, Map<string, number[]>>()
  /** apiKey -> operation -> lifetime count */
  private readonly totals = new Map<string, Map<string, number>>()
  private latest = Number.NEGATIVE_INFINITY

  constructor(private readonly clock: Clock) {}

  /**
   * Rebuild a ledger from persisted records and lifetime totals.
   * Records must already be sorted by timestamp.
   */
  static restore(clock: Clock, records: CallRecord[], totals: OperationTotal[]): CallLedger {
    const ledger = new CallLedger(clock)
    for (const record of records) {
      ledger.insert(Object.freeze({ ...record }))
    }
    for (const { apiKey, operation, count } of totals) {
      ledger.totalsFor(apiKey).set(operation, count)
    }
    return ledger
  }

  /** Number of records physically held */
  get size(): number {
    return this.records.length
  }

  /** Timestamp of the newest record ever appended, or -Infinity */
  get latestTimestamp(): number {
    return this.latest
  }

  /**
   * Append a record. Throws LedgerOrderError if it is older than the newest record.
   */
  append(record: CallRecord): CallRecord {
    if (record.timestamp < this.latest) {
      throw new LedgerOrderError(record.timestamp, this.latest)
    }
    const frozen = Object.freeze({ ...record })
    this.insert(frozen)
    const ops = this.totalsFor(frozen.apiKey)
    ops.set(frozen.operation, (ops.get(frozen.operation) ?? 0) + 1)
    return frozen
  }

  /**
   * Count calls for a key, across all operations or for one.
   * `last60s` and `last24h` are always the rolling windows; `total` follows `window`.
   */
  count(apiKey: string, operation?: string, window: CountWindow = 'all'): AggregateCount {
    const byOperation = this.index.get(apiKey)
    const lifetime = this.totals.get(apiKey)
    const result = emptyCount()
    if (!lifetime) {
      return result
    }

    const now = this.clock.now()
    const names = operation === undefined ? Array.from(lifetime.keys()) : [operation]

    let allTime = 0
    for (const name of names) {
      allTime += lifetime.get(name) ?? 0
      const timestamps = byOperation?.get(name)
      if (timestamps) {
        result.last60s += countSince(timestamps, now - WINDOW_60S_MS)
        result.last24h += countSince(timestamps, now - WINDOW_24H_MS)
      }
    }

    if (window === 'all') {
      result.total = allTime
    } else {
      result.total = window === '60s' ? result.last60s : result.last24h
    }
    return result
  }

  /**
   * Drop records strictly older than `olderThan`. The cutoff is clamped to
   * `now - 24h` so a record inside any window is never removed.
   *
   * @returns Number of records removed
   */
  prune(olderThan?: number): number {
    const floor = this.clock.now() - MAX_WINDOW_MS
    const cutoff = olderThan === undefined ? floor : Math.min(olderThan, floor)

    const keep = countSince(
      this.records.map((r) => r.timestamp),
      cutoff
    )
    const removed = this.records.length - keep
    if (removed === 0) {
      return 0
    }
    this.records = this.records.slice(removed)

    for (const [apiKey, byOperation] of this.index) {
      for (const [name, timestamps] of byOperation) {
        const remaining = countSince(timestamps, cutoff)
        if (remaining === 0) {
          byOperation.delete(name)
        } else if (remaining < timestamps.length) {
          byOperation.set(name, timestamps.slice(timestamps.length - remaining))
        }
      }
      if (byOperation.size === 0) {
        this.index.delete(apiKey)
      }
    }
    return removed
  }

  /**
   * Remove records and lifetime totals for one key, or for every key
   */
  clear(apiKey?: string): void {
    if (apiKey === undefined) {
      this.records = []
      this.index.clear()
      this.totals.clear()
      return
    }
    this.records = this.records.filter((r) => r.apiKey !== apiKey)
    this.index.delete(apiKey)
    this.totals.delete(apiKey)
  }

  /**
   * Keys with any recorded usage since their last reset, sorted
   */
  keys(): string[] {
    return Array.from(this.totals.keys()).sort()
  }

  /**
   * Operation names ever recorded for a key since its last reset, sorted
   */
  operations(apiKey: string): string[] {
    return Array.from(this.totals.get(apiKey)?.keys() ?? []).sort()
  }

  /**
   * Records currently held, oldest first
   */
  getRecords(): readonly CallRecord[] {
    return [...this.records]
  }

  /**
   * Lifetime totals for every key/operation pair
   */
  getTotals(): OperationTotal[] {
    const out: OperationTotal[] = []
    for (const apiKey of this.keys()) {
      for (const operation of this.operations(apiKey)) {
        out.push({ apiKey, operation, count: this.totals.get(apiKey)?.get(operation) ?? 0 })
      }
    }
    return out
  }

  private insert(record: CallRecord): void {
    this.records.push(record)
    let byOperation = this.index.get(record.apiKey)
    if (!byOperation) {
      byOperation = new Map()
      this.index.set(record.apiKey, byOperation)
    }
    const timestamps = byOperation.get(record.operation)
    if (timestamps) {
      timestamps.push(record.timestamp)
    } else {
      byOperation.set(record.operation, [record.timestamp])
    }
    this.latest = Math.max(this.latest, record.timestamp)
  }

  private totalsFor(apiKey: string): Map<string, number> {
    let ops = this.totals.get(apiKey)
    if (!ops) {
      ops = new Map()
      this.totals.set(apiKey, ops)
    }
    return ops
  }
}

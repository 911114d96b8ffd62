/**
 * Accounting Tracker
 *
 * Façade over the call ledger and quota registry:
 * - Start/stop lifecycle gating `recordCall`
 * - Quota evaluation in the fixed order total → calls_60s → calls_24h
 * - Per-key and per-operation summaries with masked keys
 * - Snapshot save/load through a pluggable store
 *
 * Every method except `save` and `load` is synchronous, so each runs to completion
 * on the event loop without interleaving with another. `checkQuota` followed by
 * `recordCall` is still two steps: a caller that awaits in between can overshoot a
 * limit by the number of concurrent callers. `recordIfAllowed` does both in one step.
 */

import { join } from 'path'
import { homedir } from 'os'
import { CallLedger } from './CallLedger.js'
import { QuotaRegistry } from './QuotaRegistry.js'
import { systemClock, type Clock } from './clock.js'
import { maskApiKey } from './mask.js'
import type {
  AggregateCount,
  CallRecord,
  CountWindow,
  KeyUsageSummary,
  QuotaDecision,
  QuotaLimit,
  UsageReport,
} from './types.js'
import { encodeSnapshot, decodeSnapshot } from '../persistence/codec.js'
import { JsonFileSnapshotStore } from '../persistence/json-store.js'
import type { SnapshotStore } from '../persistence/types.js'
import {
  AccountingInactiveError,
  OutOfQuotaError,
  PersistenceError,
  getErrorMessage,
} from '../errors/index.js'
import { createLogger, LogLevel, type Logger } from '../utils/logger.js'

/**
 * Default directory for generated snapshot paths: ~/.callmeter
 */
export const DEFAULT_SNAPSHOT_DIR = join(homedir(), '.callmeter')

export interface AccountingTrackerOptions {
  /** Time source (defaults to the system clock) */
  clock?: Clock
  /** Emit the tracker's own debug/info diagnostics */
  debug?: boolean
  /** Logger to use instead of the tracker's own; `debug` is ignored when set */
  logger?: Logger
  /** Directory for snapshots saved without an explicit path */
  snapshotDir?: string
  /** Snapshot backend (defaults to JSON files) */
  store?: SnapshotStore
  /** Prune on this interval in milliseconds (0 or unset disables) */
  autoPruneIntervalMs?: number
}

/**
 * Client-side API call accounting with quota enforcement
 *
 * @example
 * ```typescript
 * const tracker = new AccountingTracker()
 * tracker.enableQuota('my-api-key', { calls60s: 10, calls24h: 500 })
 * tracker.start()
 *
 * tracker.checkQuota('my-api-key') // throws OutOfQuotaError when exhausted
 * const quote = await client.getQuote('AAPL')
 * tracker.recordCall('my-api-key', 'Get_Quote')
 *
 * await tracker.save()
 * ```
 */
export class AccountingTracker {
  private ledger: CallLedger
  private registry: QuotaRegistry
  private running = false
  private readonly clock: Clock
  private readonly store: SnapshotStore
  private readonly snapshotDir: string
  private readonly log: Logger
  private pruneTimer: ReturnType<typeof setInterval> | null = null

  constructor(options: AccountingTrackerOptions = {}) {
    this.clock = options.clock ?? systemClock
    this.store = options.store ?? new JsonFileSnapshotStore()
    this.snapshotDir = options.snapshotDir ?? DEFAULT_SNAPSHOT_DIR
    this.log =
      options.logger ??
      createLogger('AccountingTracker', options.debug ? { level: LogLevel.DEBUG } : {})
    this.ledger = new CallLedger(this.clock)
    this.registry = new QuotaRegistry()

    const interval = options.autoPruneIntervalMs ?? 0
    if (interval > 0) {
      this.pruneTimer = setInterval(() => this.prune(), interval)
      // Don't block Node.js from exiting
      this.pruneTimer.unref()
    }

    this.log.debug('Accounting tracker created', {
      snapshotDir: this.snapshotDir,
      store: this.store.extension,
      autoPruneIntervalMs: interval,
    })
  }

  get isRunning(): boolean {
    return this.running
  }

  start(): void {
    this.running = true
    this.log.info('Accounting started')
  }

  stop(): void {
    this.running = false
    this.log.info('Accounting stopped')
  }

  /**
   * Record one completed remote call. Never blocked by quota.
   *
   * @throws AccountingInactiveError when the tracker is not started
   */
  recordCall(apiKey: string, operation: string): CallRecord {
    if (!this.running) {
      throw new AccountingInactiveError(operation)
    }
    // Clamp so a wall clock stepping backwards cannot reorder the ledger
    const timestamp = Math.max(this.clock.now(), this.ledger.latestTimestamp)
    const record = this.ledger.append({ timestamp, apiKey, operation })
    this.log.debug('Recorded call', { apiKey: maskApiKey(apiKey), operation })
    return record
  }

  /**
   * Compare current usage against the key's limits without throwing.
   * With `operation`, only calls to that operation are counted.
   */
  evaluateQuota(apiKey: string, operation?: string): QuotaDecision {
    const counts = this.ledger.count(apiKey, operation)
    const limit = this.registry.get(apiKey)
    if (!limit) {
      return { allowed: true, counts }
    }

    const checks = [
      ['total', counts.total, limit.totalCap],
      ['calls_60s', counts.last60s, limit.calls60s],
      ['calls_24h', counts.last24h, limit.calls24h],
    ] as const

    for (const [quotaType, current, max] of checks) {
      if (max !== undefined && current >= max) {
        return { allowed: false, counts, limit, violation: { quotaType, current, limit: max } }
      }
    }
    return { allowed: true, counts, limit }
  }

  /**
   * Fail if the next call for this key would exceed a configured limit.
   *
   * @throws OutOfQuotaError naming the first exceeded threshold
   */
  checkQuota(apiKey: string, operation?: string): QuotaDecision {
    const decision = this.evaluateQuota(apiKey, operation)
    if (decision.violation) {
      const maskedKey = maskApiKey(apiKey)
      this.log.warn('Quota exhausted', { apiKey: maskedKey, operation, ...decision.violation })
      throw new OutOfQuotaError({ ...decision.violation, maskedKey, operation })
    }
    return decision
  }

  /**
   * Check the key's quota and record the call in one step.
   *
   * @throws AccountingInactiveError when the tracker is not started
   * @throws OutOfQuotaError without recording anything
   */
  recordIfAllowed(apiKey: string, operation: string): CallRecord {
    if (!this.running) {
      throw new AccountingInactiveError(operation)
    }
    this.checkQuota(apiKey)
    return this.recordCall(apiKey, operation)
  }

  enableQuota(apiKey: string, limit: QuotaLimit): QuotaLimit {
    const stored = this.registry.enable(apiKey, limit)
    this.log.debug('Quota enabled', { apiKey: maskApiKey(apiKey), ...stored })
    return stored
  }

  disableQuota(apiKey: string): boolean {
    const removed = this.registry.disable(apiKey)
    this.log.debug('Quota disabled', { apiKey: maskApiKey(apiKey), removed })
    return removed
  }

  getQuota(apiKey: string): QuotaLimit | undefined {
    return this.registry.get(apiKey)
  }

  count(apiKey: string, operation?: string, window?: CountWindow): AggregateCount {
    return this.ledger.count(apiKey, operation, window)
  }

  /**
   * Usage report for one key, or for every key with usage or a configured quota
   */
  summary(apiKey?: string): UsageReport {
    const keys =
      apiKey !== undefined
        ? [apiKey]
        : Array.from(
            new Set([...this.ledger.keys(), ...this.registry.entries().map(([key]) => key)])
          ).sort()

    return {
      generatedAt: new Date(this.clock.now()).toISOString(),
      keys: keys.map((key) => this.summarizeKey(key)),
    }
  }

  /**
   * Clear recorded usage for one key or all keys. Quotas stay configured.
   */
  reset(apiKey?: string): void {
    this.ledger.clear(apiKey)
    this.log.info(apiKey !== undefined ? 'Usage reset for key' : 'Usage reset', {
      apiKey: apiKey !== undefined ? maskApiKey(apiKey) : undefined,
    })
  }

  /**
   * Drop records that no longer fall inside any window
   *
   * @returns Number of records removed
   */
  prune(olderThan?: number): number {
    const removed = this.ledger.prune(olderThan)
    if (removed > 0) {
      this.log.debug(`Pruned ${removed} expired call records`)
    }
    return removed
  }

  /**
   * Persist the ledger and quota registry.
   *
   * @param path - Target path; generated under the snapshot directory when omitted
   * @returns The path written
   * @throws PersistenceError
   */
  async save(path?: string): Promise<string> {
    // Capture state before any I/O so the snapshot is a single point in time
    const document = encodeSnapshot(this.ledger, this.registry, new Date(this.clock.now()))
    const target = path ?? this.generateSnapshotPath()

    try {
      await this.store.write(target, document)
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError(`Failed to save snapshot: ${getErrorMessage(error)}`, {
              path: target,
              cause: error,
            })
      this.log.error('Snapshot save failed', failure, { path: target })
      throw failure
    }

    this.log.info('Snapshot saved', { path: target, records: document.records.length })
    return target
  }

  /**
   * Replace the ledger and quota registry with a saved snapshot.
   * On any failure the current state is left untouched.
   *
   * @throws PersistenceError
   */
  async load(path: string): Promise<void> {
    let raw: unknown
    try {
      raw = await this.store.read(path)
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError(`Failed to load snapshot: ${getErrorMessage(error)}`, {
              path,
              cause: error,
            })
      this.log.error('Snapshot load failed', failure, { path })
      throw failure
    }

    let ledger: CallLedger
    let registry: QuotaRegistry
    try {
      const snapshot = decodeSnapshot(raw, path)
      ledger = CallLedger.restore(this.clock, snapshot.records, snapshot.totals)
      registry = new QuotaRegistry()
      for (const [apiKey, limit] of snapshot.quotas) {
        registry.enable(apiKey, limit)
      }
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError(`Snapshot could not be restored: ${getErrorMessage(error)}`, {
              path,
              cause: error,
            })
      this.log.error('Snapshot load failed', failure, { path })
      throw failure
    }

    this.ledger = ledger
    this.registry = registry
    this.log.info('Snapshot loaded', { path, records: ledger.size })
  }

  /**
   * Stop the auto-prune timer
   */
  dispose(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer)
      this.pruneTimer = null
    }
  }

  private summarizeKey(apiKey: string): KeyUsageSummary {
    const operations: Record<string, AggregateCount> = {}
    for (const operation of this.ledger.operations(apiKey)) {
      operations[operation] = this.ledger.count(apiKey, operation)
    }
    const summary: KeyUsageSummary = {
      apiKey: maskApiKey(apiKey),
      totals: this.ledger.count(apiKey),
      operations,
    }
    const quota = this.registry.get(apiKey)
    if (quota) {
      summary.quota = quota
    }
    return summary
  }

  private generateSnapshotPath(): string {
    const stamp = new Date(this.clock.now()).toISOString().replace(/[:.]/g, '-')
    const suffix = Math.random().toString(36).substring(2, 8)
    return join(this.snapshotDir, `callmeter-${stamp}-${suffix}.${this.store.extension}`)
  }
}

/**
 * Create an AccountingTracker instance
 */
export function createAccountingTracker(options?: AccountingTrackerOptions): AccountingTracker {
  return new AccountingTracker(options)
}

/**
 * Snapshot Codec
 *
 * Converts ledger + quota registry state to and from the versioned snapshot
 * document. Decoding validates everything up front so a caller can swap the
 * result in as a whole or not at all.
 */

import type { CallLedger, OperationTotal } from '../accounting/CallLedger.js'
import type { QuotaRegistry } from '../accounting/QuotaRegistry.js'
import type { CallRecord, QuotaLimit } from '../accounting/types.js'
import { PersistenceError } from '../errors/index.js'
import {
  SNAPSHOT_FORMAT,
  SNAPSHOT_VERSION,
  SUPPORTED_SNAPSHOT_MAJOR,
  SnapshotDocumentSchema,
  SnapshotHeaderSchema,
  type SnapshotDocument,
  type SnapshotQuota,
} from './schemas.js'

/**
 * Validated snapshot contents, ready to restore
 */
export interface DecodedSnapshot {
  version: string
  savedAt: string
  /** Sorted by timestamp */
  records: CallRecord[]
  totals: OperationTotal[]
  quotas: Array<[string, QuotaLimit]>
}

function toQuotaLimit(quota: SnapshotQuota): QuotaLimit {
  const limit: QuotaLimit = {}
  if (quota.calls60s !== undefined) limit.calls60s = quota.calls60s
  if (quota.calls24h !== undefined) limit.calls24h = quota.calls24h
  if (quota.totalCap !== undefined) limit.totalCap = quota.totalCap
  return limit
}

/**
 * Build a snapshot document from live state
 */
export function encodeSnapshot(
  ledger: CallLedger,
  registry: QuotaRegistry,
  savedAt: Date
): SnapshotDocument {
  return {
    format: SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    savedAt: savedAt.toISOString(),
    records: ledger.getRecords().map((r) => ({
      timestamp: r.timestamp,
      apiKey: r.apiKey,
      operation: r.operation,
    })),
    totals: ledger.getTotals(),
    quotas: registry.entries().map(([apiKey, limit]) => ({ apiKey, ...limit })),
  }
}

/**
 * Validate and decode a parsed snapshot document
 *
 * @param raw - Parsed document (JSON value or rows mapped by a store)
 * @param path - Source path, for error context
 * @throws PersistenceError on a wrong format tag, unsupported major version,
 *   missing or invalid fields, duplicate entries, or totals below the stored records
 */
export function decodeSnapshot(raw: unknown, path?: string): DecodedSnapshot {
  const header = SnapshotHeaderSchema.safeParse(raw)
  if (!header.success) {
    throw new PersistenceError('Snapshot is missing a valid format/version header', {
      path,
      cause: header.error,
    })
  }
  if (header.data.format !== SNAPSHOT_FORMAT) {
    throw new PersistenceError(`Unrecognized snapshot format '${header.data.format}'`, { path })
  }
  const major = parseInt(header.data.version.split('.')[0] ?? '', 10)
  if (major !== SUPPORTED_SNAPSHOT_MAJOR) {
    throw new PersistenceError(
      `Unsupported snapshot version ${header.data.version} (supported: ${SUPPORTED_SNAPSHOT_MAJOR}.x)`,
      { path, context: { version: header.data.version } }
    )
  }

  const parsed = SnapshotDocumentSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new PersistenceError(
      `Invalid snapshot: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'rejected'}`,
      { path, cause: parsed.error }
    )
  }
  const doc = parsed.data

  const totals = new Map<string, number>()
  for (const total of doc.totals) {
    const id = JSON.stringify([total.apiKey, total.operation])
    if (totals.has(id)) {
      throw new PersistenceError(
        `Duplicate total for key/operation '${total.operation}' in snapshot`,
        { path }
      )
    }
    totals.set(id, total.count)
  }

  const held = new Map<string, number>()
  for (const record of doc.records) {
    const id = JSON.stringify([record.apiKey, record.operation])
    held.set(id, (held.get(id) ?? 0) + 1)
  }
  for (const [id, count] of held) {
    if ((totals.get(id) ?? 0) < count) {
      throw new PersistenceError('Snapshot totals are smaller than its stored records', {
        path,
        context: { entry: id, records: count, total: totals.get(id) ?? 0 },
      })
    }
  }

  const seenQuotaKeys = new Set<string>()
  const quotas: Array<[string, QuotaLimit]> = []
  for (const quota of doc.quotas) {
    if (seenQuotaKeys.has(quota.apiKey)) {
      throw new PersistenceError('Duplicate quota entry in snapshot', { path })
    }
    seenQuotaKeys.add(quota.apiKey)
    quotas.push([quota.apiKey, toQuotaLimit(quota)])
  }

  const records: CallRecord[] = doc.records
    .map((r) => ({ timestamp: r.timestamp, apiKey: r.apiKey, operation: r.operation }))
    .sort((a, b) => a.timestamp - b.timestamp)

  return {
    version: doc.version,
    savedAt: doc.savedAt,
    records,
    totals: doc.totals.map((t) => ({ apiKey: t.apiKey, operation: t.operation, count: t.count })),
    quotas,
  }
}

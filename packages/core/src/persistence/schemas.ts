/**
 * Zod Schemas for Snapshot Validation
 * @module persistence/schemas
 *
 * Object schemas strip unknown keys, so fields added by a newer minor
 * version of the format are ignored on load.
 */

import { z } from 'zod'

export const SNAPSHOT_FORMAT = 'callmeter-snapshot'

/** Current snapshot format version, `<major>.<minor>` */
export const SNAPSHOT_VERSION = '1.0'

/** Major version this build can read */
export const SUPPORTED_SNAPSHOT_MAJOR = 1

const limitValue = z.number().int().positive().max(Number.MAX_SAFE_INTEGER)

/**
 * Just enough of a snapshot to decide whether it can be read at all
 */
export const SnapshotHeaderSchema = z.object({
  format: z.string(),
  version: z.string().regex(/^\d+\.\d+$/, 'Expected "<major>.<minor>"'),
})

export const SnapshotRecordSchema = z.object({
  // Any finite epoch-ms value a Clock may return, fractional included
  timestamp: z.number().finite().nonnegative(),
  apiKey: z.string(),
  operation: z.string().min(1),
})

export const SnapshotTotalSchema = z.object({
  apiKey: z.string(),
  operation: z.string().min(1),
  count: z.number().int().nonnegative(),
})

export const SnapshotQuotaSchema = z.object({
  apiKey: z.string(),
  calls60s: limitValue.optional(),
  calls24h: limitValue.optional(),
  totalCap: limitValue.optional(),
})

export const SnapshotDocumentSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  version: z.string(),
  savedAt: z.string().datetime(),
  records: z.array(SnapshotRecordSchema),
  totals: z.array(SnapshotTotalSchema),
  quotas: z.array(SnapshotQuotaSchema),
})

export type SnapshotRecord = z.infer<typeof SnapshotRecordSchema>
export type SnapshotTotal = z.infer<typeof SnapshotTotalSchema>
export type SnapshotQuota = z.infer<typeof SnapshotQuotaSchema>
export type SnapshotDocument = z.infer<typeof SnapshotDocumentSchema>

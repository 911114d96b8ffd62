/**
 * Quota Registry
 *
 * Maps the literal api key string to its configured limits. There is no
 * wildcard or default entry: an unknown key is unlimited.
 */

import { z } from 'zod'
import type { QuotaLimit } from './types.js'
import { QuotaConfigurationError } from '../errors/index.js'

const limitValue = z.number().int().positive().max(Number.MAX_SAFE_INTEGER)

/**
 * Schema for a quota limit; shared with the snapshot codec
 */
export const QuotaLimitSchema = z
  .object({
    calls60s: limitValue.optional(),
    calls24h: limitValue.optional(),
    totalCap: limitValue.optional(),
  })
  .strict()

/**
 * Drop undefined fields so stored limits compare and serialize cleanly
 */
function compact(limit: QuotaLimit): QuotaLimit {
  const out: QuotaLimit = {}
  if (limit.calls60s !== undefined) out.calls60s = limit.calls60s
  if (limit.calls24h !== undefined) out.calls24h = limit.calls24h
  if (limit.totalCap !== undefined) out.totalCap = limit.totalCap
  return out
}

export class QuotaRegistry {
  private readonly limits = new Map<string, QuotaLimit>()

  /**
   * Install or replace the limits for a key. Replacing is a full overwrite.
   *
   * @throws QuotaConfigurationError when a limit is not a positive integer
   */
  enable(apiKey: string, limit: QuotaLimit): QuotaLimit {
    const parsed = QuotaLimitSchema.safeParse(limit)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const field = issue?.path.join('.')
      throw new QuotaConfigurationError(
        `Invalid quota limit${field ? ` '${field}'` : ''}: ${issue?.message ?? 'rejected'}`,
        { field, cause: parsed.error }
      )
    }
    const stored = Object.freeze(compact(parsed.data))
    this.limits.set(apiKey, stored)
    return { ...stored }
  }

  /**
   * Remove the limits for a key
   *
   * @returns Whether the key had limits
   */
  disable(apiKey: string): boolean {
    return this.limits.delete(apiKey)
  }

  /**
   * Limits for a key, or undefined when it is unlimited
   */
  get(apiKey: string): QuotaLimit | undefined {
    const limit = this.limits.get(apiKey)
    return limit ? { ...limit } : undefined
  }

  /**
   * All configured keys with their limits, sorted by key
   */
  entries(): Array<[string, QuotaLimit]> {
    return Array.from(this.limits.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, limit]): [string, QuotaLimit] => [key, { ...limit }])
  }

  clear(): void {
    this.limits.clear()
  }

  get size(): number {
    return this.limits.size
  }
}

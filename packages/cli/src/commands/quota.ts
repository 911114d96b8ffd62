/**
 * quota command: set or clear per-key limits stored in a snapshot
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { getErrorMessage, maskApiKey, type QuotaLimit } from '@callmeter/core'
import { openSnapshot, type SnapshotOptions } from '../utils/snapshot.js'
import { formatQuota } from '../utils/format.js'

export interface QuotaSetFlags {
  perMinute?: string
  perDay?: string
  total?: string
}

/**
 * Translate command-line flags into limits. Values are checked by the registry.
 */
export function parseQuotaFlags(flags: QuotaSetFlags): QuotaLimit {
  const limit: QuotaLimit = {}
  if (flags.perMinute !== undefined) limit.calls60s = Number(flags.perMinute)
  if (flags.perDay !== undefined) limit.calls24h = Number(flags.perDay)
  if (flags.total !== undefined) limit.totalCap = Number(flags.total)
  return limit
}

export async function runQuotaSet(
  snapshot: string,
  apiKey: string,
  flags: QuotaSetFlags,
  options: SnapshotOptions = {}
): Promise<string> {
  const limit = parseQuotaFlags(flags)
  if (Object.keys(limit).length === 0) {
    throw new Error('At least one limit is required (--per-minute, --per-day or --total)')
  }

  const tracker = await openSnapshot(snapshot, { ...options, allowMissing: true })
  try {
    const stored = tracker.enableQuota(apiKey, limit)
    await tracker.save(snapshot)
    return `Quota for ${maskApiKey(apiKey)} set to ${formatQuota(stored)}`
  } finally {
    tracker.dispose()
  }
}

export async function runQuotaClear(
  snapshot: string,
  apiKey: string,
  options: SnapshotOptions = {}
): Promise<string> {
  const tracker = await openSnapshot(snapshot, options)
  try {
    const removed = tracker.disableQuota(apiKey)
    if (!removed) {
      return `No quota configured for ${maskApiKey(apiKey)}`
    }
    await tracker.save(snapshot)
    return `Quota for ${maskApiKey(apiKey)} cleared`
  } finally {
    tracker.dispose()
  }
}

export function createQuotaCommand(): Command {
  const quota = new Command('quota').description('Manage per-key quotas in a snapshot')

  quota
    .command('set')
    .description('Replace the limits for an api key')
    .argument('<snapshot>', 'Snapshot file (created when missing)')
    .argument('<apiKey>', 'Api key to limit')
    .option('-m, --per-minute <n>', 'Max calls in any 60-second window')
    .option('-d, --per-day <n>', 'Max calls in any 24-hour window')
    .option('-t, --total <n>', 'Max calls since the last reset')
    .action(async (snapshot: string, apiKey: string, flags: QuotaSetFlags) => {
      try {
        console.log(chalk.green(await runQuotaSet(snapshot, apiKey, flags)))
      } catch (error) {
        console.error(chalk.red('Error setting quota:'), getErrorMessage(error))
        process.exitCode = 1
      }
    })

  quota
    .command('clear')
    .description('Remove the limits for an api key')
    .argument('<snapshot>', 'Snapshot file')
    .argument('<apiKey>', 'Api key to unlimit')
    .action(async (snapshot: string, apiKey: string) => {
      try {
        console.log(await runQuotaClear(snapshot, apiKey))
      } catch (error) {
        console.error(chalk.red('Error clearing quota:'), getErrorMessage(error))
        process.exitCode = 1
      }
    })

  return quota
}

/**
 * prune and reset commands
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { getErrorMessage, maskApiKey } from '@callmeter/core'
import { openSnapshot, type SnapshotOptions } from '../utils/snapshot.js'

export async function runPrune(snapshot: string, options: SnapshotOptions = {}): Promise<string> {
  const tracker = await openSnapshot(snapshot, options)
  try {
    const removed = tracker.prune()
    await tracker.save(snapshot)
    return `Pruned ${removed} expired call record(s)`
  } finally {
    tracker.dispose()
  }
}

export async function runReset(
  snapshot: string,
  options: SnapshotOptions & { key?: string } = {}
): Promise<string> {
  const tracker = await openSnapshot(snapshot, options)
  try {
    tracker.reset(options.key)
    await tracker.save(snapshot)
    return options.key !== undefined
      ? `Usage reset for ${maskApiKey(options.key)}`
      : 'Usage reset for all keys'
  } finally {
    tracker.dispose()
  }
}

export function createPruneCommand(): Command {
  return new Command('prune')
    .description('Drop call records older than 24 hours (lifetime totals are kept)')
    .argument('<snapshot>', 'Snapshot file')
    .action(async (snapshot: string) => {
      try {
        console.log(await runPrune(snapshot))
      } catch (error) {
        console.error(chalk.red('Error pruning snapshot:'), getErrorMessage(error))
        process.exitCode = 1
      }
    })
}

export function createResetCommand(): Command {
  return new Command('reset')
    .description('Clear recorded usage; quotas stay configured')
    .argument('<snapshot>', 'Snapshot file')
    .option('-k, --key <apiKey>', 'Only reset this api key')
    .action(async (snapshot: string, opts: { key?: string }) => {
      try {
        console.log(chalk.green(await runReset(snapshot, opts)))
      } catch (error) {
        console.error(chalk.red('Error resetting usage:'), getErrorMessage(error))
        process.exitCode = 1
      }
    })
}

/**
 * summary command: print per-key usage from a snapshot
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { getErrorMessage } from '@callmeter/core'
import { openSnapshot, type SnapshotOptions } from '../utils/snapshot.js'
import { renderSummary } from '../utils/format.js'

export interface SummaryOptions extends SnapshotOptions {
  key?: string
  json?: boolean
}

export async function runSummary(snapshot: string, options: SummaryOptions = {}): Promise<string> {
  const tracker = await openSnapshot(snapshot, options)
  try {
    const report = tracker.summary(options.key)
    return options.json ? JSON.stringify(report, null, 2) : renderSummary(report)
  } finally {
    tracker.dispose()
  }
}

export function createSummaryCommand(): Command {
  return new Command('summary')
    .description('Show call counts and quotas recorded in a snapshot')
    .argument('<snapshot>', 'Snapshot file (.json or .db)')
    .option('-k, --key <apiKey>', 'Only report this api key')
    .option('--json', 'Print the report as JSON')
    .action(async (snapshot: string, opts: { key?: string; json?: boolean }) => {
      try {
        console.log(await runSummary(snapshot, opts))
      } catch (error) {
        console.error(chalk.red('Error reading snapshot:'), getErrorMessage(error))
        process.exitCode = 1
      }
    })
}

/**
 * check command: would the next call for a key be allowed?
 */

import { Command } from 'commander'
import chalk from 'chalk'
import { getErrorMessage, maskApiKey } from '@callmeter/core'
import { openSnapshot, type SnapshotOptions } from '../utils/snapshot.js'
import { renderDecision } from '../utils/format.js'

/** Exit code when the key is out of quota */
export const EXIT_OUT_OF_QUOTA = 2

export interface CheckResult {
  allowed: boolean
  output: string
}

export async function runCheck(
  snapshot: string,
  apiKey: string,
  options: SnapshotOptions & { operation?: string } = {}
): Promise<CheckResult> {
  const tracker = await openSnapshot(snapshot, options)
  try {
    const decision = tracker.evaluateQuota(apiKey, options.operation)
    return { allowed: decision.allowed, output: renderDecision(maskApiKey(apiKey), decision) }
  } finally {
    tracker.dispose()
  }
}

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check whether an api key has quota left')
    .argument('<snapshot>', 'Snapshot file')
    .argument('<apiKey>', 'Api key to check')
    .option('-o, --operation <name>', 'Count only calls to this operation')
    .action(async (snapshot: string, apiKey: string, opts: { operation?: string }) => {
      try {
        const result = await runCheck(snapshot, apiKey, opts)
        console.log(result.output)
        if (!result.allowed) {
          process.exitCode = EXIT_OUT_OF_QUOTA
        }
      } catch (error) {
        console.error(chalk.red('Error checking quota:'), getErrorMessage(error))
        process.exitCode = 1
      }
    })
}

/**
 * @callmeter/cli
 *
 * Commands for inspecting and editing callmeter snapshots. The `callmeter`
 * executable is `cli.ts`.
 */

import { Command } from 'commander'
import { VERSION } from '@callmeter/core'
import {
  createSummaryCommand,
  createQuotaCommand,
  createCheckCommand,
  createPruneCommand,
  createResetCommand,
} from './commands/index.js'

export function createProgram(): Command {
  return new Command()
    .name('callmeter')
    .description('Inspect and edit API call accounting snapshots')
    .version(VERSION)
    .addCommand(createSummaryCommand())
    .addCommand(createQuotaCommand())
    .addCommand(createCheckCommand())
    .addCommand(createPruneCommand())
    .addCommand(createResetCommand())
}

export { runSummary } from './commands/summary.js'
export { runQuotaSet, runQuotaClear, parseQuotaFlags } from './commands/quota.js'
export { runCheck, EXIT_OUT_OF_QUOTA } from './commands/check.js'
export { runPrune, runReset } from './commands/maintenance.js'

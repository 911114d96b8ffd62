/**
 * CLI Commands
 *
 * Export all CLI commands for registration.
 */

export { createSummaryCommand } from './summary.js'
export { createQuotaCommand } from './quota.js'
export { createCheckCommand } from './check.js'
export { createPruneCommand, createResetCommand } from './maintenance.js'

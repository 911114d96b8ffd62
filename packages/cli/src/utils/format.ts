/**
 * Output formatting for usage reports
 */

import chalk from 'chalk'
import Table from 'cli-table3'
import type { AggregateCount, QuotaDecision, QuotaLimit, UsageReport } from '@callmeter/core'

/**
 * One-line rendering of a key's limits, e.g. `60s: 10, 24h: 500`
 */
export function formatQuota(limit: QuotaLimit | undefined): string {
  if (!limit) return 'none'
  const parts: string[] = []
  if (limit.calls60s !== undefined) parts.push(`60s: ${limit.calls60s}`)
  if (limit.calls24h !== undefined) parts.push(`24h: ${limit.calls24h}`)
  if (limit.totalCap !== undefined) parts.push(`total: ${limit.totalCap}`)
  return parts.length > 0 ? parts.join(', ') : 'unlimited'
}

function countCells(counts: AggregateCount): string[] {
  return [String(counts.total), String(counts.last60s), String(counts.last24h)]
}

/**
 * Render a usage report as a table
 */
export function renderSummary(report: UsageReport): string {
  if (report.keys.length === 0) {
    return chalk.yellow('No usage recorded.')
  }

  const table = new Table({
    head: [
      chalk.bold('Key'),
      chalk.bold('Operation'),
      chalk.bold('Total'),
      chalk.bold('Last 60s'),
      chalk.bold('Last 24h'),
      chalk.bold('Quota'),
    ],
  })

  for (const entry of report.keys) {
    table.push([
      chalk.cyan(entry.apiKey),
      chalk.dim('(all)'),
      ...countCells(entry.totals),
      formatQuota(entry.quota),
    ])
    for (const [operation, counts] of Object.entries(entry.operations)) {
      table.push(['', operation, ...countCells(counts), ''])
    }
  }

  const lines = [table.toString(), chalk.dim(`Generated at ${report.generatedAt}`)]
  return lines.join('\n')
}

/**
 * Render the result of a quota check
 */
export function renderDecision(maskedKey: string, decision: QuotaDecision): string {
  const usage = `total ${decision.counts.total}, 60s ${decision.counts.last60s}, 24h ${decision.counts.last24h}`
  if (decision.violation) {
    const { quotaType, current, limit } = decision.violation
    return chalk.red(`Out of quota for ${maskedKey}: ${quotaType} at ${current}/${limit}`)
  }
  return `${chalk.green(`Within quota for ${maskedKey}`)} (${usage}; limits: ${formatQuota(decision.limit)})`
}

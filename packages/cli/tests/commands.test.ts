/**
 * CLI command tests
 *
 * Commands run against snapshots in a temp directory with a manual clock.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, existsSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { Command } from 'commander'
import {
  AccountingTracker,
  ManualClock,
  PersistenceError,
  QuotaConfigurationError,
  SqliteSnapshotStore,
  WINDOW_24H_MS,
} from '@callmeter/core'
import { createProgram } from '../src/index.js'
import { runSummary } from '../src/commands/summary.js'
import { runQuotaSet, runQuotaClear, parseQuotaFlags } from '../src/commands/quota.js'
import { runCheck } from '../src/commands/check.js'
import { runPrune, runReset } from '../src/commands/maintenance.js'
import { storeKindForPath } from '../src/utils/snapshot.js'
import { formatQuota } from '../src/utils/format.js'

const T0 = Date.parse('2024-03-01T12:00:00.000Z')
const KEY = 'cli-test-key-0001'
const MASKED = 'cli-****0001'

describe('callmeter CLI', () => {
  let dir: string
  let clock: ManualClock
  let snapshot: string
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'callmeter-cli-'))
    clock = new ManualClock(T0)
    snapshot = join(dir, 'usage.json')
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  async function seed(setup: (tracker: AccountingTracker) => void, path = snapshot): Promise<void> {
    const tracker = new AccountingTracker({ clock })
    tracker.start()
    setup(tracker)
    await tracker.save(path)
  }

  async function reopen(path = snapshot): Promise<AccountingTracker> {
    const tracker = new AccountingTracker({ clock })
    await tracker.load(path)
    return tracker
  }

  describe('createProgram', () => {
    it('registers every command', () => {
      const program = createProgram()

      expect(program).toBeInstanceOf(Command)
      expect(program.name()).toBe('callmeter')
      expect(program.commands.map((c) => c.name())).toEqual([
        'summary',
        'quota',
        'check',
        'prune',
        'reset',
      ])
    })

    it('has set and clear quota subcommands', () => {
      const quota = createProgram().commands.find((c) => c.name() === 'quota')
      expect(quota?.commands.map((c) => c.name())).toEqual(['set', 'clear'])

      const set = quota?.commands.find((c) => c.name() === 'set')
      expect(set?.options.map((o) => o.long)).toEqual(['--per-minute', '--per-day', '--total'])
    })
  })

  describe('quota set', () => {
    it('creates a snapshot when the file is missing', async () => {
      const output = await runQuotaSet(snapshot, KEY, { perMinute: '10', perDay: '500' }, { clock, env: {} })

      expect(output).toBe(`Quota for ${MASKED} set to 60s: 10, 24h: 500`)
      expect(existsSync(snapshot)).toBe(true)
      expect((await reopen()).getQuota(KEY)).toEqual({ calls60s: 10, calls24h: 500 })
    })

    it('replaces limits and keeps recorded usage', async () => {
      await seed((tracker) => {
        tracker.enableQuota(KEY, { calls60s: 1 })
        tracker.recordCall(KEY, 'Get_Quote')
      })

      await runQuotaSet(snapshot, KEY, { total: '100' }, { clock, env: {} })

      const tracker = await reopen()
      expect(tracker.getQuota(KEY)).toEqual({ totalCap: 100 })
      expect(tracker.count(KEY).total).toBe(1)
    })

    it('writes SQLite snapshots for .db paths', async () => {
      const path = join(dir, 'usage.db')

      await runQuotaSet(path, KEY, { perDay: '50' }, { clock, env: {} })

      const tracker = new AccountingTracker({ clock, store: new SqliteSnapshotStore() })
      await tracker.load(path)
      expect(tracker.getQuota(KEY)).toEqual({ calls24h: 50 })
    })

    it('requires at least one limit', async () => {
      await expect(runQuotaSet(snapshot, KEY, {}, { clock, env: {} })).rejects.toThrow(
        'At least one limit is required (--per-minute, --per-day or --total)'
      )
      expect(existsSync(snapshot)).toBe(false)
    })

    it('rejects invalid limits without writing', async () => {
      await expect(
        runQuotaSet(snapshot, KEY, { perMinute: '-3' }, { clock, env: {} })
      ).rejects.toBeInstanceOf(QuotaConfigurationError)
      expect(existsSync(snapshot)).toBe(false)
    })
  })

  describe('quota clear', () => {
    it('removes a configured quota', async () => {
      await seed((tracker) => tracker.enableQuota(KEY, { calls60s: 5 }))

      expect(await runQuotaClear(snapshot, KEY, { clock, env: {} })).toBe(
        `Quota for ${MASKED} cleared`
      )
      expect((await reopen()).getQuota(KEY)).toBeUndefined()
    })

    it('reports keys without a quota', async () => {
      await seed(() => {})

      expect(await runQuotaClear(snapshot, KEY, { clock, env: {} })).toBe(
        `No quota configured for ${MASKED}`
      )
    })
  })

  describe('summary', () => {
    it('prints the report as JSON', async () => {
      await seed((tracker) => {
        tracker.enableQuota(KEY, { calls60s: 10 })
        tracker.recordCall(KEY, 'Get_Quote')
        tracker.recordCall(KEY, 'Get_Quote')
      })

      const output = await runSummary(snapshot, { json: true, clock, env: {} })

      expect(JSON.parse(output)).toEqual({
        generatedAt: '2024-03-01T12:00:00.000Z',
        keys: [
          {
            apiKey: MASKED,
            totals: { total: 2, last60s: 2, last24h: 2 },
            operations: { Get_Quote: { total: 2, last60s: 2, last24h: 2 } },
            quota: { calls60s: 10 },
          },
        ],
      })
    })

    it('renders a table with masked keys and quotas', async () => {
      await seed((tracker) => {
        tracker.enableQuota(KEY, { calls60s: 10, totalCap: 900 })
        tracker.recordCall(KEY, 'List_Exchange')
      })

      const output = await runSummary(snapshot, { clock, env: {} })

      expect(output).toContain(MASKED)
      expect(output).toContain('List_Exchange')
      expect(output).toContain('60s: 10, total: 900')
      expect(output).toContain('Generated at 2024-03-01T12:00:00.000Z')
      expect(output).not.toContain(KEY)
    })

    it('reports an empty snapshot', async () => {
      await seed(() => {})

      expect(await runSummary(snapshot, { clock, env: {} })).toContain('No usage recorded.')
    })

    it('fails for a missing snapshot without logging it twice', async () => {
      await expect(
        runSummary(join(dir, 'missing.json'), { clock, env: {} })
      ).rejects.toBeInstanceOf(PersistenceError)
      expect(consoleErrorSpy).not.toHaveBeenCalled()
    })
  })

  describe('check', () => {
    beforeEach(async () => {
      await seed((tracker) => {
        tracker.enableQuota(KEY, { calls60s: 2 })
        tracker.recordCall(KEY, 'Get_Quote')
        tracker.recordCall(KEY, 'Get_Quote')
      })
    })

    it('reports an exhausted key', async () => {
      const result = await runCheck(snapshot, KEY, { clock, env: {} })

      expect(result.allowed).toBe(false)
      expect(result.output).toContain(`Out of quota for ${MASKED}: calls_60s at 2/2`)
    })

    it('allows the key once the window has passed', async () => {
      clock.advance(60_001)

      const result = await runCheck(snapshot, KEY, { clock, env: {} })

      expect(result.allowed).toBe(true)
      expect(result.output).toContain(`Within quota for ${MASKED}`)
      expect(result.output).toContain('(total 2, 60s 0, 24h 2; limits: 60s: 2)')
    })

    it('scopes counts to one operation', async () => {
      const result = await runCheck(snapshot, KEY, { operation: 'List_Exchange', clock, env: {} })

      expect(result.allowed).toBe(true)
      expect(result.output).toContain('(total 0, 60s 0, 24h 0; limits: 60s: 2)')
    })
  })

  describe('prune and reset', () => {
    it('prunes expired records and keeps lifetime totals', async () => {
      await seed((tracker) => {
        tracker.recordCall(KEY, 'Get_Quote')
        tracker.recordCall(KEY, 'List_Exchange')
      })
      clock.advance(WINDOW_24H_MS + 1)

      expect(await runPrune(snapshot, { clock, env: {} })).toBe('Pruned 2 expired call record(s)')

      const tracker = await reopen()
      expect(tracker.count(KEY)).toEqual({ total: 2, last60s: 0, last24h: 0 })
    })

    it('resets one key and keeps its quota', async () => {
      await seed((tracker) => {
        tracker.enableQuota(KEY, { calls24h: 3 })
        tracker.recordCall(KEY, 'Get_Quote')
        tracker.recordCall('other-cli-key-99', 'Get_Quote')
      })

      expect(await runReset(snapshot, { key: KEY, clock, env: {} })).toBe(
        `Usage reset for ${MASKED}`
      )

      const tracker = await reopen()
      expect(tracker.count(KEY).total).toBe(0)
      expect(tracker.count('other-cli-key-99').total).toBe(1)
      expect(tracker.getQuota(KEY)).toEqual({ calls24h: 3 })
    })

    it('resets every key', async () => {
      await seed((tracker) => {
        tracker.recordCall(KEY, 'Get_Quote')
        tracker.recordCall('other-cli-key-99', 'Get_Quote')
      })

      expect(await runReset(snapshot, { clock, env: {} })).toBe('Usage reset for all keys')
      expect((await reopen()).summary().keys).toEqual([])
    })
  })

  describe('helpers', () => {
    it('picks the store from the file extension', () => {
      expect(storeKindForPath('/tmp/a.db', 'json')).toBe('sqlite')
      expect(storeKindForPath('/tmp/a.SQLITE', 'json')).toBe('sqlite')
      expect(storeKindForPath('/tmp/a.json', 'sqlite')).toBe('json')
      expect(storeKindForPath('/tmp/snapshot', 'sqlite')).toBe('sqlite')
    })

    it('parses quota flags', () => {
      expect(parseQuotaFlags({ perMinute: '5', total: '20' })).toEqual({ calls60s: 5, totalCap: 20 })
      expect(parseQuotaFlags({})).toEqual({})
    })

    it('formats limits', () => {
      expect(formatQuota(undefined)).toBe('none')
      expect(formatQuota({})).toBe('unlimited')
      expect(formatQuota({ calls60s: 1, calls24h: 2, totalCap: 3 })).toBe('60s: 1, 24h: 2, total: 3')
    })
  })
})

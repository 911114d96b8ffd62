/**
 * Call Ledger Tests
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { CallLedger } from '../src/accounting/CallLedger.js'
import { ManualClock } from '../src/accounting/clock.js'
import { WINDOW_24H_MS, WINDOW_60S_MS } from '../src/accounting/constants.js'
import { LedgerOrderError } from '../src/errors/index.js'

const T0 = Date.parse('2024-03-01T12:00:00.000Z')
const KEY = 'ledger-test-key'

describe('CallLedger', () => {
  let clock: ManualClock
  let ledger: CallLedger

  beforeEach(() => {
    clock = new ManualClock(T0)
    ledger = new CallLedger(clock)
  })

  function appendAt(timestamp: number, operation: string, apiKey = KEY): void {
    ledger.append({ timestamp, apiKey, operation })
  }

  describe('Counting', () => {
    it('should return an all-zero aggregate for an unknown key', () => {
      expect(ledger.count('nobody')).toEqual({ total: 0, last60s: 0, last24h: 0 })
      expect(ledger.count('nobody', 'Get_Quote', '60s')).toEqual({
        total: 0,
        last60s: 0,
        last24h: 0,
      })
    })

    it('should aggregate across operations and per operation', () => {
      appendAt(T0, 'Get_Quote')
      appendAt(T0, 'Get_Quote')
      appendAt(T0, 'Get_Quote')
      appendAt(T0, 'List_Exchange')
      appendAt(T0, 'List_Exchange')

      expect(ledger.count(KEY)).toEqual({ total: 5, last60s: 5, last24h: 5 })
      expect(ledger.count(KEY, 'Get_Quote')).toEqual({ total: 3, last60s: 3, last24h: 3 })
      expect(ledger.count(KEY, 'List_Exchange')).toEqual({ total: 2, last60s: 2, last24h: 2 })
      expect(ledger.count(KEY, 'Unknown_Op')).toEqual({ total: 0, last60s: 0, last24h: 0 })
    })

    it('should keep keys independent', () => {
      appendAt(T0, 'Get_Quote', 'key-a')
      appendAt(T0, 'Get_Quote', 'key-b')
      appendAt(T0, 'Get_Quote', 'key-b')

      expect(ledger.count('key-a').total).toBe(1)
      expect(ledger.count('key-b').total).toBe(2)
    })

    it('should use the requested window for total', () => {
      appendAt(T0, 'Get_Quote')
      clock.advance(2 * WINDOW_60S_MS)
      appendAt(clock.now(), 'Get_Quote')

      expect(ledger.count(KEY, undefined, '60s').total).toBe(1)
      expect(ledger.count(KEY, undefined, '24h').total).toBe(2)
      expect(ledger.count(KEY, undefined, 'all').total).toBe(2)
    })
  })

  describe('Window boundaries', () => {
    it('should include a record exactly at now - 60s', () => {
      appendAt(T0, 'Get_Quote')

      clock.set(T0 + WINDOW_60S_MS)
      expect(ledger.count(KEY).last60s).toBe(1)

      clock.set(T0 + WINDOW_60S_MS + 1)
      expect(ledger.count(KEY).last60s).toBe(0)
      expect(ledger.count(KEY).last24h).toBe(1)
    })

    it('should include a record exactly at now - 24h and exclude it afterwards', () => {
      appendAt(T0, 'Get_Quote')

      clock.set(T0 + WINDOW_24H_MS)
      expect(ledger.count(KEY).last24h).toBe(1)

      clock.set(T0 + WINDOW_24H_MS + 1)
      expect(ledger.count(KEY)).toEqual({ total: 1, last60s: 0, last24h: 0 })
    })

    it('should keep 60s <= 24h <= all for every operation', () => {
      const operations = ['Get_Quote', 'List_Exchange', 'Get_Symbol']
      for (let i = 0; i < 30; i++) {
        appendAt(clock.now(), operations[i % operations.length] ?? 'Get_Quote')
        clock.advance(i % 2 === 0 ? 7_000 : 3_600_000)
      }

      for (const operation of [undefined, ...operations]) {
        const minute = ledger.count(KEY, operation, '60s').total
        const day = ledger.count(KEY, operation, '24h').total
        const all = ledger.count(KEY, operation, 'all').total
        expect(minute).toBeLessThanOrEqual(day)
        expect(day).toBeLessThanOrEqual(all)
        if (operation !== undefined) {
          expect(all).toBeLessThanOrEqual(ledger.count(KEY, undefined, 'all').total)
        }
      }
    })
  })

  describe('Ordering', () => {
    it('should reject a record older than the newest one', () => {
      appendAt(T0 + 1000, 'Get_Quote')
      expect(() => appendAt(T0, 'Get_Quote')).toThrow(LedgerOrderError)
      expect(ledger.size).toBe(1)
    })

    it('should accept records with equal timestamps', () => {
      appendAt(T0, 'Get_Quote')
      appendAt(T0, 'Get_Quote')
      expect(ledger.size).toBe(2)
      expect(ledger.latestTimestamp).toBe(T0)
    })

    it('should return frozen records', () => {
      const record = ledger.append({ timestamp: T0, apiKey: KEY, operation: 'Get_Quote' })
      expect(Object.isFrozen(record)).toBe(true)
    })
  })

  describe('Pruning', () => {
    it('should remove records older than 24h but keep lifetime totals', () => {
      appendAt(T0, 'Get_Quote')
      appendAt(T0 + 1000, 'Get_Quote')
      clock.set(T0 + WINDOW_24H_MS + 500)

      expect(ledger.prune()).toBe(1)
      expect(ledger.size).toBe(1)
      expect(ledger.count(KEY)).toEqual({ total: 2, last60s: 0, last24h: 1 })
      expect(ledger.operations(KEY)).toEqual(['Get_Quote'])
    })

    it('should clamp a cutoff that would remove records still in a window', () => {
      appendAt(T0, 'Get_Quote')
      clock.set(T0 + 1000)

      expect(ledger.prune(T0 + 999_999)).toBe(0)
      expect(ledger.size).toBe(1)
    })

    it('should accept an older cutoff than the 24h floor', () => {
      appendAt(T0, 'Get_Quote')
      appendAt(T0 + 10_000, 'List_Exchange')
      clock.set(T0 + 3 * WINDOW_24H_MS)

      expect(ledger.prune(T0 + 5_000)).toBe(1)
      expect(ledger.getRecords()).toEqual([
        { timestamp: T0 + 10_000, apiKey: KEY, operation: 'List_Exchange' },
      ])
    })

    it('should be a no-op on an empty ledger', () => {
      expect(ledger.prune()).toBe(0)
    })
  })

  describe('Clearing', () => {
    it('should clear a single key', () => {
      appendAt(T0, 'Get_Quote', 'key-a')
      appendAt(T0, 'Get_Quote', 'key-b')

      ledger.clear('key-a')

      expect(ledger.count('key-a')).toEqual({ total: 0, last60s: 0, last24h: 0 })
      expect(ledger.count('key-b').total).toBe(1)
      expect(ledger.keys()).toEqual(['key-b'])
      expect(ledger.size).toBe(1)
    })

    it('should clear every key', () => {
      appendAt(T0, 'Get_Quote', 'key-a')
      appendAt(T0, 'Get_Quote', 'key-b')

      ledger.clear()

      expect(ledger.keys()).toEqual([])
      expect(ledger.size).toBe(0)
    })
  })

  describe('Inspection and restore', () => {
    it('should list keys, operations and totals sorted', () => {
      appendAt(T0, 'List_Exchange', 'key-b')
      appendAt(T0, 'Get_Quote', 'key-b')
      appendAt(T0, 'Get_Quote', 'key-a')

      expect(ledger.keys()).toEqual(['key-a', 'key-b'])
      expect(ledger.operations('key-b')).toEqual(['Get_Quote', 'List_Exchange'])
      expect(ledger.getTotals()).toEqual([
        { apiKey: 'key-a', operation: 'Get_Quote', count: 1 },
        { apiKey: 'key-b', operation: 'Get_Quote', count: 1 },
        { apiKey: 'key-b', operation: 'List_Exchange', count: 1 },
      ])
    })

    it('should restore records and totals', () => {
      const restored = CallLedger.restore(
        clock,
        [
          { timestamp: T0 - 10_000, apiKey: KEY, operation: 'Get_Quote' },
          { timestamp: T0 - 5_000, apiKey: KEY, operation: 'Get_Quote' },
        ],
        [{ apiKey: KEY, operation: 'Get_Quote', count: 7 }]
      )

      expect(restored.count(KEY)).toEqual({ total: 7, last60s: 2, last24h: 2 })
      expect(restored.latestTimestamp).toBe(T0 - 5_000)
      expect(() =>
        restored.append({ timestamp: T0 - 6_000, apiKey: KEY, operation: 'Get_Quote' })
      ).toThrow(LedgerOrderError)
    })
  })
})

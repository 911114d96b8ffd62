/**
 * Clock abstraction so tests can drive synthetic time.
 */

export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number
}

/**
 * Wall-clock time from `Date.now()`
 */
export const systemClock: Clock = {
  now: () => Date.now(),
}

/**
 * Clock that only moves when told to
 *
 * @example
 * ```typescript
 * const clock = new ManualClock(Date.parse('2024-01-01T00:00:00Z'))
 * const tracker = new AccountingTracker({ clock })
 * clock.advance(61_000)
 * ```
 */
export class ManualClock implements Clock {
  private current: number

  constructor(start = 0) {
    this.current = start
  }

  now(): number {
    return this.current
  }

  set(timestamp: number): void {
    this.current = timestamp
  }

  advance(ms: number): void {
    this.current += ms
  }
}

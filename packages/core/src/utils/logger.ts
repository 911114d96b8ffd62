/**
 * Logger Utility
 *
 * Namespaced console logging for callmeter. Output is gated per entry:
 * - an instance `level` option wins when set (the tracker's `debug` switch uses it)
 * - otherwise DEBUG/INFO need the DEBUG variable, WARN is muted under NODE_ENV=test,
 *   and LOG_LEVEL (0-3) sets the floor for the rest
 * - LOG_FORMAT=json switches to one JSON object per line
 *
 * Entries that pass the gate are also kept in a bounded in-memory aggregator.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogEntry {
  level: LogLevel
  timestamp: string
  namespace: string
  message: string
  context?: Record<string, unknown>
  error?: Error
}

/**
 * Receives every emitted entry in addition to the console
 */
export interface LogAggregator {
  add(entry: LogEntry): void
  getLogs(): LogEntry[]
  clear(): void
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, error?: Error, context?: Record<string, unknown>): void
}

export interface LoggerOptions {
  /** Minimum level for this instance; overrides DEBUG and LOG_LEVEL */
  level?: LogLevel
}

/** Entries kept by the default aggregator */
export const DEFAULT_LOG_CAPACITY = 1000

/**
 * Fixed-size ring: once full, each new entry overwrites the oldest
 */
class RingLogAggregator implements LogAggregator {
  private slots: Array<LogEntry | undefined>
  private head = 0
  private length = 0

  constructor(private readonly capacity: number) {
    this.slots = new Array<LogEntry | undefined>(capacity)
  }

  add(entry: LogEntry): void {
    this.slots[(this.head + this.length) % this.capacity] = entry
    if (this.length < this.capacity) {
      this.length++
    } else {
      this.head = (this.head + 1) % this.capacity
    }
  }

  getLogs(): LogEntry[] {
    const out: LogEntry[] = []
    for (let i = 0; i < this.length; i++) {
      const entry = this.slots[(this.head + i) % this.capacity]
      if (entry) out.push(entry)
    }
    return out
  }

  clear(): void {
    this.slots = new Array<LogEntry | undefined>(this.capacity)
    this.head = 0
    this.length = 0
  }
}

let aggregator: LogAggregator = new RingLogAggregator(DEFAULT_LOG_CAPACITY)

export function setLogAggregator(next: LogAggregator): void {
  aggregator = next
}

export function getLogAggregator(): LogAggregator {
  return aggregator
}

function isEnabled(level: LogLevel, options: LoggerOptions): boolean {
  if (options.level !== undefined) {
    return level >= options.level
  }
  const env = process.env
  if (level <= LogLevel.INFO) {
    return Boolean(env.DEBUG)
  }
  if (level === LogLevel.WARN && env.NODE_ENV === 'test') {
    return false
  }
  const floor = env.LOG_LEVEL ? Number.parseInt(env.LOG_LEVEL, 10) : LogLevel.WARN
  return level >= floor
}

function render(entry: LogEntry, json: boolean): string {
  if (json) {
    return JSON.stringify({
      level: LogLevel[entry.level],
      timestamp: entry.timestamp,
      namespace: entry.namespace,
      message: entry.message,
      context: entry.context,
      error: entry.error ? { message: entry.error.message, stack: entry.error.stack } : undefined,
    })
  }
  const context = entry.context ? ` ${JSON.stringify(entry.context)}` : ''
  return `[callmeter:${entry.namespace}] ${entry.message}${context}`
}

function write(level: LogLevel, line: string): void {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line)
      break
    case LogLevel.INFO:
      console.info(line)
      break
    case LogLevel.WARN:
      console.warn(line)
      break
    case LogLevel.ERROR:
      console.error(line)
      break
  }
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly namespace: string,
    private readonly options: LoggerOptions
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, context)
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, message, context, error)
  }

  private emit(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!isEnabled(level, this.options)) {
      return
    }
    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      namespace: this.namespace,
      message,
      context,
      error,
    }
    aggregator.add(entry)

    const json = process.env.LOG_FORMAT === 'json'
    write(level, render(entry, json))
    if (error && !json) {
      console.error(error)
    }
  }
}

/**
 * Create a namespaced logger
 *
 * @example
 * ```typescript
 * const log = createLogger('AccountingTracker', { level: LogLevel.DEBUG })
 * log.debug('Recorded call', { operation: 'Get_Quote' })
 * ```
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(namespace, options)
}

/**
 * Logger that discards everything. Pass it as a tracker's `logger` when the
 * caller reports failures itself.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}

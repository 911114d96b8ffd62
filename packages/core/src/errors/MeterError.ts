/**
 * callmeter Error Classes
 *
 * Typed errors with cause chaining. Every failure the accounting engine reports
 * to its caller is one of these, so callers can branch on `code` or `instanceof`.
 */

import type { QuotaType } from '../accounting/types.js'

/**
 * Base error class for all callmeter errors.
 */
export class MeterError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Additional context about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    options?: {
      code?: string
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'MeterError'
    this.code = options?.code ?? 'METER_ERROR'
    this.context = options?.context

    Error.captureStackTrace?.(this, this.constructor)
  }

  /**
   * Get the full error chain as an array
   */
  getErrorChain(): Error[] {
    const chain: Error[] = [this]
    let current: unknown = this.cause

    while (current instanceof Error) {
      chain.push(current)
      current = current.cause
    }

    return chain
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    }
  }
}

/**
 * Recording attempted while the tracker is stopped. Recover by calling `start()`.
 */
export class AccountingInactiveError extends MeterError {
  constructor(operation: string) {
    super(`Accounting is not running; call start() before recording '${operation}'`, {
      code: 'ACCOUNTING_INACTIVE',
      context: { operation },
    })
    this.name = 'AccountingInactiveError'
  }
}

/**
 * A configured quota threshold has been reached.
 */
export class OutOfQuotaError extends MeterError {
  readonly quotaType: QuotaType
  readonly current: number
  readonly limit: number

  constructor(options: {
    quotaType: QuotaType
    current: number
    limit: number
    maskedKey: string
    operation?: string
  }) {
    const scope = options.operation ? ` for operation '${options.operation}'` : ''
    super(
      `Quota '${options.quotaType}' exhausted for key ${options.maskedKey}${scope} (${options.current}/${options.limit})`,
      {
        code: 'OUT_OF_QUOTA',
        context: {
          quotaType: options.quotaType,
          current: options.current,
          limit: options.limit,
          apiKey: options.maskedKey,
          operation: options.operation,
        },
      }
    )
    this.name = 'OutOfQuotaError'
    this.quotaType = options.quotaType
    this.current = options.current
    this.limit = options.limit
  }
}

/**
 * Snapshot save/load failure (I/O or format).
 */
export class PersistenceError extends MeterError {
  readonly path?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      path?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'PERSISTENCE_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        path: options?.path,
      },
    })
    this.name = 'PersistenceError'
    this.path = options?.path
  }
}

/**
 * Invalid quota limits passed to `enable()`.
 */
export class QuotaConfigurationError extends MeterError {
  readonly field?: string

  constructor(
    message: string,
    options?: {
      cause?: unknown
      field?: string
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'QUOTA_CONFIGURATION_ERROR',
      cause: options?.cause,
      context: {
        ...options?.context,
        field: options?.field,
      },
    })
    this.name = 'QuotaConfigurationError'
    this.field = options?.field
  }
}

/**
 * A record was appended with a timestamp earlier than the ledger's newest record.
 */
export class LedgerOrderError extends MeterError {
  constructor(timestamp: number, latest: number) {
    super(`Call record at ${timestamp} is older than the latest ledger entry at ${latest}`, {
      code: 'LEDGER_ORDER_ERROR',
      context: { timestamp, latest },
    })
    this.name = 'LedgerOrderError'
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends MeterError {
  constructor(
    message: string,
    options?: {
      cause?: unknown
      context?: Record<string, unknown>
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      cause: options?.cause,
      context: options?.context,
    })
    this.name = 'ConfigurationError'
  }
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

export function isMeterError(error: unknown): error is MeterError {
  return error instanceof MeterError
}

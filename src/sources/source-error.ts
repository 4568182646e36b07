/**
 * Errors raised by metadata source implementations
 * @module sources/source-error
 */

import { MetamergeError } from '../utils/errors.js'

/**
 * Error types a source call can fail with. Used for retry eligibility.
 */
export type SourceErrorType = 'timeout' | 'network' | 'server' | 'rejected' | 'unknown'

/**
 * Base error class for failures inside a metadata source
 */
export class SourceError extends MetamergeError {
  /** Name of the failing source */
  public readonly sourceName: string

  /** Error type for categorization */
  public readonly type: SourceErrorType

  /** Whether this error is eligible for retry */
  public readonly retryable: boolean

  constructor(
    sourceName: string,
    message: string,
    code: string,
    type: SourceErrorType,
    retryable: boolean,
    context?: Record<string, unknown>
  ) {
    super(message, code, { sourceName, ...context })
    this.name = 'SourceError'
    this.sourceName = sourceName
    this.type = type
    this.retryable = retryable
  }
}

/**
 * Error thrown when a source call times out
 */
export class SourceTimeoutError extends SourceError {
  /** Timeout duration in milliseconds */
  public readonly timeoutMs: number

  constructor(
    sourceName: string,
    timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(
      sourceName,
      `Source '${sourceName}' timed out after ${timeoutMs}ms`,
      'SOURCE_TIMEOUT',
      'timeout',
      true, // Timeouts are retryable
      { timeoutMs, ...context }
    )
    this.name = 'SourceTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * Error thrown when a network error occurs during a source call
 */
export class SourceNetworkError extends SourceError {
  constructor(
    sourceName: string,
    message: string,
    cause?: Error,
    context?: Record<string, unknown>
  ) {
    super(
      sourceName,
      `Network error in source '${sourceName}': ${message}`,
      'SOURCE_NETWORK_ERROR',
      'network',
      true,
      { originalMessage: message, ...context }
    )
    this.name = 'SourceNetworkError'
    this.cause = cause
  }
}

/**
 * Error thrown when the provider answers with a server-side failure
 */
export class SourceServerError extends SourceError {
  /** HTTP status code if applicable */
  public readonly statusCode?: number

  constructor(
    sourceName: string,
    message: string,
    statusCode?: number,
    context?: Record<string, unknown>
  ) {
    const statusInfo = statusCode ? ` (HTTP ${statusCode})` : ''
    super(
      sourceName,
      `Server error in source '${sourceName}'${statusInfo}: ${message}`,
      'SOURCE_SERVER_ERROR',
      'server',
      true,
      { statusCode, originalMessage: message, ...context }
    )
    this.name = 'SourceServerError'
    this.statusCode = statusCode
  }
}

/**
 * Checks if an error is a SourceError
 */
export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError
}

/**
 * Checks if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof SourceError && error.retryable
}

/**
 * Creates a SourceError from an unknown thrown value
 */
export function toSourceError(error: unknown, sourceName: string): SourceError {
  if (error instanceof SourceError) {
    return error
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase()

    if (message.includes('timeout') || message.includes('timed out')) {
      return new SourceTimeoutError(sourceName, 0, {
        originalError: error.message,
      })
    }

    if (
      message.includes('network') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('enotfound')
    ) {
      return new SourceNetworkError(sourceName, error.message, error)
    }

    return new SourceError(
      sourceName,
      `Source '${sourceName}' error: ${error.message}`,
      'SOURCE_ERROR',
      'unknown',
      false,
      { originalError: error.message }
    )
  }

  return new SourceError(
    sourceName,
    `Source '${sourceName}' error: ${String(error)}`,
    'SOURCE_ERROR',
    'unknown',
    false,
    { originalError: String(error) }
  )
}

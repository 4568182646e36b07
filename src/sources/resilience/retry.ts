/**
 * Retry with exponential backoff for source calls
 * @module sources/resilience/retry
 */

import { isRetryableError, isSourceError } from '../source-error.js'
import type { SourceErrorType } from '../source-error.js'
import { toError } from '../../utils/errors.js'

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of attempts, including the first */
  maxAttempts: number

  /** Delay before the first retry in milliseconds */
  initialDelayMs: number

  /** Multiplier applied to the delay after each attempt */
  backoffMultiplier: number

  /** Upper bound on any single delay */
  maxDelayMs: number

  /** Error types eligible for retry, or 'all' */
  retryOn?: Array<SourceErrorType | 'all'>
}

/**
 * Retry configuration plus a hook run before each retry
 */
export interface RetryOptions extends RetryConfig {
  /** Called before each retry attempt */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 100,
  backoffMultiplier: 2,
  maxDelayMs: 5000,
  retryOn: ['timeout', 'network', 'server'],
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Calculate delay with exponential backoff and jitter
 *
 * @param attempt - Current attempt number (1-based)
 */
export function calculateRetryDelay(attempt: number, config: RetryConfig): number {
  let delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1)

  delay = Math.min(delay, config.maxDelayMs)

  // Add jitter (±20%)
  const jitter = delay * 0.2 * (Math.random() * 2 - 1)
  return Math.max(0, Math.round(delay + jitter))
}

/**
 * Determine if an error should be retried based on configuration
 */
export function shouldRetryError(error: Error, config: RetryConfig): boolean {
  if (!isRetryableError(error) || !isSourceError(error)) {
    return false
  }

  const retryOn = config.retryOn ?? ['timeout', 'network', 'server']
  return retryOn.includes('all') || retryOn.includes(error.type)
}

/**
 * Wraps an async function with retry logic
 *
 * @throws The last error if all retries fail
 *
 * @example
 * ```typescript
 * const candidates = await withRetry(
 *   () => source.search(query),
 *   { maxAttempts: 3, initialDelayMs: 100, backoffMultiplier: 2, maxDelayMs: 5000 }
 * )
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryOptions,
): Promise<T> {
  let attempt = 1

  for (;;) {
    try {
      return await fn()
    } catch (error) {
      const lastError = toError(error)

      if (attempt >= config.maxAttempts) {
        throw lastError
      }

      if (!shouldRetryError(lastError, config)) {
        throw lastError
      }

      const delay = calculateRetryDelay(attempt, config)
      config.onRetry?.(lastError, attempt, delay)
      await sleep(delay)
      attempt++
    }
  }
}

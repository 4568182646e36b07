/**
 * Timeout utility for bounding source calls
 * @module sources/resilience/timeout
 */

import { SourceTimeoutError } from '../source-error.js'
import { InvalidParameterError } from '../../utils/errors.js'

/** Timer ID type for cross-environment compatibility */
type TimerId = ReturnType<typeof setTimeout>

/**
 * Options for the timeout wrapper
 */
export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  timeoutMs: number

  /** Source name for error messages */
  sourceName?: string
}

/**
 * Wraps a promise with a timeout
 *
 * @throws {SourceTimeoutError} If the timeout is exceeded
 *
 * @example
 * ```typescript
 * const candidates = await withTimeout(source.search(query), {
 *   timeoutMs: 5000,
 *   sourceName: source.name,
 * })
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const { timeoutMs, sourceName = 'unknown' } = options

  if (timeoutMs <= 0) {
    throw new InvalidParameterError('timeoutMs', timeoutMs, 'must be positive (> 0)')
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false
    let timeoutId: TimerId | undefined

    const settle = (fn: () => void) => {
      if (settled) return
      settled = true
      if (timeoutId !== undefined) clearTimeout(timeoutId)
      fn()
    }

    timeoutId = setTimeout(
      () => settle(() => reject(new SourceTimeoutError(sourceName, timeoutMs))),
      timeoutMs
    )

    promise.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error))
    )
  })
}

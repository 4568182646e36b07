/**
 * Resilience for metadata source calls
 * @module sources/resilience
 *
 * The merge pipeline imposes no timeout of its own: a source opts into
 * bounded calls by being wrapped with `withResilience()`.
 *
 * @example
 * ```typescript
 * const bounded = withResilience(catalogSource, {
 *   timeoutMs: 5000,
 *   retry: { maxAttempts: 3 },
 * })
 * registry.register(bounded)
 * ```
 */

import type { MetadataSource, SourceQuery } from '../types.js'
import type { Candidate } from '../../types/candidate.js'
import type { Entity } from '../../types/entity.js'
import type { Logger } from '../../utils/logger.js'
import { withTimeout } from './timeout.js'
import { toSourceError } from '../source-error.js'
import { withRetry, DEFAULT_RETRY_CONFIG } from './retry.js'
import type { RetryConfig } from './retry.js'

export { withTimeout, type TimeoutOptions } from './timeout.js'
export {
  withRetry,
  calculateRetryDelay,
  shouldRetryError,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type RetryOptions,
} from './retry.js'

/**
 * Options for `withResilience`
 */
export interface ResilienceOptions {
  /** Per-attempt timeout in milliseconds */
  timeoutMs?: number

  /** Retry settings; omitted fields take the defaults */
  retry?: Partial<RetryConfig>

  /** Receives a warning before each retry */
  logger?: Logger
}

/**
 * Returns a source whose lookups and searches are bounded by a timeout and
 * retried on transient failures. Anything the source throws surfaces as a
 * SourceError. Name and capabilities are unchanged.
 */
export function withResilience(
  source: MetadataSource,
  options: ResilienceOptions
): MetadataSource {
  const { timeoutMs, retry, logger } = options

  const guard = <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
    const attempt = async (): Promise<T> => {
      try {
        return await (timeoutMs === undefined
          ? fn()
          : withTimeout(fn(), { timeoutMs, sourceName: source.name }))
      } catch (error) {
        throw toSourceError(error, source.name)
      }
    }

    if (!retry) return attempt()

    return withRetry(attempt, {
      ...DEFAULT_RETRY_CONFIG,
      ...retry,
      onRetry: (error, attemptNumber, delayMs) =>
        logger?.warn(`Retrying ${operation} on source '${source.name}'`, {
          attempt: attemptNumber,
          delayMs,
          error: error.message,
        }),
    })
  }

  const { lookupById, search } = source

  const wrapped: MetadataSource = {
    name: source.name,
    capabilities: source.capabilities,
  }

  if (lookupById) {
    wrapped.lookupById = (id: string, entity: Entity): Promise<Candidate | null> =>
      guard('lookupById', () => lookupById.call(source, id, entity))
  }
  if (search) {
    wrapped.search = (query: SourceQuery): Promise<Candidate[]> =>
      guard('search', () => search.call(source, query))
  }

  return wrapped
}

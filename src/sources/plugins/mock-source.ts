/**
 * Mock metadata source
 * Configurable in-process source for testing and development
 * @module sources/plugins/mock-source
 */

import type { MetadataSource, SourceCapabilities, SourceQuery } from '../types.js'
import type { Candidate } from '../../types/candidate.js'
import type { Entity } from '../../types/entity.js'
import { SourceNetworkError, SourceServerError, SourceTimeoutError } from '../source-error.js'

export type MockOperation = 'lookupById' | 'search'

/**
 * Configuration for the mock source
 */
export interface MockSourceConfig {
  /** Source name */
  name?: string

  /** Candidates served by id lookup, keyed by id */
  records?: Record<string, Candidate>

  /** Search results, or a function computing them from the query */
  searchResults?: Candidate[] | ((query: SourceQuery) => Candidate[])

  /** Fields the source owns under the split strategy */
  ownedFields?: string[]

  /** Entity field holding this source's identifier */
  idField?: string

  /** Capability overrides (both operations are enabled by default) */
  capabilities?: Partial<Pick<SourceCapabilities, 'lookupById' | 'search'>>

  /** Simulated latency in milliseconds */
  latencyMs?: number

  /** Simulated failure kind; every call fails while set */
  failureError?: 'network' | 'timeout' | 'server'

  /** Only fail this many calls, then succeed */
  failuresBeforeSuccess?: number

  /** Operations the simulated failure applies to (default: both) */
  failOn?: MockOperation[]
}

/**
 * Call history entry
 */
export interface MockSourceCallEntry {
  operation: MockOperation

  /** The id looked up, or the search query */
  input: string | SourceQuery

  timestamp: Date

  success: boolean

  /** Error message (if failure) */
  error?: string
}

/**
 * Mock source with call tracking
 *
 * @example
 * ```typescript
 * const spotify = createMockSource({
 *   name: 'spotify',
 *   idField: 'spotify_album_id',
 *   searchResults: [{ id: 'X', fields: { album: 'Abbey Road', albumartist: 'The Beatles' } }],
 * })
 *
 * registry.register(spotify)
 * // ... run ...
 * expect(spotify.getCallCount('search')).toBe(1)
 * ```
 */
export interface MockSource extends MetadataSource {
  /** Get call history */
  getCallHistory(): MockSourceCallEntry[]

  /** Get number of calls, optionally for one operation */
  getCallCount(operation?: MockOperation): number

  /** Clear call history and failure counters */
  reset(): void

  /** Change or clear the simulated failure */
  setFailure(failureError: MockSourceConfig['failureError'], failuresBeforeSuccess?: number): void
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Create a mock source
 */
export function createMockSource(config: MockSourceConfig = {}): MockSource {
  const name = config.name ?? 'mock'
  const failOn = config.failOn ?? ['lookupById', 'search']
  const callHistory: MockSourceCallEntry[] = []
  let failureError = config.failureError
  let failuresRemaining = config.failuresBeforeSuccess
  let failuresServed = 0

  const capabilities: SourceCapabilities = {
    lookupById: config.capabilities?.lookupById ?? true,
    search: config.capabilities?.search ?? true,
    ownedFields: config.ownedFields ?? (config.idField ? [config.idField] : []),
    idField: config.idField,
  }

  const simulateFailure = (operation: MockOperation): Error | undefined => {
    if (!failureError || !failOn.includes(operation)) return undefined
    if (failuresRemaining !== undefined && failuresServed >= failuresRemaining) return undefined
    failuresServed++

    switch (failureError) {
      case 'timeout':
        return new SourceTimeoutError(name, config.latencyMs ?? 0)
      case 'server':
        return new SourceServerError(name, 'Simulated server error', 500)
      case 'network':
      default:
        return new SourceNetworkError(name, 'Simulated network failure')
    }
  }

  const call = async <T>(
    operation: MockOperation,
    input: string | SourceQuery,
    produce: () => T
  ): Promise<T> => {
    const timestamp = new Date()
    if (config.latencyMs && config.latencyMs > 0) {
      await sleep(config.latencyMs)
    }

    const failure = simulateFailure(operation)
    if (failure) {
      callHistory.push({ operation, input, timestamp, success: false, error: failure.message })
      throw failure
    }

    const result = produce()
    callHistory.push({ operation, input, timestamp, success: true })
    return result
  }

  const source: MockSource = {
    name,
    capabilities,

    getCallHistory: () => [...callHistory],

    getCallCount: (operation?: MockOperation) =>
      operation === undefined
        ? callHistory.length
        : callHistory.filter((entry) => entry.operation === operation).length,

    reset: () => {
      callHistory.length = 0
      failuresServed = 0
    },

    setFailure: (error, failuresBeforeSuccess) => {
      failureError = error
      failuresRemaining = failuresBeforeSuccess
      failuresServed = 0
    },
  }

  if (capabilities.lookupById) {
    source.lookupById = (id: string, _entity: Entity) =>
      call('lookupById', id, () => config.records?.[id] ?? null)
  }

  if (capabilities.search) {
    source.search = (query: SourceQuery) =>
      call('search', query, () => {
        const results = config.searchResults
        if (typeof results === 'function') return results(query)
        return results ? [...results] : []
      })
  }

  return source
}

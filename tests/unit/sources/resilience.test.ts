import { describe, it, expect, vi } from 'vitest'
import {
  withResilience,
  withRetry,
  withTimeout,
  calculateRetryDelay,
  shouldRetryError,
} from '../../../src/sources/resilience/index.js'
import { createMockSource } from '../../../src/sources/plugins/mock-source.js'
import { SourceError, SourceNetworkError, SourceTimeoutError } from '../../../src/sources/source-error.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'
import type { Logger } from '../../../src/utils/logger.js'

const query = { kind: 'album' as const, fields: {}, text: 'abbey road' }
const fastRetry = { maxAttempts: 3, initialDelayMs: 1, backoffMultiplier: 1, maxDelayMs: 1 }

describe('Resilience', () => {
  describe('withTimeout', () => {
    it('resolves when the promise settles in time', async () => {
      await expect(withTimeout(Promise.resolve('ok'), { timeoutMs: 100 })).resolves.toBe('ok')
    })

    it('rejects with SourceTimeoutError when the deadline passes', async () => {
      const slow = new Promise((resolve) => setTimeout(resolve, 200))
      await expect(withTimeout(slow, { timeoutMs: 10, sourceName: 'spotify' })).rejects.toThrow(
        "Source 'spotify' timed out after 10ms"
      )
    })

    it('rejects a non-positive timeout', async () => {
      await expect(withTimeout(Promise.resolve(1), { timeoutMs: 0 })).rejects.toBeInstanceOf(
        InvalidParameterError
      )
    })
  })

  describe('withRetry', () => {
    it('retries retryable errors until success', async () => {
      const fn = vi
        .fn<[], Promise<string>>()
        .mockRejectedValueOnce(new SourceTimeoutError('s', 5))
        .mockResolvedValueOnce('done')

      await expect(withRetry(fn, fastRetry)).resolves.toBe('done')
      expect(fn).toHaveBeenCalledTimes(2)
    })

    it('does not retry non-retryable errors', async () => {
      const fn = vi
        .fn<[], Promise<string>>()
        .mockRejectedValue(new SourceError('s', 'bad request', 'SOURCE_ERROR', 'rejected', false))

      await expect(withRetry(fn, fastRetry)).rejects.toThrow('bad request')
      expect(fn).toHaveBeenCalledTimes(1)
    })

    it('reports each retry to onRetry and stops on an unlisted error type', async () => {
      const onRetry = vi.fn()
      const fn = vi
        .fn<[], Promise<string>>()
        .mockRejectedValueOnce(new SourceNetworkError('s', 'reset'))
        .mockRejectedValueOnce(new SourceTimeoutError('s', 5))
        .mockResolvedValueOnce('done')

      await expect(withRetry(fn, { ...fastRetry, retryOn: ['network'], onRetry })).rejects.toBeInstanceOf(
        SourceTimeoutError
      )
      expect(fn).toHaveBeenCalledTimes(2)
      expect(onRetry).toHaveBeenCalledTimes(1)
      expect(onRetry.mock.calls[0][1]).toBe(1)
    })

    it('gives up after maxAttempts', async () => {
      const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new SourceTimeoutError('s', 5))

      await expect(withRetry(fn, fastRetry)).rejects.toBeInstanceOf(SourceTimeoutError)
      expect(fn).toHaveBeenCalledTimes(3)
    })
  })

  describe('shouldRetryError', () => {
    it('retries only the error types listed in retryOn', () => {
      const config = { ...fastRetry, retryOn: ['network' as const] }

      expect(shouldRetryError(new SourceNetworkError('s', 'reset'), config)).toBe(true)
      expect(shouldRetryError(new SourceTimeoutError('s', 5), config)).toBe(false)
      expect(shouldRetryError(new SourceTimeoutError('s', 5), { ...fastRetry, retryOn: ['all'] })).toBe(true)
    })

    it('never retries plain errors', () => {
      expect(shouldRetryError(new Error('boom'), { ...fastRetry, retryOn: ['all'] })).toBe(false)
    })
  })

  describe('calculateRetryDelay', () => {
    it('stays within jitter bounds and the maximum', () => {
      const config = { maxAttempts: 5, initialDelayMs: 100, backoffMultiplier: 2, maxDelayMs: 300 }
      const second = calculateRetryDelay(2, config)
      expect(second).toBeGreaterThanOrEqual(160)
      expect(second).toBeLessThanOrEqual(240)
      expect(calculateRetryDelay(4, config)).toBeLessThanOrEqual(360)
    })
  })

  describe('withResilience', () => {
    it('keeps the name and capabilities', () => {
      const source = createMockSource({ name: 'spotify', idField: 'spotify_album_id' })
      const wrapped = withResilience(source, { timeoutMs: 100 })

      expect(wrapped.name).toBe('spotify')
      expect(wrapped.capabilities).toBe(source.capabilities)
    })

    it('retries failing searches and logs each retry', async () => {
      const source = createMockSource({ failureError: 'network', failuresBeforeSuccess: 2, searchResults: [] })
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
      const wrapped = withResilience(source, { retry: fastRetry, logger })

      await expect(wrapped.search?.(query)).resolves.toEqual([])
      expect(source.getCallCount('search')).toBe(3)
      expect(logger.warn).toHaveBeenCalledTimes(2)
    })

    it('converts other errors to non-retryable SourceErrors', async () => {
      const search = vi.fn(async () => {
        throw new Error('malformed response')
      })
      const wrapped = withResilience(
        { name: 'broken', capabilities: { lookupById: false, search: true, ownedFields: [] }, search },
        { retry: fastRetry }
      )

      const error = await wrapped.search?.(query).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(SourceError)
      expect(error).toMatchObject({ sourceName: 'broken', retryable: false })
      expect(search).toHaveBeenCalledTimes(1)
    })

    it('bounds slow calls by the timeout', async () => {
      const source = createMockSource({ latencyMs: 200 })
      const wrapped = withResilience(source, { timeoutMs: 10 })

      await expect(wrapped.search?.(query)).rejects.toBeInstanceOf(SourceTimeoutError)
    })
  })
})

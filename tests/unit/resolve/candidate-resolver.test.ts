import { describe, it, expect, vi } from 'vitest'
import {
  CandidateResolver,
  buildSourceQuery,
  rankCandidates,
  storedSourceId,
} from '../../../src/resolve/candidate-resolver.js'
import type { CandidateSelector, Selection, SelectionRequest } from '../../../src/resolve/selector.js'
import { createSkippingSelector } from '../../../src/resolve/selector.js'
import {
  NoMatchError,
  SelectionAbortedError,
  SourceUnavailableError,
} from '../../../src/resolve/resolution-error.js'
import { createMockSource } from '../../../src/sources/plugins/mock-source.js'
import { createMergeConfig } from '../../../src/merge/validation.js'
import type { Candidate } from '../../../src/types/candidate.js'
import type { Entity } from '../../../src/types/entity.js'

const album: Entity = {
  id: 'al-1',
  kind: 'album',
  fields: { album: 'Abbey Road', albumartist: 'The Beatles' },
}

const exact: Candidate = {
  id: 'sp-1',
  fields: { album: 'Abbey Road', albumartist: 'The Beatles', label: 'Apple' },
}

// 0.125: title and artist match, duration only on the candidate
const close: Candidate = {
  id: 'sp-2',
  fields: { album: 'Abbey Road', albumartist: 'The Beatles', length: 2832 },
}

// 0.25: artist missing on the candidate
const distant: Candidate = { id: 'sp-3', fields: { album: 'Abbey Road' } }

function selectorAnswering(answer: (request: SelectionRequest) => Selection) {
  const select = vi.fn(async (request: SelectionRequest) => answer(request))
  const selector: CandidateSelector = { select }
  return { selector, select }
}

describe('CandidateResolver', () => {
  describe('storedSourceId', () => {
    const source = createMockSource({ name: 'spotify', idField: 'spotify_album_id' })

    it('prefers an explicit source id', () => {
      expect(
        storedSourceId(
          { ...album, fields: { spotify_album_id: 'field-id' }, sourceIds: { spotify: 'explicit-id' } },
          source
        )
      ).toBe('explicit-id')
    })

    it('falls back to the id field and ignores blank values', () => {
      expect(storedSourceId({ ...album, fields: { spotify_album_id: 'sp-9' } }, source)).toBe('sp-9')
      expect(storedSourceId({ ...album, fields: { spotify_album_id: ' ' } }, source)).toBeUndefined()
      expect(storedSourceId({ ...album, fields: { spotify_album_id: 77 } }, source)).toBe('77')
    })
  })

  describe('buildSourceQuery', () => {
    it('joins artist and title', () => {
      expect(buildSourceQuery(album).text).toBe('The Beatles Abbey Road')
      expect(
        buildSourceQuery({ id: 't-1', kind: 'track', fields: { title: 'Something', artist: 'The Beatles' } }).text
      ).toBe('The Beatles Something')
    })
  })

  describe('rankCandidates', () => {
    it('sorts by ascending distance and keeps source order on ties', () => {
      const twin: Candidate = { id: 'sp-1b', fields: { ...exact.fields } }
      const ranked = rankCandidates(album, [distant, exact, close, twin])

      expect(ranked.map((r) => r.candidate.id)).toEqual(['sp-1', 'sp-1b', 'sp-2', 'sp-3'])
      expect(ranked.map((r) => r.distance)).toEqual([0, 0, 0.125, 0.25])
    })
  })

  describe('resolve', () => {
    it('accepts a stored id through lookup without searching', async () => {
      const source = createMockSource({
        name: 'spotify',
        idField: 'spotify_album_id',
        records: { 'sp-9': { id: 'sp-9', fields: { album: 'Abbey Road' } } },
        searchResults: [exact],
      })
      const resolver = new CandidateResolver({ selector: createSkippingSelector() })
      const entity: Entity = { ...album, fields: { ...album.fields, spotify_album_id: 'sp-9' } }

      const accepted = await resolver.resolve(entity, source, createMergeConfig({ sources: ['spotify'] }))

      expect(accepted).toEqual({
        source: 'spotify',
        candidate: { id: 'sp-9', fields: { album: 'Abbey Road', spotify_album_id: 'sp-9' } },
        distance: 0,
        method: 'id-lookup',
      })
      expect(source.getCallCount('search')).toBe(0)
    })

    it('searches despite a stored id when forced', async () => {
      const source = createMockSource({
        name: 'spotify',
        idField: 'spotify_album_id',
        records: { 'sp-9': { id: 'sp-9', fields: {} } },
        searchResults: [exact],
      })
      const resolver = new CandidateResolver({ selector: createSkippingSelector() })
      const entity: Entity = { ...album, fields: { ...album.fields, spotify_album_id: 'sp-9' } }
      const config = createMergeConfig({ sources: ['spotify'], force: true, maxDistance: 0.2 })

      const accepted = await resolver.resolve(entity, source, config)

      expect(accepted.candidate.id).toBe('sp-1')
      expect(source.getCallCount('lookupById')).toBe(0)
      expect(source.getCallCount('search')).toBe(1)
    })

    it('falls back to search when the stored id is not found', async () => {
      const source = createMockSource({ name: 'spotify', idField: 'spotify_album_id', searchResults: [exact] })
      const resolver = new CandidateResolver({ selector: createSkippingSelector() })
      const entity: Entity = { ...album, fields: { ...album.fields, spotify_album_id: 'gone' } }

      const accepted = await resolver.resolve(entity, source, createMergeConfig({ sources: ['spotify'], maxDistance: 0.2 }))

      expect(accepted.method).toBe('automatic')
      expect(source.getCallCount('lookupById')).toBe(1)
      expect(source.getCallCount('search')).toBe(1)
    })

    it('accepts the best candidate automatically within maxDistance', async () => {
      const source = createMockSource({ name: 'spotify', idField: 'spotify_album_id', searchResults: [distant, close] })
      const { selector, select } = selectorAnswering(() => ({ action: 'skip' }))
      const resolver = new CandidateResolver({ selector })

      const accepted = await resolver.resolve(album, source, createMergeConfig({ sources: ['spotify'], maxDistance: 0.2 }))

      expect(accepted.method).toBe('automatic')
      expect(accepted.distance).toBeCloseTo(0.125)
      expect(accepted.candidate.fields.spotify_album_id).toBe('sp-2')
      expect(select).not.toHaveBeenCalled()
    })

    it('asks the selector when the best candidate is beyond maxDistance', async () => {
      const source = createMockSource({ name: 'spotify', searchResults: [distant] })
      const { selector, select } = selectorAnswering((request) => ({
        action: 'choose',
        candidate: request.candidates[0],
      }))
      const resolver = new CandidateResolver({ selector })

      const accepted = await resolver.resolve(album, source, createMergeConfig({ sources: ['spotify'], maxDistance: 0.2 }))

      expect(select).toHaveBeenCalledTimes(1)
      expect(accepted.method).toBe('manual')
      expect(accepted.distance).toBeCloseTo(0.25)
    })

    it('always asks when no maxDistance is configured, passing ranked candidates', async () => {
      const source = createMockSource({ name: 'spotify', searchResults: [distant, exact] })
      const { selector, select } = selectorAnswering((request) => ({
        action: 'choose',
        candidate: request.candidates[1],
      }))
      const resolver = new CandidateResolver({ selector })

      const accepted = await resolver.resolve(album, source, createMergeConfig({ sources: ['spotify'] }))

      const request = select.mock.calls[0][0]
      expect(request.source).toBe('spotify')
      expect(request.candidates.map((c) => c.candidate.id)).toEqual(['sp-1', 'sp-3'])
      expect(accepted.candidate.id).toBe('sp-3')
    })

    it('turns a skip into NoMatchError', async () => {
      const source = createMockSource({ name: 'spotify', searchResults: [distant] })
      const resolver = new CandidateResolver({ selector: createSkippingSelector() })

      await expect(
        resolver.resolve(album, source, createMergeConfig({ sources: ['spotify'] }))
      ).rejects.toThrow('skipped during selection')
    })

    it('turns an abort into SelectionAbortedError', async () => {
      const source = createMockSource({ name: 'spotify', searchResults: [distant] })
      const { selector } = selectorAnswering(() => ({ action: 'abort' }))
      const resolver = new CandidateResolver({ selector })

      await expect(
        resolver.resolve(album, source, createMergeConfig({ sources: ['spotify'] }))
      ).rejects.toBeInstanceOf(SelectionAbortedError)
    })

    it('reports an empty search as NoMatchError', async () => {
      const source = createMockSource({ name: 'spotify', searchResults: [] })
      const resolver = new CandidateResolver({ selector: createSkippingSelector() })

      const error = await resolver
        .resolve(album, source, createMergeConfig({ sources: ['spotify'] }))
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(NoMatchError)
      expect(error).toMatchObject({ code: 'NO_MATCH', sourceName: 'spotify', entityId: 'al-1' })
    })

    it('reports a source that cannot search as NoMatchError', async () => {
      const source = createMockSource({ name: 'spotify', capabilities: { search: false } })
      const resolver = new CandidateResolver({ selector: createSkippingSelector() })

      await expect(
        resolver.resolve(album, source, createMergeConfig({ sources: ['spotify'] }))
      ).rejects.toThrow('source cannot search')
    })

    it('wraps source errors in SourceUnavailableError', async () => {
      const source = createMockSource({ name: 'spotify', failureError: 'network' })
      const resolver = new CandidateResolver({ selector: createSkippingSelector() })

      await expect(
        resolver.resolve(album, source, createMergeConfig({ sources: ['spotify'] }))
      ).rejects.toBeInstanceOf(SourceUnavailableError)
    })

    it('removes excluded fields from the accepted candidate', async () => {
      const source = createMockSource({ name: 'spotify', idField: 'spotify_album_id', searchResults: [exact] })
      const resolver = new CandidateResolver({ selector: createSkippingSelector() })
      const config = createMergeConfig({
        sources: ['spotify'],
        maxDistance: 0.2,
        excludeFields: ['label', 'spotify_album_id'],
      })

      const accepted = await resolver.resolve(album, source, config)

      expect(accepted.candidate.fields).toEqual({ album: 'Abbey Road', albumartist: 'The Beatles' })
    })
  })
})

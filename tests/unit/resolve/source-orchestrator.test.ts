import { describe, it, expect } from 'vitest'
import { SourceOrchestrator } from '../../../src/resolve/source-orchestrator.js'
import { CandidateResolver } from '../../../src/resolve/candidate-resolver.js'
import { createSkippingSelector } from '../../../src/resolve/selector.js'
import {
  NoMatchError,
  NoMetadataFoundError,
  SelectionAbortedError,
  SourceUnavailableError,
} from '../../../src/resolve/resolution-error.js'
import { createMockSource } from '../../../src/sources/plugins/mock-source.js'
import type { MetadataSource } from '../../../src/sources/types.js'
import { createMergeConfig } from '../../../src/merge/validation.js'
import { ConfigurationError } from '../../../src/utils/errors.js'
import type { Entity } from '../../../src/types/entity.js'

const album: Entity = {
  id: 'al-1',
  kind: 'album',
  fields: { album: 'Abbey Road', albumartist: 'The Beatles' },
}

const match = { id: 'c-1', fields: { album: 'Abbey Road', albumartist: 'The Beatles', year: 1969 } }

function sourcesOf(...sources: MetadataSource[]): Map<string, MetadataSource> {
  return new Map(sources.map((source) => [source.name, source]))
}

describe('SourceOrchestrator', () => {
  const orchestrator = new SourceOrchestrator(new CandidateResolver({ selector: createSkippingSelector() }))

  it('collects accepted candidates and per-source failures', async () => {
    const sources = sourcesOf(
      createMockSource({ name: 'spotify', searchResults: [] }),
      createMockSource({ name: 'musicbrainz', searchResults: [match] }),
      createMockSource({ name: 'discogs', failureError: 'server' })
    )
    const config = createMergeConfig({ sources: ['spotify', 'musicbrainz', 'discogs'], maxDistance: 0.1 })

    const result = await orchestrator.gather(album, sources, config)

    expect([...result.accepted.keys()]).toEqual(['musicbrainz'])
    expect(result.failures).toHaveLength(2)
    expect(result.failures[0]).toBeInstanceOf(NoMatchError)
    expect(result.failures[1]).toBeInstanceOf(SourceUnavailableError)
  })

  it('queries only the configured sources, in configured order', async () => {
    const spotify = createMockSource({ name: 'spotify', searchResults: [match] })
    const musicbrainz = createMockSource({ name: 'musicbrainz', searchResults: [match] })
    const config = createMergeConfig({ sources: ['musicbrainz'], maxDistance: 0.1 })

    const result = await orchestrator.gather(album, sourcesOf(spotify, musicbrainz), config)

    expect([...result.accepted.keys()]).toEqual(['musicbrainz'])
    expect(spotify.getCallCount()).toBe(0)
  })

  it('throws NoMetadataFoundError when every source fails', async () => {
    const sources = sourcesOf(
      createMockSource({ name: 'spotify', searchResults: [] }),
      createMockSource({ name: 'musicbrainz', failureError: 'network' })
    )
    const config = createMergeConfig({ sources: ['spotify', 'musicbrainz'] })

    const error = await orchestrator.gather(album, sources, config).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(NoMetadataFoundError)
    if (error instanceof NoMetadataFoundError) {
      expect(error.failures.map((f) => f.sourceName)).toEqual(['spotify', 'musicbrainz'])
      expect(error.hadSourceErrors).toBe(true)
    }
  })

  it('propagates an abort', async () => {
    const aborting = new SourceOrchestrator(
      new CandidateResolver({ selector: { select: async () => ({ action: 'abort' }) } })
    )
    const sources = sourcesOf(createMockSource({ name: 'spotify', searchResults: [match] }))

    await expect(
      aborting.gather(album, sources, createMergeConfig({ sources: ['spotify'] }))
    ).rejects.toBeInstanceOf(SelectionAbortedError)
  })

  it('rejects a configured source missing from the available sources', async () => {
    await expect(
      orchestrator.gather(album, sourcesOf(), createMergeConfig({ sources: ['spotify'] }))
    ).rejects.toBeInstanceOf(ConfigurationError)
  })
})

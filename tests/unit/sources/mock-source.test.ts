import { describe, it, expect } from 'vitest'
import { createMockSource } from '../../../src/sources/plugins/mock-source.js'
import { SourceNetworkError, SourceServerError } from '../../../src/sources/source-error.js'
import type { Entity } from '../../../src/types/entity.js'

const entity: Entity = { id: 'al-1', kind: 'album', fields: {} }
const query = { kind: 'album' as const, fields: {}, text: 'beatles abbey road' }

describe('MockSource', () => {
  it('serves records by id and null for unknown ids', async () => {
    const source = createMockSource({
      records: { 'sp-1': { id: 'sp-1', fields: { album: 'Abbey Road' } } },
    })

    expect(await source.lookupById?.('sp-1', entity)).toEqual({ id: 'sp-1', fields: { album: 'Abbey Road' } })
    expect(await source.lookupById?.('sp-2', entity)).toBeNull()
  })

  it('computes search results from the query', async () => {
    const source = createMockSource({
      searchResults: (q) => [{ id: q.text, fields: {} }],
    })
    expect(await source.search?.(query)).toEqual([{ id: 'beatles abbey road', fields: {} }])
  })

  it('tracks calls per operation', async () => {
    const source = createMockSource({ searchResults: [] })
    await source.search?.(query)
    await source.search?.(query)
    await source.lookupById?.('x', entity)

    expect(source.getCallCount()).toBe(3)
    expect(source.getCallCount('search')).toBe(2)
    expect(source.getCallHistory()[2]).toMatchObject({ operation: 'lookupById', input: 'x', success: true })

    source.reset()
    expect(source.getCallCount()).toBe(0)
  })

  it('fails a limited number of times', async () => {
    const source = createMockSource({ failureError: 'network', failuresBeforeSuccess: 1 })

    await expect(source.search?.(query)).rejects.toBeInstanceOf(SourceNetworkError)
    await expect(source.search?.(query)).resolves.toEqual([])
  })

  it('restricts failures to the configured operations', async () => {
    const source = createMockSource({ failureError: 'server', failOn: ['search'] })

    await expect(source.lookupById?.('x', entity)).resolves.toBeNull()
    await expect(source.search?.(query)).rejects.toBeInstanceOf(SourceServerError)
  })

  it('omits operations whose capability is disabled', () => {
    const source = createMockSource({ capabilities: { search: false } })
    expect(source.search).toBeUndefined()
    expect(source.capabilities.search).toBe(false)
  })

  it('owns its id field by default', () => {
    const source = createMockSource({ idField: 'discogs_albumid' })
    expect(source.capabilities.ownedFields).toEqual(['discogs_albumid'])
  })
})

import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'url'
import {
  createCatalogSource,
  loadCatalogSource,
  parseCatalog,
} from '../../../src/sources/plugins/catalog-source.js'
import { ConfigurationError, InvalidParameterError } from '../../../src/utils/errors.js'
import type { Entity } from '../../../src/types/entity.js'

const fixture = fileURLToPath(new URL('../../fixtures/catalog.json', import.meta.url))
const entity: Entity = { id: 'al-1', kind: 'album', fields: {} }

describe('CatalogSource', () => {
  it('looks up entries by id', async () => {
    const source = await loadCatalogSource(fixture)
    const candidate = await source.lookupById?.('dg-101', entity)

    expect(candidate?.fields.album).toBe('Let It Be')
    expect(await source.lookupById?.('dg-999', entity)).toBeNull()
  })

  it('searches by shared tokens, most shared first, within the queried kind', async () => {
    const source = await loadCatalogSource(fixture)
    const results = await source.search?.({ kind: 'album', fields: {}, text: 'The Beatles Abbey Road' })

    expect(results?.map((c) => c.id)).toEqual(['dg-100', 'dg-101', 'dg-200'])
  })

  it('returns nothing for a query without tokens', async () => {
    const source = await loadCatalogSource(fixture)
    expect(await source.search?.({ kind: 'album', fields: {}, text: ' - ' })).toEqual([])
  })

  it('declares its id field as owned', async () => {
    const source = await loadCatalogSource(fixture)
    expect(source.name).toBe('discogs')
    expect(source.capabilities).toMatchObject({
      lookupById: true,
      search: true,
      idField: 'discogs_albumid',
      ownedFields: ['discogs_albumid'],
    })
  })

  it('uses the fallback name when the catalog has none', () => {
    const catalog = parseCatalog({ entries: [] }, 'local')
    expect(createCatalogSource(catalog).name).toBe('local')
  })

  it('rejects malformed entries', () => {
    expect(() => parseCatalog({ name: 'x', entries: [{ id: 'a', kind: 'single' }] })).toThrow(
      InvalidParameterError
    )
  })

  it('reports unreadable files as configuration errors', async () => {
    await expect(loadCatalogSource('/nonexistent/catalog.json')).rejects.toBeInstanceOf(ConfigurationError)
  })
})

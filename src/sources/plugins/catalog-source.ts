/**
 * Metadata source backed by a JSON catalog file
 * @module sources/plugins/catalog-source
 */

import { readFile } from 'fs/promises'
import type { MetadataSource, SourceQuery } from '../types.js'
import type { Candidate } from '../../types/candidate.js'
import type { EntityKind, FieldMap } from '../../types/entity.js'
import { tokenize } from '../../core/comparators.js'
import { parseFieldMap } from '../../utils/fields.js'
import {
  ConfigurationError,
  InvalidParameterError,
  isMetamergeError,
  requireNonNull,
  requireNonEmptyString,
  requireOneOf,
  requirePlainObject,
  toError,
} from '../../utils/errors.js'

/**
 * One release or recording in a catalog
 */
export interface CatalogEntry {
  id: string
  kind: EntityKind
  fields: FieldMap
}

/**
 * Parsed catalog file
 */
export interface Catalog {
  /** Source name the catalog is registered under */
  name: string

  /** Entity field storing this catalog's identifier */
  idField?: string

  /** Fields owned under the split strategy */
  ownedFields?: string[]

  entries: CatalogEntry[]
}

const SEARCH_FIELDS = ['album', 'title', 'name', 'albumartist', 'artist'] as const

const ENTITY_KINDS: readonly EntityKind[] = ['album', 'track']

/**
 * Validates a parsed catalog document
 *
 * @throws {InvalidParameterError} If the document is malformed
 */
export function parseCatalog(document: unknown, fallbackName?: string): Catalog {
  const root = requirePlainObject(document, 'catalog')
  const name = requireNonEmptyString(root.name ?? fallbackName, 'catalog.name')
  const idField =
    root.idField === undefined ? undefined : requireNonEmptyString(root.idField, 'catalog.idField')

  const ownedFields = Array.isArray(root.ownedFields)
    ? root.ownedFields.map((field, i) => requireNonEmptyString(field, `catalog.ownedFields[${i}]`))
    : undefined

  const rawEntries = requireNonNull(root.entries, 'catalog.entries')
  if (!Array.isArray(rawEntries)) {
    throw new InvalidParameterError('catalog.entries', rawEntries, 'must be an array')
  }
  const entries = rawEntries.map((raw, i): CatalogEntry => {
    const entry = requirePlainObject(raw, `catalog.entries[${i}]`)
    return {
      id: requireNonEmptyString(entry.id, `catalog.entries[${i}].id`),
      kind: requireOneOf(entry.kind ?? 'album', ENTITY_KINDS, `catalog.entries[${i}].kind`),
      fields: parseFieldMap(entry.fields ?? {}, `catalog.entries[${i}].fields`),
    }
  })

  return { name, idField, ownedFields, entries }
}

function entryTokens(entry: CatalogEntry): Set<string> {
  const tokens = new Set<string>()
  for (const field of SEARCH_FIELDS) {
    const value = entry.fields[field]
    if (value === undefined) continue
    for (const token of tokenize(Array.isArray(value) ? value.join(' ') : value)) {
      tokens.add(token)
    }
  }
  return tokens
}

function toCandidate(entry: CatalogEntry): Candidate {
  return { id: entry.id, fields: { ...entry.fields } }
}

/**
 * Creates a source serving lookups and searches from an in-memory catalog.
 *
 * Search returns the entries of the queried kind sharing at least one
 * normalized token with the query text, most shared tokens first.
 */
export function createCatalogSource(catalog: Catalog): MetadataSource {
  const byId = new Map(catalog.entries.map((entry) => [entry.id, entry]))
  const tokensById = new Map(catalog.entries.map((entry) => [entry.id, entryTokens(entry)]))

  return {
    name: catalog.name,
    capabilities: {
      lookupById: true,
      search: true,
      ownedFields: catalog.ownedFields ?? (catalog.idField ? [catalog.idField] : []),
      idField: catalog.idField,
    },

    async lookupById(id: string): Promise<Candidate | null> {
      const entry = byId.get(id)
      return entry ? toCandidate(entry) : null
    },

    async search(query: SourceQuery): Promise<Candidate[]> {
      const queryTokens = tokenize(query.text)
      if (queryTokens.size === 0) return []

      const ranked: Array<{ entry: CatalogEntry; shared: number }> = []
      for (const entry of catalog.entries) {
        if (entry.kind !== query.kind) continue
        const tokens = tokensById.get(entry.id) ?? new Set<string>()
        let shared = 0
        for (const token of queryTokens) {
          if (tokens.has(token)) shared++
        }
        if (shared > 0) ranked.push({ entry, shared })
      }

      return ranked
        .sort((a, b) => b.shared - a.shared)
        .map(({ entry }) => toCandidate(entry))
    },
  }
}

/**
 * Reads a catalog file and creates a source from it
 *
 * @param path - Path to the catalog JSON file
 * @param name - Source name used when the file does not declare one
 * @throws {ConfigurationError} If the file cannot be read or parsed
 */
export async function loadCatalogSource(path: string, name?: string): Promise<MetadataSource> {
  let document: unknown
  try {
    document = JSON.parse(await readFile(path, 'utf8'))
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read catalog '${path}': ${toError(error).message}`,
      'catalog',
      { path }
    )
  }

  try {
    return createCatalogSource(parseCatalog(document, name))
  } catch (error) {
    if (isMetamergeError(error)) {
      throw new ConfigurationError(`Invalid catalog '${path}': ${error.message}`, 'catalog', { path })
    }
    throw error
  }
}

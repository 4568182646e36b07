/**
 * Entity provider and persistence sink over a JSON library file
 * @module library/json-library
 */

import { readFile, writeFile } from 'fs/promises'
import type { Entity, EntityKind, FieldMap } from '../types/entity.js'
import type { MergeResult } from '../merge/types.js'
import type { EntityProvider, PersistenceSink } from '../run/types.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import { toFieldMap } from '../merge/to-field-map.js'
import { parseFieldMap } from '../utils/fields.js'
import {
  ConfigurationError,
  MetamergeError,
  requireNonEmptyString,
  requirePlainObject,
  toError,
} from '../utils/errors.js'
import { matchesQuery, parseQuery } from './query.js'

/**
 * A stored album or track
 */
export interface LibraryItem {
  id: string

  /** Owning album, for tracks */
  albumId?: string

  fields: FieldMap

  sourceIds?: Record<string, string>
}

/**
 * Library file contents
 */
export interface LibraryDocument {
  albums: LibraryItem[]
  tracks: LibraryItem[]
}

/**
 * Options for a JSON library
 */
export interface JsonLibraryOptions {
  /** Which collection queries select from (default: album) */
  kind?: EntityKind

  /** File written after every store; omitted for an in-memory library */
  path?: string

  /**
   * Fields copied from a stored album onto its tracks (typically every
   * source-specific identifier)
   */
  trackFields?: readonly string[]

  logger?: Logger
}

function parseSourceIds(value: unknown, name: string): Record<string, string> | undefined {
  if (value === undefined) return undefined
  const object = requirePlainObject(value, name)
  const ids: Record<string, string> = {}
  for (const [source, id] of Object.entries(object)) {
    ids[source] = requireNonEmptyString(id, `${name}.${source}`)
  }
  return ids
}

function parseItems(value: unknown, name: string): LibraryItem[] {
  if (value === undefined) return []
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`Library '${name}' must be an array`, name)
  }
  return value.map((raw, i): LibraryItem => {
    const item = requirePlainObject(raw, `${name}[${i}]`)
    return {
      id: requireNonEmptyString(item.id, `${name}[${i}].id`),
      albumId:
        item.albumId === undefined ? undefined : requireNonEmptyString(item.albumId, `${name}[${i}].albumId`),
      fields: parseFieldMap(item.fields ?? {}, `${name}[${i}].fields`),
      sourceIds: parseSourceIds(item.sourceIds, `${name}[${i}].sourceIds`),
    }
  })
}

/**
 * Validates a parsed library document
 *
 * @throws {MetamergeError} If the document is malformed
 */
export function parseLibrary(document: unknown): LibraryDocument {
  const root = requirePlainObject(document, 'library')
  return {
    albums: parseItems(root.albums, 'albums'),
    tracks: parseItems(root.tracks, 'tracks'),
  }
}

/**
 * JsonLibrary - serves entities matching a query and stores merged records
 * back into the document
 *
 * @example
 * ```typescript
 * const library = await JsonLibrary.load('library.json', { trackFields: ['spotify_album_id'] })
 * const albums = await library.entities('artist:beatles')
 * ```
 */
export class JsonLibrary implements EntityProvider, PersistenceSink {
  private readonly kind: EntityKind
  private readonly path?: string
  private readonly trackFields: readonly string[]
  private readonly logger: Logger

  constructor(
    private document: LibraryDocument,
    options: JsonLibraryOptions = {}
  ) {
    this.kind = options.kind ?? 'album'
    this.path = options.path
    this.trackFields = options.trackFields ?? []
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Reads a library file
   *
   * @throws {ConfigurationError} If the file cannot be read or is malformed
   */
  static async load(path: string, options: Omit<JsonLibraryOptions, 'path'> = {}): Promise<JsonLibrary> {
    let document: LibraryDocument
    try {
      document = parseLibrary(JSON.parse(await readFile(path, 'utf8')))
    } catch (error) {
      if (error instanceof ConfigurationError) throw error
      throw new ConfigurationError(
        `Cannot load library '${path}': ${toError(error).message}`,
        'library',
        { path }
      )
    }
    return new JsonLibrary(document, { ...options, path })
  }

  async entities(query: string): Promise<Entity[]> {
    const terms = parseQuery(query)
    return this.collection()
      .filter((item) => matchesQuery(item.fields, terms))
      .map((item) => ({
        id: item.id,
        kind: this.kind,
        fields: { ...item.fields },
        sourceIds: item.sourceIds ? { ...item.sourceIds } : undefined,
      }))
  }

  /**
   * Applies a merged record to a copy of the document and writes it. The
   * in-memory document only changes once the write succeeds.
   *
   * @throws {MetamergeError} If the entity is not in the library or the file cannot be written
   */
  async store(entity: Entity, result: MergeResult): Promise<void> {
    const next = structuredClone(this.document)
    const collection = entity.kind === 'album' ? next.albums : next.tracks
    const item = collection.find((candidate) => candidate.id === entity.id)
    if (!item) {
      throw new MetamergeError(`Entity '${entity.id}' is not in the library`, 'ENTITY_NOT_FOUND', {
        entityId: entity.id,
      })
    }

    const merged = toFieldMap(result)
    Object.assign(item.fields, merged)

    if (entity.kind === 'album') {
      const propagated: FieldMap = {}
      for (const field of this.trackFields) {
        const value = merged[field]
        if (value !== undefined) propagated[field] = value
      }
      if (Object.keys(propagated).length > 0) {
        const tracks = next.tracks.filter((track) => track.albumId === entity.id)
        for (const track of tracks) {
          Object.assign(track.fields, propagated)
        }
        this.logger.debug(`Copied ${Object.keys(propagated).length} field(s) to ${tracks.length} track(s)`, {
          albumId: entity.id,
        })
      }
    }

    await this.save(next)
    this.document = next
  }

  /** Current document, for inspection */
  snapshot(): LibraryDocument {
    return structuredClone(this.document)
  }

  private collection(): LibraryItem[] {
    return this.kind === 'album' ? this.document.albums : this.document.tracks
  }

  private async save(document: LibraryDocument): Promise<void> {
    if (!this.path) return
    try {
      await writeFile(this.path, JSON.stringify(document, null, 2) + '\n', 'utf8')
    } catch (error) {
      const cause = toError(error)
      throw new MetamergeError(`Cannot write library '${this.path}': ${cause.message}`, 'LIBRARY_WRITE_FAILED', {
        path: this.path,
      })
    }
  }
}

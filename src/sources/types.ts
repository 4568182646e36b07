/**
 * Metadata source contracts
 * @module sources/types
 */

import type { Candidate } from '../types/candidate.js'
import type { Entity, EntityKind, FieldMap } from '../types/entity.js'

/**
 * What a source can do, and which fields it is the canonical owner of
 */
export interface SourceCapabilities {
  /** Whether the source can fetch a candidate by its native identifier */
  lookupById: boolean

  /** Whether the source can search by the entity's known fields */
  search: boolean

  /**
   * Fields this source owns under the `split` strategy, typically its
   * identifier fields such as `spotify_album_id`
   */
  ownedFields: readonly string[]

  /**
   * Field holding this source's identifier on a library entity. The accepted
   * candidate's id is written to it, and a stored value is reused for id lookup.
   */
  idField?: string
}

/**
 * Query passed to a source's search
 */
export interface SourceQuery {
  kind: EntityKind

  /** The entity's currently known fields */
  fields: Readonly<FieldMap>

  /** Free-text form of the query: `<artist> <title>` */
  text: string
}

/**
 * An external metadata provider
 *
 * @example
 * ```typescript
 * const source: MetadataSource = {
 *   name: 'catalog',
 *   capabilities: { lookupById: true, search: true, ownedFields: ['catalog_id'], idField: 'catalog_id' },
 *   lookupById: async (id) => catalog.get(id) ?? null,
 *   search: async (query) => catalog.find(query.text),
 * }
 * ```
 */
export interface MetadataSource {
  /** Unique source name */
  readonly name: string

  readonly capabilities: SourceCapabilities

  /** Fetches at most one candidate by its native identifier */
  lookupById?(id: string, entity: Entity): Promise<Candidate | null>

  /** Returns zero or more candidates, ranked or unranked */
  search?(query: SourceQuery): Promise<Candidate[]>
}

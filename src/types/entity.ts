/**
 * A single scalar tag value
 */
export type FieldScalar = string | number | boolean

/**
 * A field value as stored on an entity or returned by a source.
 * Lists hold multi-valued tags such as genres.
 */
export type FieldValue = FieldScalar | FieldScalar[]

/**
 * Mapping of field name to value
 */
export type FieldMap = Record<string, FieldValue>

/**
 * Kind of library entity being enriched
 */
export type EntityKind = 'album' | 'track'

/**
 * An album or track from the host library.
 *
 * Owned by the caller: the pipeline reads it and proposes field updates,
 * it never mutates it.
 */
export interface Entity {
  /** Stable local identifier */
  readonly id: string

  /** Whether this is an album or a track */
  readonly kind: EntityKind

  /** Currently known field values */
  readonly fields: Readonly<FieldMap>

  /** Previously stored source identifiers, keyed by source name */
  readonly sourceIds?: Readonly<Record<string, string>>
}

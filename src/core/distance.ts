/**
 * Distance scoring between an entity and a candidate
 * @module core/distance
 */

import type { EntityKind, FieldMap, FieldValue } from '../types/entity.js'
import { levenshtein, normalizeText } from './comparators.js'

/**
 * Relative weight of each compared component
 */
export const DISTANCE_WEIGHTS = {
  title: 3,
  artist: 3,
  duration: 2,
} as const

/**
 * Distance contributed by a component that is missing or unparseable on either side
 */
export const MISSING_FIELD_PENALTY = 0.5

/** Duration differences up to this many seconds count as identical */
export const DURATION_GRACE_SECONDS = 10

/** Seconds past the grace period over which the duration distance grows to 1 */
export const DURATION_SPAN_SECONDS = 30

const TITLE_FIELDS: Record<EntityKind, readonly string[]> = {
  album: ['album', 'title', 'name'],
  track: ['title', 'name'],
}

const ARTIST_FIELDS: Record<EntityKind, readonly string[]> = {
  album: ['albumartist', 'artist'],
  track: ['artist', 'albumartist'],
}

const DURATION_FIELDS: readonly string[] = ['length', 'duration']

/**
 * Per-component distances behind a total
 */
export interface DistanceBreakdown {
  /** Weighted mean of the components, in [0, 1] */
  total: number
  title: number
  artist: number
  /** Absent when neither side carries a duration */
  duration?: number
}

/**
 * Returns the first present field among `names`. For list values the first
 * element is used, so a multi-artist tag compares by its primary artist.
 */
function pickField(fields: Readonly<FieldMap>, names: readonly string[]): FieldValue | undefined {
  for (const name of names) {
    const value = fields[name]
    if (value === undefined) continue
    if (Array.isArray(value)) {
      if (value.length > 0) return value[0]
      continue
    }
    return value
  }
  return undefined
}

function textDistance(a: FieldValue | undefined, b: FieldValue | undefined): number {
  const left = normalizeText(a)
  const right = normalizeText(b)
  if (left === '' || right === '') return MISSING_FIELD_PENALTY
  return 1 - levenshtein(left, right)
}

/**
 * Parses a duration given in seconds, or as `m:ss` / `h:mm:ss`
 *
 * @returns Seconds, or undefined when the value cannot be read as a duration
 */
export function parseDuration(value: FieldValue | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined
  }
  if (typeof value !== 'string') return undefined

  const text = value.trim()
  if (/^\d+(\.\d+)?$/.test(text)) return Number(text)

  const clock = /^(?:(\d+):)?(\d+):(\d{2})$/.exec(text)
  if (!clock) return undefined
  const hours = clock[1] ? Number(clock[1]) : 0
  return hours * 3600 + Number(clock[2]) * 60 + Number(clock[3])
}

function durationDistance(a: FieldValue | undefined, b: FieldValue | undefined): number | undefined {
  if (a === undefined && b === undefined) return undefined

  const left = parseDuration(a)
  const right = parseDuration(b)
  if (left === undefined || right === undefined) return MISSING_FIELD_PENALTY

  const excess = Math.abs(left - right) - DURATION_GRACE_SECONDS
  if (excess <= 0) return 0
  return Math.min(1, excess / DURATION_SPAN_SECONDS)
}

/**
 * Computes the distance between an entity's fields and a candidate's fields,
 * along with the component distances it was built from.
 */
export function computeDistance(
  entityFields: Readonly<FieldMap>,
  candidateFields: Readonly<FieldMap>,
  kind: EntityKind = 'album'
): DistanceBreakdown {
  const title = textDistance(
    pickField(entityFields, TITLE_FIELDS[kind]),
    pickField(candidateFields, TITLE_FIELDS[kind])
  )
  const artist = textDistance(
    pickField(entityFields, ARTIST_FIELDS[kind]),
    pickField(candidateFields, ARTIST_FIELDS[kind])
  )
  const duration = durationDistance(
    pickField(entityFields, DURATION_FIELDS),
    pickField(candidateFields, DURATION_FIELDS)
  )

  let weighted = title * DISTANCE_WEIGHTS.title + artist * DISTANCE_WEIGHTS.artist
  let totalWeight = DISTANCE_WEIGHTS.title + DISTANCE_WEIGHTS.artist
  if (duration !== undefined) {
    weighted += duration * DISTANCE_WEIGHTS.duration
    totalWeight += DISTANCE_WEIGHTS.duration
  }

  const total = Math.min(1, Math.max(0, weighted / totalWeight))
  return duration === undefined ? { total, title, artist } : { total, title, artist, duration }
}

/**
 * Normalized dissimilarity in [0, 1] between an entity and a candidate.
 * 0 means the compared fields are identical after normalization.
 *
 * Never throws: absent or unparseable fields raise the score instead.
 *
 * @example
 * ```typescript
 * scoreDistance(
 *   { album: 'Abbey Road', albumartist: 'The Beatles' },
 *   { album: 'abbey road', albumartist: 'The Beatles' }
 * ) // 0
 * ```
 */
export function scoreDistance(
  entityFields: Readonly<FieldMap>,
  candidateFields: Readonly<FieldMap>,
  kind: EntityKind = 'album'
): number {
  return computeDistance(entityFields, candidateFields, kind).total
}

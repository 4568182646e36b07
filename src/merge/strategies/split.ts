/**
 * Common/source-specific split merge strategy
 * @module merge/strategies/split
 */

import type { FieldProvenance, MergedFields, StrategyFunction } from '../types.js'
import { resolvePrimarySource } from '../validation.js'
import { valuesEqual } from '../../utils/fields.js'

/**
 * Partitions fields into source-specific ones (owned by any configured
 * source) and common ones (everything else).
 *
 * Source-specific fields are applied from every source that provides them;
 * when two sources provide the same one, the source processed last in
 * configured order wins. Common fields come only from the primary source:
 * other sources' values are discarded even when the primary lacks the field.
 *
 * @example
 * ```typescript
 * // sources: ['spotify', 'musicbrainz'], primary: 'musicbrainz'
 * // spotify: { artist: 'A', spotify_album_id: 'X' }
 * // musicbrainz: { artist: 'B', mb_albumid: 'Y', genre: 'Rock' }
 * // => { artist: 'B', spotify_album_id: 'X', mb_albumid: 'Y', genre: 'Rock' }
 * ```
 */
export const split: StrategyFunction = ({ config, contributions, ownedFields }) => {
  const primary = resolvePrimarySource(config)
  const specific = new Set(config.sources.flatMap((name) => [...ownedFields(name)]))

  const fields: MergedFields = {}
  const provenance: Record<string, FieldProvenance> = {}
  const discardedCommon = new Map<string, string[]>()

  for (const [source, contributed] of contributions) {
    for (const [field, value] of Object.entries(contributed)) {
      if (specific.has(field)) {
        const previous = provenance[field]
        const discarded = previous ? [...previous.discarded] : []
        if (previous && !valuesEqual(fields[field], value)) {
          discarded.push(...previous.sources)
        }
        fields[field] = value
        provenance[field] = { sources: [source], rule: 'source-specific', discarded }
      } else if (source === primary) {
        fields[field] = value
        provenance[field] = { sources: [source], rule: 'primary', discarded: [] }
      } else {
        const discarded = discardedCommon.get(field) ?? []
        discarded.push(source)
        discardedCommon.set(field, discarded)
      }
    }
  }

  for (const [field, sources] of discardedCommon) {
    const entry = provenance[field]
    if (entry) entry.discarded.push(...sources)
  }

  return { fields, provenance }
}

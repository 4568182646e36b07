/**
 * Priority merge strategy
 * @module merge/strategies/priority
 */

import type { FieldProvenance, MergedFields, StrategyFunction } from '../types.js'
import { valuesEqual } from '../../utils/fields.js'

/**
 * Each field takes its value from the earliest configured source that
 * provides it. Later sources never override an earlier one.
 *
 * @example
 * ```typescript
 * // sources: ['musicbrainz', 'spotify']
 * // musicbrainz: { artist: 'B' }, spotify: { artist: 'A', label: 'L' }
 * // => { artist: 'B', label: 'L' }
 * ```
 */
export const priority: StrategyFunction = ({ contributions }) => {
  const fields: MergedFields = {}
  const provenance: Record<string, FieldProvenance> = {}

  for (const [source, contributed] of contributions) {
    for (const [field, value] of Object.entries(contributed)) {
      const existing = provenance[field]
      if (!existing) {
        fields[field] = value
        provenance[field] = { sources: [source], rule: 'priority', discarded: [] }
      } else if (!valuesEqual(fields[field], value)) {
        existing.discarded.push(source)
      }
    }
  }

  return { fields, provenance }
}

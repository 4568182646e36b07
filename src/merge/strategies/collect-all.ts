/**
 * Collect-all merge strategy
 * @module merge/strategies/collect-all
 */

import type { FieldValue } from '../../types/entity.js'
import type { FieldProvenance, MergedFields, StrategyFunction } from '../types.js'
import { valuesEqual } from '../../utils/fields.js'

/**
 * Each field becomes the sequence of distinct values provided across all
 * sources, in first-seen order. Flattening is left to the consumer.
 *
 * @example
 * ```typescript
 * // genre: 'Rock' from a, 'Pop' from b, 'Rock' from c
 * // => { genre: ['Rock', 'Pop'] }
 * ```
 */
export const collectAll: StrategyFunction = ({ contributions }) => {
  const collected = new Map<string, FieldValue[]>()
  const provenance: Record<string, FieldProvenance> = {}

  for (const [source, contributed] of contributions) {
    for (const [field, value] of Object.entries(contributed)) {
      let values = collected.get(field)
      if (!values) {
        values = []
        collected.set(field, values)
        provenance[field] = { sources: [], rule: 'collected', discarded: [] }
      }
      if (!values.some((seen) => valuesEqual(seen, value))) {
        values.push(value)
      }
      provenance[field].sources.push(source)
    }
  }

  const fields: MergedFields = {}
  for (const [field, values] of collected) {
    fields[field] = values
  }

  return { fields, provenance }
}

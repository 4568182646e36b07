/**
 * Conversion of merged output back to storable field values
 * @module merge/to-field-map
 */

import type { FieldMap, FieldScalar, FieldValue } from '../types/entity.js'
import type { MergedValue, MergeResult } from './types.js'

function flatten(value: MergedValue): FieldValue {
  if (!Array.isArray(value)) return value

  const scalars: FieldScalar[] = []
  for (const item of value) {
    if (Array.isArray(item)) {
      for (const scalar of item) {
        if (!scalars.includes(scalar)) scalars.push(scalar)
      }
    } else if (!scalars.includes(item)) {
      scalars.push(item)
    }
  }
  return scalars
}

/**
 * Turns a merge result into a plain field map.
 *
 * Collected (`all`) values holding a single distinct value become that
 * value; longer collections are flattened to one list of distinct scalars.
 */
export function toFieldMap(result: MergeResult): FieldMap {
  const fields: FieldMap = {}
  for (const [field, value] of Object.entries(result.fields)) {
    if (result.strategy === 'all' && Array.isArray(value) && value.length === 1) {
      fields[field] = value[0]
    } else {
      fields[field] = flatten(value)
    }
  }
  return fields
}

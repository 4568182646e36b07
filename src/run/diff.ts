/**
 * Field-level differences between an entity and its merged record
 * @module run/diff
 */

import type { Entity } from '../types/entity.js'
import type { MergeResult } from '../merge/types.js'
import { toFieldMap } from '../merge/to-field-map.js'
import { valuesEqual } from '../utils/fields.js'
import type { FieldChange } from './types.js'

/**
 * Lists the fields a merged record would add to or change on an entity,
 * in merged field order. Fields the record does not mention are untouched
 * and not listed.
 */
export function diffFields(entity: Entity, result: MergeResult): FieldChange[] {
  const changes: FieldChange[] = []

  for (const [field, after] of Object.entries(toFieldMap(result))) {
    const before = entity.fields[field]
    if (before === undefined) {
      changes.push({ field, kind: 'added', after })
    } else if (!valuesEqual(before, after)) {
      changes.push({ field, kind: 'changed', before, after })
    }
  }

  return changes
}

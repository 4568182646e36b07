/**
 * Helpers for field values
 * @module utils/fields
 */

import type { FieldMap, FieldScalar, FieldValue } from '../types/entity.js'
import { InvalidParameterError, requirePlainObject } from './errors.js'

function isFieldScalar(value: unknown): value is FieldScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

/**
 * Narrows an unknown value to a FieldValue
 */
export function isFieldValue(value: unknown): value is FieldValue {
  if (isFieldScalar(value)) return true
  return Array.isArray(value) && value.every(isFieldScalar)
}

/**
 * Validates parsed JSON as a field map
 *
 * @throws {InvalidParameterError} If the value is not an object of field values
 */
export function parseFieldMap(value: unknown, parameterName: string): FieldMap {
  const object = requirePlainObject(value, parameterName)
  const fields: FieldMap = {}

  for (const [name, fieldValue] of Object.entries(object)) {
    if (fieldValue === null) continue
    if (!isFieldValue(fieldValue)) {
      throw new InvalidParameterError(
        `${parameterName}.${name}`,
        fieldValue,
        'must be a string, number, boolean or a list of those'
      )
    }
    fields[name] = Array.isArray(fieldValue) ? [...fieldValue] : fieldValue
  }

  return fields
}

/**
 * Compares two values for equality
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a === null || b === null) return false
  if (typeof a !== typeof b) return false

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((val, idx) => valuesEqual(val, b[idx]))
  }

  return false
}

/**
 * Returns a copy of a field map without the given field names
 */
export function omitFields(fields: Readonly<FieldMap>, excluded: readonly string[]): FieldMap {
  const result: FieldMap = {}
  for (const [name, value] of Object.entries(fields)) {
    if (!excluded.includes(name)) result[name] = value
  }
  return result
}

/**
 * Renders a field value for display
 */
export function formatFieldValue(value: FieldValue | FieldValue[] | undefined): string {
  if (value === undefined) return '(none)'
  if (Array.isArray(value)) return `[${value.map((v) => formatFieldValue(v)).join(', ')}]`
  return typeof value === 'string' ? `"${value}"` : String(value)
}

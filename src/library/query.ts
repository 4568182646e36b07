/**
 * Library query parsing and matching
 * @module library/query
 */

import type { FieldMap, FieldValue } from '../types/entity.js'

/**
 * One query term. Terms without a field match title and artist fields.
 */
export interface QueryTerm {
  field?: string
  value: string
}

/** Fields searched by bare terms */
export const DEFAULT_QUERY_FIELDS = ['album', 'title', 'name', 'albumartist', 'artist'] as const

/**
 * Parses a query: whitespace-separated terms, `field:value` or bare `value`.
 * Values are lowercased; empty values are dropped.
 *
 * @example
 * ```typescript
 * parseQuery('artist:Beatles road')
 * // [{ field: 'artist', value: 'beatles' }, { value: 'road' }]
 * ```
 */
export function parseQuery(query: string): QueryTerm[] {
  const terms: QueryTerm[] = []

  for (const token of query.trim().split(/\s+/)) {
    if (token === '') continue
    const separator = token.indexOf(':')
    if (separator > 0) {
      const value = token.slice(separator + 1).toLowerCase()
      if (value !== '') terms.push({ field: token.slice(0, separator), value })
    } else {
      terms.push({ value: token.toLowerCase() })
    }
  }

  return terms
}

function fieldText(value: FieldValue | undefined): string {
  if (value === undefined) return ''
  return (Array.isArray(value) ? value.join(' ') : String(value)).toLowerCase()
}

/**
 * Whether a field set satisfies every term (case-insensitive substring match)
 */
export function matchesQuery(fields: Readonly<FieldMap>, terms: readonly QueryTerm[]): boolean {
  return terms.every((term) => {
    if (term.field !== undefined) {
      return fieldText(fields[term.field]).includes(term.value)
    }
    return DEFAULT_QUERY_FIELDS.some((field) => fieldText(fields[field]).includes(term.value))
  })
}

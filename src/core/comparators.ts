/**
 * String comparison primitives used by the distance scorer
 * @module core/comparators
 */

/**
 * Normalizes a tag value for comparison: Unicode compatibility decomposition,
 * Latin diacritics and punctuation removed, lowercased, whitespace collapsed.
 * Combining marks of other scripts (Indic vowel signs, viramas) are kept.
 *
 * @example
 * ```typescript
 * normalizeText('Beyoncé – Lemonade!')  // 'beyonce lemonade'
 * normalizeText("Guns N' Roses")        // 'guns n roses'
 * ```
 */
export function normalizeText(value: unknown): string {
  if (value == null) return ''

  return String(value)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
}

/**
 * Options for Levenshtein distance comparison.
 */
export interface LevenshteinOptions {
  /** Whether string comparison should be case-sensitive (default: false) */
  caseSensitive?: boolean
  /** Whether to normalize whitespace before comparison (default: true) */
  normalizeWhitespace?: boolean
  /** Whether two null/undefined values should match (default: true) */
  nullMatchesNull?: boolean
}

/**
 * Calculates Levenshtein distance similarity between two values.
 *
 * Levenshtein distance measures the minimum number of single-character edits
 * (insertions, deletions, or substitutions) required to transform one string
 * into another. This function returns a normalized similarity score between
 * 0 (completely different) and 1 (identical).
 *
 * @example
 * ```typescript
 * levenshtein('hello', 'hello')      // 1.0 (identical)
 * levenshtein('hello', 'hallo')      // 0.8 (one character different)
 * levenshtein('Hello', 'hello')      // 1.0 (case-insensitive by default)
 * levenshtein('Hello', 'hello', { caseSensitive: true }) // 0.8
 * ```
 */
export function levenshtein(
  a: unknown,
  b: unknown,
  options: LevenshteinOptions = {}
): number {
  const {
    caseSensitive = false,
    normalizeWhitespace = true,
    nullMatchesNull = true,
  } = options

  // Handle null/undefined
  if (a == null && b == null) return nullMatchesNull ? 1 : 0
  if (a == null || b == null) return 0

  let strA = String(a)
  let strB = String(b)

  if (!caseSensitive) {
    strA = strA.toLowerCase()
    strB = strB.toLowerCase()
  }

  if (normalizeWhitespace) {
    strA = strA.replace(/\s+/g, ' ').trim()
    strB = strB.replace(/\s+/g, ' ').trim()
  }

  // Handle empty strings
  if (strA.length === 0 && strB.length === 0) return 1
  if (strA.length === 0 || strB.length === 0) return 0

  const distance = editDistance(strA, strB)
  const maxLength = Math.max(strA.length, strB.length)

  return 1 - distance / maxLength
}

/**
 * Wagner-Fischer edit distance, keeping only two rows of the matrix
 * @internal
 */
function editDistance(strA: string, strB: string): number {
  let previous: number[] = Array.from({ length: strB.length + 1 }, (_, j) => j)

  for (let i = 1; i <= strA.length; i++) {
    const current: number[] = [i]
    for (let j = 1; j <= strB.length; j++) {
      const cost = strA[i - 1] === strB[j - 1] ? 0 : 1
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      )
    }
    previous = current
  }

  return previous[strB.length]
}

/**
 * Splits a value into its distinct normalized tokens
 */
export function tokenize(value: unknown): Set<string> {
  const normalized = normalizeText(value)
  return new Set(normalized === '' ? [] : normalized.split(' '))
}

import { describe, it, expect } from 'vitest'
import { levenshtein, normalizeText, tokenize } from '../../../src/core/comparators.js'

describe('Comparators', () => {
  describe('normalizeText', () => {
    it('removes diacritics and punctuation', () => {
      expect(normalizeText('Beyoncé – Lemonade!')).toBe('beyonce lemonade')
    })

    it('collapses whitespace left by apostrophes', () => {
      expect(normalizeText("Guns N' Roses")).toBe('guns n roses')
    })

    it('keeps vowel signs and viramas of Indic scripts', () => {
      expect(normalizeText('संगीत')).toBe('संगीत')
      expect(normalizeText('தமிழ்')).toBe('தமிழ்')
      expect(tokenize('तुम ही हो')).toEqual(new Set(['तुम', 'ही', 'हो']))
    })

    it('returns empty string for null and undefined', () => {
      expect(normalizeText(null)).toBe('')
      expect(normalizeText(undefined)).toBe('')
    })

    it('stringifies numbers', () => {
      expect(normalizeText(42)).toBe('42')
    })
  })

  describe('levenshtein', () => {
    it('returns 1 for identical strings', () => {
      expect(levenshtein('hello', 'hello')).toBe(1)
    })

    it('scores one substitution in five characters as 0.8', () => {
      expect(levenshtein('hello', 'hallo')).toBeCloseTo(0.8)
    })

    it('is case-insensitive by default', () => {
      expect(levenshtein('Hello', 'hello')).toBe(1)
      expect(levenshtein('Hello', 'hello', { caseSensitive: true })).toBeCloseTo(0.8)
    })

    it('handles insertions and substitutions', () => {
      expect(levenshtein('kitten', 'sitting')).toBeCloseTo(4 / 7)
    })

    it('handles null values', () => {
      expect(levenshtein(null, null)).toBe(1)
      expect(levenshtein(null, null, { nullMatchesNull: false })).toBe(0)
      expect(levenshtein(null, 'a')).toBe(0)
    })

    it('returns 0 when only one side is empty', () => {
      expect(levenshtein('', 'abc')).toBe(0)
      expect(levenshtein('', '')).toBe(1)
    })
  })

  describe('tokenize', () => {
    it('splits into distinct normalized tokens', () => {
      expect([...tokenize('The Beatles - Abbey Road, the')]).toEqual(['the', 'beatles', 'abbey', 'road'])
    })

    it('returns an empty set for blank input', () => {
      expect(tokenize('  ').size).toBe(0)
    })
  })
})

import { describe, it, expect } from 'vitest'
import { computeDistance, parseDuration, scoreDistance } from '../../../src/core/distance.js'

const abbeyRoad = { album: 'Abbey Road', albumartist: 'The Beatles' }

describe('Distance', () => {
  describe('scoreDistance', () => {
    it('returns 0 for identical fields', () => {
      expect(scoreDistance(abbeyRoad, { ...abbeyRoad })).toBe(0)
    })

    it('ignores case and punctuation', () => {
      expect(scoreDistance(abbeyRoad, { album: 'ABBEY ROAD!', albumartist: 'the beatles' })).toBe(0)
    })

    it('distinguishes titles that differ only in a vowel sign', () => {
      const artist = { albumartist: 'Arijit Singh' }
      expect(scoreDistance({ ...artist, album: 'संगीत' }, { ...artist, album: 'संगीत' })).toBe(0)
      expect(scoreDistance({ ...artist, album: 'संगीत' }, { ...artist, album: 'सिगीत' })).toBeCloseTo(0.1)
    })

    it('applies the missing-field penalty to an absent artist', () => {
      expect(scoreDistance(abbeyRoad, { album: 'Abbey Road' })).toBeCloseTo(0.25)
    })

    it('treats an empty string as missing', () => {
      expect(scoreDistance(abbeyRoad, { album: '', albumartist: 'The Beatles' })).toBeCloseTo(0.25)
    })

    it('penalizes a duration present on only one side', () => {
      expect(scoreDistance({ ...abbeyRoad, length: 2840 }, abbeyRoad)).toBeCloseTo(0.125)
    })

    it('approaches 1 for unrelated strings', () => {
      expect(scoreDistance({ album: 'abc', albumartist: 'def' }, { album: 'xyz', albumartist: 'uvw' })).toBe(1)
    })

    it('compares the first element of list values', () => {
      expect(
        scoreDistance(
          { album: 'Abbey Road', albumartist: ['The Beatles', 'Billy Preston'] },
          abbeyRoad
        )
      ).toBe(0)
    })

    it('compares tracks by title and artist', () => {
      expect(
        scoreDistance(
          { title: 'Help!', artist: 'The Beatles' },
          { title: 'help', artist: 'The Beatles', album: 'Help!' },
          'track'
        )
      ).toBe(0)
    })

    it('never throws on odd values', () => {
      expect(scoreDistance({ album: true, albumartist: [] }, { album: 'true', length: 'soon' })).toBeCloseTo(
        (0 * 3 + 0.5 * 3 + 0.5 * 2) / 8
      )
    })

    it('stays within [0, 1]', () => {
      const distance = scoreDistance({ album: 'Let It Be' }, { albumartist: 'Someone Else', length: 1 })
      expect(distance).toBeGreaterThanOrEqual(0)
      expect(distance).toBeLessThanOrEqual(1)
    })
  })

  describe('computeDistance', () => {
    it('treats durations within the grace period as identical', () => {
      const breakdown = computeDistance({ ...abbeyRoad, length: 180 }, { ...abbeyRoad, length: 189 })
      expect(breakdown.duration).toBe(0)
      expect(breakdown.total).toBe(0)
    })

    it('grows linearly past the grace period', () => {
      const breakdown = computeDistance({ ...abbeyRoad, length: 180 }, { ...abbeyRoad, length: 205 })
      expect(breakdown.duration).toBeCloseTo(0.5)
      expect(breakdown.total).toBeCloseTo(0.125)
    })

    it('caps the duration component at 1', () => {
      const breakdown = computeDistance({ ...abbeyRoad, length: 180 }, { ...abbeyRoad, duration: '5:00' })
      expect(breakdown.duration).toBe(1)
      expect(breakdown.total).toBeCloseTo(0.25)
    })

    it('omits duration when neither side has one', () => {
      expect(computeDistance(abbeyRoad, abbeyRoad)).toEqual({ total: 0, title: 0, artist: 0 })
    })
  })

  describe('parseDuration', () => {
    it('parses seconds and clock formats', () => {
      expect(parseDuration(200)).toBe(200)
      expect(parseDuration('200')).toBe(200)
      expect(parseDuration('3:05')).toBe(185)
      expect(parseDuration('1:02:03')).toBe(3723)
    })

    it('rejects unreadable values', () => {
      expect(parseDuration('abc')).toBeUndefined()
      expect(parseDuration(-5)).toBeUndefined()
      expect(parseDuration(undefined)).toBeUndefined()
      expect(parseDuration(true)).toBeUndefined()
    })
  })
})

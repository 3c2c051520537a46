import { describe, expect, it } from 'vitest'
import { MOODS, confidenceLabel, isMood, mapClassifierLabel } from '../src/mood'

describe('mood vocabulary', () => {
  it('maps classifier labels case-insensitively', () => {
    expect(mapClassifierLabel('joy')).toBe('happy')
    expect(mapClassifierLabel(' Sadness ')).toBe('sad')
    expect(mapClassifierLabel('ANGER')).toBe('upset')
    expect(mapClassifierLabel('fear')).toBe('anxious')
    expect(mapClassifierLabel('surprise')).toBe('surprised')
    expect(mapClassifierLabel('disgust')).toBe('disgusted')
    expect(mapClassifierLabel('neutral')).toBe('calm')
  })

  it('ignores labels outside the table, including prototype keys', () => {
    expect(mapClassifierLabel('optimism')).toBeUndefined()
    expect(mapClassifierLabel('toString')).toBeUndefined()
    expect(mapClassifierLabel('')).toBeUndefined()
  })

  it('lists eight moods and recognises them', () => {
    expect(MOODS).toHaveLength(8)
    expect(isMood('neutral')).toBe(true)
    expect(isMood('joy')).toBe(false)
    expect(isMood(3)).toBe(false)
  })
})

describe('confidenceLabel', () => {
  it('uses inclusive lower bounds for each tier', () => {
    expect(confidenceLabel(0.95)).toBe('Extremely confident')
    expect(confidenceLabel(0.9)).toBe('Extremely confident')
    expect(confidenceLabel(0.89)).toBe('Very confident')
    expect(confidenceLabel(0.8)).toBe('Very confident')
    expect(confidenceLabel(0.6)).toBe('Moderately confident')
    expect(confidenceLabel(0.59)).toBe('Not very confident')
    expect(confidenceLabel(0)).toBe('Not very confident')
  })
})

import { describe, it, expect } from 'vitest'
import { extractYear, parseChapterCount, parseRating, parseViews, truncateDescription } from '../fields.js'

describe('parseViews', () => {
  it.each([
    ['12,345', 12345],
    ['3.5K', 3500],
    ['2M', 2000000],
    ['1.1K', 1100],
    ['1,250k', 1250000],
    ['987', 987],
    ['', 0],
    ['-', 0],
    ['K', 0],
  ])('parses %j as %d', (raw, expected) => {
    expect(parseViews(raw)).toBe(expected)
  })

  it('returns 0 when nothing was recovered', () => {
    expect(parseViews(undefined)).toBe(0)
  })
})

describe('parseRating', () => {
  it('parses numeric scores', () => {
    expect(parseRating('7.50')).toBe(7.5)
    expect(parseRating(' 9 ')).toBe(9)
  })

  it('defaults absent, dashed and non-numeric scores to 0', () => {
    expect(parseRating(undefined)).toBe(0)
    expect(parseRating('')).toBe(0)
    expect(parseRating('-')).toBe(0)
    expect(parseRating('N/A')).toBe(0)
  })
})

describe('parseChapterCount', () => {
  it('takes the first run of digits', () => {
    expect(parseChapterCount('Chapter 112')).toBe(112)
    expect(parseChapterCount('Ch. 45.5 End')).toBe(45)
  })

  it('defaults to 0', () => {
    expect(parseChapterCount('Oneshot')).toBe(0)
    expect(parseChapterCount(undefined)).toBe(0)
  })
})

describe('extractYear', () => {
  it('prefers the first candidate that carries a year', () => {
    expect(extractYear(['March 4, 2021', 'June 10, 2024'], 2025)).toBe(2021)
    expect(extractYear([undefined, 'June 10, 2024'], 2025)).toBe(2024)
  })

  it('falls back to the default year', () => {
    expect(extractYear([undefined, undefined], 2025)).toBe(2025)
    expect(extractYear(['yesterday'], 2019)).toBe(2019)
  })
})

describe('truncateDescription', () => {
  it('keeps synopses up to 100 characters unchanged', () => {
    const exact = 'a'.repeat(100)
    expect(truncateDescription(exact)).toBe(exact)
    expect(truncateDescription('Short synopsis.')).toBe('Short synopsis.')
  })

  it('cuts longer synopses to 100 characters plus an ellipsis', () => {
    const long = 'b'.repeat(101)
    expect(truncateDescription(long)).toBe('b'.repeat(100) + '...')
  })

  it('counts astral characters once', () => {
    const emoji = '\u{1F600}'.repeat(60)
    expect(truncateDescription(emoji)).toBe(emoji)
  })

  it('never splits a surrogate pair at the cut', () => {
    const synopsis = 'a'.repeat(99) + '\u{1F600}' + 'b'.repeat(10)
    expect(truncateDescription(synopsis)).toBe('a'.repeat(99) + '\u{1F600}...')
  })
})

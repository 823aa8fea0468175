import { describe, expect, test } from 'vitest'
import { DATE_PATTERNS } from '../src/config/constants'
import {
  containsMonthToken,
  formatIsoDate,
  normalizeDateRange,
  normalizeYearRange,
  parsePartialDate,
} from '../src/extraction/date-range'

describe('normalizeDateRange', () => {
  test('parses a month-year range', () => {
    expect(normalizeDateRange('Jun 2020 - Dec 2022')).toEqual({
      start: '2020-06-01',
      end: '2022-12-01',
      isCurrent: false,
    })
  })

  test('keeps both months for every month pair', () => {
    DATE_PATTERNS.MONTH_TOKENS.forEach((token, idx) => {
      const month = String(idx + 1).padStart(2, '0')
      const range = normalizeDateRange(`${token} 2020 - ${token} 2022`)
      expect(range.start).toBe(`2020-${month}-01`)
      expect(range.end).toBe(`2022-${month}-01`)
    })
  })

  test('marks a range ending in Present as current', () => {
    expect(normalizeDateRange('Jan 2021 - Present')).toEqual({
      start: '2021-01-01',
      end: null,
      isCurrent: true,
    })
  })

  test('ignores the duration after the middle dot', () => {
    expect(normalizeDateRange('Jan 2021 – Present · 3 yrs 10 mos')).toEqual({
      start: '2021-01-01',
      end: null,
      isCurrent: true,
    })
    expect(normalizeDateRange('2017 - 2018 · 1 yr')).toEqual({
      start: '2017-01-01',
      end: '2018-01-01',
      isCurrent: false,
    })
  })

  test('detects the current keyword regardless of case', () => {
    expect(normalizeDateRange('Mar 2022 - current').isCurrent).toBe(true)
    expect(normalizeDateRange('Mar 2022 - PRESENT').end).toBeNull()
  })

  test('treats a bare year as both start and end', () => {
    expect(normalizeDateRange('2019')).toEqual({
      start: '2019-01-01',
      end: '2019-01-01',
      isCurrent: false,
    })
  })

  test('accepts full month names', () => {
    expect(normalizeDateRange('January 2020 - March 2021')).toEqual({
      start: '2020-01-01',
      end: '2021-03-01',
      isCurrent: false,
    })
  })

  test('falls back to January for an unknown month name', () => {
    expect(normalizeDateRange('Foo 2020 - Bar 2021')).toEqual({
      start: '2020-01-01',
      end: '2021-01-01',
      isCurrent: false,
    })
  })

  test('returns nulls for empty or unparsable input', () => {
    const empty = { start: null, end: null, isCurrent: false }
    expect(normalizeDateRange(null)).toEqual(empty)
    expect(normalizeDateRange(undefined)).toEqual(empty)
    expect(normalizeDateRange('   ')).toEqual(empty)
    expect(normalizeDateRange('sometime - later')).toEqual(empty)
  })

  test('a lone Present has no start', () => {
    expect(normalizeDateRange('Present')).toEqual({
      start: null,
      end: null,
      isCurrent: true,
    })
  })
})

describe('normalizeYearRange', () => {
  test('returns integer years', () => {
    expect(normalizeYearRange('2018 - 2020')).toEqual({
      start: 2018,
      end: 2020,
      isCurrent: false,
    })
  })

  test('drops months and honours Present', () => {
    expect(normalizeYearRange('Sep 2012 - Present')).toEqual({
      start: 2012,
      end: null,
      isCurrent: true,
    })
  })

  test('treats a bare year as both start and end', () => {
    expect(normalizeYearRange('2019')).toEqual({
      start: 2019,
      end: 2019,
      isCurrent: false,
    })
  })

  test('returns nulls for missing input', () => {
    expect(normalizeYearRange(null)).toEqual({
      start: null,
      end: null,
      isCurrent: false,
    })
  })
})

describe('parsePartialDate', () => {
  test('reads month and year', () => {
    expect(parsePartialDate('Jun 2025')).toEqual({ year: 2025, month: 6 })
  })

  test('reads the first four-digit run as a year', () => {
    expect(parsePartialDate('since 1999')).toEqual({ year: 1999, month: 1 })
  })

  test('returns null for the current keyword', () => {
    expect(parsePartialDate(' Present ')).toBeNull()
  })
})

describe('formatIsoDate', () => {
  test('pads the month and pins the day to the first', () => {
    expect(formatIsoDate({ year: 2020, month: 3 })).toBe('2020-03-01')
    expect(formatIsoDate(null)).toBeNull()
  })
})

describe('containsMonthToken', () => {
  test('matches capitalized abbreviations only', () => {
    expect(containsMonthToken('Started in May')).toBe(true)
    expect(containsMonthToken('may have shipped')).toBe(false)
    expect(containsMonthToken('Austin, Texas')).toBe(false)
  })
})

import { DATE_PATTERNS } from '../config/constants'
import type { DateRange, YearRange } from '../models'

export interface PartialDate {
  year: number
  /** 1-12 */
  month: number
}

interface DateRangeParts {
  startText: string
  endText: string | null
  isCurrent: boolean
}

/**
 * Parses a date-range caption into ISO dates.
 *
 * Handles "Jun 2020 - Dec 2022", "2017 - 2018 · 1 yr",
 * "Jan 2021 – Present · 3 yrs 10 mos" and single dates such as "2019",
 * which count as both start and end. Unparsable parts become null.
 */
export function normalizeDateRange(text: string | null | undefined): DateRange {
  const parts = splitDateRange(text)
  if (!parts) return { start: null, end: null, isCurrent: false }

  return {
    start: formatIsoDate(parsePartialDate(parts.startText)),
    end: parts.endText === null
      ? null
      : formatIsoDate(parsePartialDate(parts.endText)),
    isCurrent: parts.isCurrent,
  }
}

/**
 * Same rules as normalizeDateRange, keeping only the years
 */
export function normalizeYearRange(text: string | null | undefined): YearRange {
  const parts = splitDateRange(text)
  if (!parts) return { start: null, end: null, isCurrent: false }

  return {
    start: parsePartialDate(parts.startText)?.year ?? null,
    end: parts.endText === null
      ? null
      : (parsePartialDate(parts.endText)?.year ?? null),
    isCurrent: parts.isCurrent,
  }
}

function splitDateRange(text: string | null | undefined): DateRangeParts | null {
  if (!text?.trim()) return null

  // Drop the duration: "Jan 2020 - Present · 1 yr 2 mos"
  const datePart = (text.split(DATE_PATTERNS.DURATION_SEPARATOR)[0] ?? '').trim()
  const isCurrent = DATE_PATTERNS.CURRENT_REGEX.test(datePart)

  const [startText = '', endText] = datePart.split(
    DATE_PATTERNS.RANGE_SEPARATOR_REGEX,
  )

  return {
    startText,
    endText: isCurrent ? null : (endText ?? startText),
    isCurrent,
  }
}

/**
 * "Jun 2025" → 2025-06, "January 2020" → 2020-01, "2017" → 2017-01.
 * An unknown month name counts as January; any 4-digit run is a year.
 */
export function parsePartialDate(text: string): PartialDate | null {
  const trimmed = text.trim()
  if (!trimmed || isCurrentKeyword(trimmed)) return null

  const monthYear = DATE_PATTERNS.MONTH_YEAR_REGEX.exec(trimmed)
  if (monthYear?.[1] && monthYear[2]) {
    return {
      year: Number.parseInt(monthYear[2], 10),
      month: monthNumber(monthYear[1]),
    }
  }

  const year = DATE_PATTERNS.YEAR_REGEX.exec(trimmed)?.[0]
  return year ? { year: Number.parseInt(year, 10), month: 1 } : null
}

export function formatIsoDate(date: PartialDate | null): string | null {
  if (!date) return null
  return `${date.year}-${String(date.month).padStart(2, '0')}-01`
}

function isCurrentKeyword(text: string): boolean {
  const lower = text.toLowerCase()
  return DATE_PATTERNS.CURRENT_KEYWORDS.some((keyword) => keyword === lower)
}

function monthNumber(name: string): number {
  const lower = name.toLowerCase()

  const short = DATE_PATTERNS.MONTH_TOKENS.findIndex(
    (token) => token.toLowerCase() === lower,
  )
  if (short !== -1) return short + 1

  const full = DATE_PATTERNS.MONTH_NAMES.findIndex((month) => month === lower)
  return full !== -1 ? full + 1 : 1
}

/**
 * True when the text contains a month abbreviation ("Jan"…"Dec", case
 * sensitive), which marks it as a date fragment rather than prose or a place
 */
export function containsMonthToken(text: string): boolean {
  return DATE_PATTERNS.MONTH_TOKENS.some((token) => text.includes(token))
}

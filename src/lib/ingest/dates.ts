import type { CellValue } from '@/types/transactions'

export type DetectedDateFormat = 'ISO' | 'DMY' | 'MDY' | 'AMBIGUOUS' | 'UNKNOWN'

export interface ParsedDate {
  year: number
  month: number
  day: number
  // true when both leading numbers were ≤ 12 and the default order decided
  ambiguous: boolean
}

export interface DateParseOptions {
  dayFirst: boolean
}

const FORMAT_HINT = 'Expected DD/MM/YYYY (e.g. 25/12/2024), MM/DD/YYYY (e.g. 12/25/2024) or YYYY-MM-DD'

export class DateParseError extends Error {
  readonly value: string

  constructor(value: string, reason?: string) {
    super(`Cannot parse '${value}' as date${reason ? `. ${reason}` : ''}. ${FORMAT_HINT}`)
    this.name = 'DateParseError'
    this.value = value
  }
}

const ISO_DATE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?=$|[T\s])/
const NUMERIC_DATE = /^(\d{1,2})[/\-.](\d{1,2})[/\-.](\d{2}|\d{4})(?=$|[T\s,])/

export function detectDateFormat(text: string): DetectedDateFormat {
  const trimmed = text.trim()
  if (ISO_DATE.test(trimmed)) return 'ISO'

  const match = NUMERIC_DATE.exec(trimmed)
  if (!match) return 'UNKNOWN'

  const first = Number(match[1])
  const second = Number(match[2])
  if (first > 12) return 'DMY'
  if (second > 12) return 'MDY'
  return 'AMBIGUOUS'
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

function checkCalendar(value: string, year: number, month: number, day: number, format: DetectedDateFormat): void {
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    const detected = format === 'DMY' ? ' (detected DD/MM/YYYY format)'
      : format === 'MDY' ? ' (detected MM/DD/YYYY format)'
      : ''
    throw new DateParseError(value, `Invalid day or month value${detected}`)
  }
}

/**
 * Parses a transaction date. ISO dates are never ambiguous; for numeric
 * dates a leading number above 12 must be the day, a second number above 12
 * must be the day with the month first, and anything else falls back to
 * `dayFirst`.
 */
export function parseTransactionDate(value: CellValue, options: DateParseOptions): ParsedDate {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new DateParseError(String(value))
    return { year: value.getFullYear(), month: value.getMonth() + 1, day: value.getDate(), ambiguous: false }
  }

  const text = value === null ? '' : String(value).trim()
  if (!text) throw new DateParseError(text, 'Date is empty')

  const iso = ISO_DATE.exec(text)
  if (iso) {
    const year = Number(iso[1])
    const month = Number(iso[2])
    const day = Number(iso[3])
    checkCalendar(text, year, month, day, 'ISO')
    return { year, month, day, ambiguous: false }
  }

  const format = detectDateFormat(text)
  const match = NUMERIC_DATE.exec(text)
  if (!match || format === 'UNKNOWN') throw new DateParseError(text)

  const first = Number(match[1])
  const second = Number(match[2])
  const year = match[3].length === 2 ? 2000 + Number(match[3]) : Number(match[3])

  const dayFirst = format === 'DMY' ? true : format === 'MDY' ? false : options.dayFirst
  const day = dayFirst ? first : second
  const month = dayFirst ? second : first
  checkCalendar(text, year, month, day, format)

  return { year, month, day, ambiguous: format === 'AMBIGUOUS' }
}

export function formatIsoDate(date: Pick<ParsedDate, 'year' | 'month' | 'day'>): string {
  const month = String(date.month).padStart(2, '0')
  const day = String(date.day).padStart(2, '0')
  return `${String(date.year).padStart(4, '0')}-${month}-${day}`
}

export function looksLikeDate(value: CellValue): boolean {
  if (value instanceof Date) return !Number.isNaN(value.getTime())
  if (typeof value !== 'string') return false
  return detectDateFormat(value) !== 'UNKNOWN'
}

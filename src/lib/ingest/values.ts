import type { CellValue } from '@/types/transactions'

export class AmountParseError extends Error {
  readonly value: CellValue

  constructor(value: CellValue, message: string) {
    super(message)
    this.name = 'AmountParseError'
    this.value = value
  }
}

const CURRENCY_SYMBOLS = /[£$€¥₹\s]/g
const DECIMAL = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/

export function isBlank(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) return true
  if (typeof value === 'string') return value.trim() === ''
  if (typeof value === 'number') return Number.isNaN(value)
  return false
}

export function cellToText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return ''
  if (value instanceof Date) return value.toISOString()
  return String(value).trim()
}

/**
 * Parses a signed decimal amount. Accepts currency symbols, thousands
 * separators and accounting-style parentheses for negatives: "(45.30)" → -45.3.
 */
export function parseAmount(value: CellValue): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new AmountParseError(value, `Cannot convert '${value}' to number`)
    return value
  }
  if (typeof value !== 'string') {
    throw new AmountParseError(value, `Cannot convert '${cellToText(value)}' to number`)
  }

  const trimmed = value.trim()
  if (!trimmed) throw new AmountParseError(value, 'Amount is empty')

  let cleaned = trimmed.replace(CURRENCY_SYMBOLS, '').replace(/,/g, '')
  if (cleaned.startsWith('(') && cleaned.endsWith(')')) {
    cleaned = `-${cleaned.slice(1, -1)}`
  }
  // "-£45.30" leaves "-45.30", "£-45.30" too; "--5" is still rejected below
  if (!DECIMAL.test(cleaned)) {
    throw new AmountParseError(value, `Cannot convert '${trimmed}' to number`)
  }
  return Number(cleaned)
}

export function looksLikeAmount(value: CellValue): boolean {
  try {
    parseAmount(value)
    return true
  } catch {
    return false
  }
}

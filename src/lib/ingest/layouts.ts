import type { BankLayout } from '@/lib/config'
import { MissingColumnsError } from '@/lib/errors'
import type { CanonicalField, CellValue, ColumnMapping, NormalizedRecord, RawTable } from '@/types/transactions'
import { looksLikeDate } from './dates'
import { isBlank, looksLikeAmount } from './values'

const SAMPLE_SIZE = 10
const MATCH_RATIO = 0.7
const CATEGORY_HINT = /categor|type|tag/i

type MappedColumns = Partial<Record<CanonicalField, string>>

function completeMapping(columns: MappedColumns): ColumnMapping['columns'] | null {
  const { Date: date, Amount: amount, Description: description, Category: category } = columns
  if (!date || !amount) return null
  return {
    Date: date,
    Amount: amount,
    ...(description ? { Description: description } : {}),
    ...(category ? { Category: category } : {}),
  }
}

/**
 * Matches headers against the known layouts. A layout matches when all of
 * its required headers are present (case-insensitive); optional headers
 * override the field they map to when the file has them.
 */
export function detectKnownLayout(headers: string[], layouts: BankLayout[]): ColumnMapping | null {
  const byLower = new Map<string, string>()
  for (const header of headers) {
    const key = header.trim().toLowerCase()
    if (!byLower.has(key)) byLower.set(key, header)
  }

  for (const layout of layouts) {
    const required = Object.keys(layout.columns)
    if (!required.every(h => byLower.has(h))) continue

    const columns: MappedColumns = {}
    for (const [header, field] of Object.entries(layout.columns)) {
      columns[field] = byLower.get(header)
    }
    for (const [header, field] of Object.entries(layout.optional)) {
      const original = byLower.get(header)
      if (original) columns[field] = original
    }

    const complete = completeMapping(columns)
    if (complete) {
      return { layout: layout.id, label: layout.name, source: 'known', columns: complete }
    }
  }
  return null
}

function sampleColumn(table: RawTable, header: string): CellValue[] {
  const values: CellValue[] = []
  for (const row of table.rows) {
    const value = row[header] ?? null
    if (isBlank(value)) continue
    values.push(value)
    if (values.length === SAMPLE_SIZE) break
  }
  return values
}

function ratio(values: CellValue[], predicate: (value: CellValue) => boolean): number {
  if (values.length === 0) return 0
  return values.filter(predicate).length / values.length
}

export interface ColumnProfile {
  header: string
  dateLike: boolean
  amountLike: boolean
  // False for a column with no values or only typed (numeric, date) cells
  hasText: boolean
}

export function profileColumns(table: RawTable): ColumnProfile[] {
  return table.headers.map(header => {
    const sample = sampleColumn(table, header)
    return {
      header,
      dateLike: ratio(sample, looksLikeDate) >= MATCH_RATIO,
      amountLike: ratio(sample, looksLikeAmount) >= MATCH_RATIO,
      hasText: ratio(sample, value => typeof value === 'string') >= MATCH_RATIO,
    }
  })
}

/**
 * Content-based column role inference, used when no known layout matches.
 * Returns whatever roles it could assign; Date and Amount may be absent.
 */
export function inferColumnMapping(table: RawTable): MappedColumns {
  const profiles = profileColumns(table)
  const assigned = new Set<string>()
  const columns: MappedColumns = {}

  const pick = (field: CanonicalField, test: (p: ColumnProfile) => boolean) => {
    const found = profiles.find(p => !assigned.has(p.header) && test(p))
    if (found) {
      columns[field] = found.header
      assigned.add(found.header)
    }
  }

  pick('Date', p => p.dateLike)
  pick('Amount', p => p.amountLike && !p.dateLike)
  pick('Description', p => p.hasText && !p.dateLike && !p.amountLike)
  pick('Category', p => p.hasText && !p.amountLike && CATEGORY_HINT.test(p.header))

  return columns
}

export function resolveColumnMapping(table: RawTable, layouts: BankLayout[]): ColumnMapping {
  const known = detectKnownLayout(table.headers, layouts)
  if (known) return known

  const inferred = inferColumnMapping(table)
  const complete = completeMapping(inferred)
  if (!complete) {
    const missing = (['Date', 'Amount'] as const).filter(field => !inferred[field])
    throw new MissingColumnsError([...missing])
  }
  return { layout: 'unknown', label: 'Auto-detected', source: 'inferred', columns: complete }
}

export function normalizeRecords(table: RawTable, mapping: ColumnMapping): NormalizedRecord[] {
  const { Date: date, Amount: amount, Description: description, Category: category } = mapping.columns
  return table.rows.map((row, i) => ({
    rowIndex: i + 1,
    date: row[date] ?? null,
    amount: row[amount] ?? null,
    description: description ? row[description] ?? '' : '',
    category: category ? row[category] ?? null : null,
  }))
}

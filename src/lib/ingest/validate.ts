import type {
  NormalizedRecord,
  RejectionEntry,
  ValidatedRecord,
  ValidationReport,
} from '@/types/transactions'
import { formatIsoDate, parseTransactionDate } from './dates'
import { cellToText, isBlank, parseAmount } from './values'

export interface ValidationOptions {
  dayFirst: boolean
  minValidRows: number
}

export type RowOutcome =
  | { ok: true; record: ValidatedRecord; ambiguousDate: boolean }
  | { ok: false; rejection: RejectionEntry }

const HIGH_REJECTION_RATE = 0.5

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}

/**
 * Validates one row. Parse failures come back as a rejection; this
 * function does not throw.
 */
export function validateRecord(record: NormalizedRecord, options: Pick<ValidationOptions, 'dayFirst'>): RowOutcome {
  const { rowIndex } = record

  const missing = [
    isBlank(record.date) ? 'Date' : null,
    isBlank(record.amount) ? 'Amount' : null,
  ].filter((field): field is string => field !== null)
  if (missing.length > 0) {
    return {
      ok: false,
      rejection: { rowIndex, reasonCode: 'MISSING_CRITICAL', detail: `Missing ${missing.join(' and ')}` },
    }
  }

  let amount: number
  try {
    amount = parseAmount(record.amount)
  } catch (error) {
    return { ok: false, rejection: { rowIndex, reasonCode: 'INVALID_AMOUNT', detail: errorMessage(error) } }
  }

  let date: string
  let ambiguousDate: boolean
  try {
    const parsed = parseTransactionDate(record.date, options)
    date = formatIsoDate(parsed)
    ambiguousDate = parsed.ambiguous
  } catch (error) {
    return { ok: false, rejection: { rowIndex, reasonCode: 'INVALID_DATE', detail: errorMessage(error) } }
  }

  const category = cellToText(record.category)
  return {
    ok: true,
    ambiguousDate,
    record: {
      rowIndex,
      date,
      description: cellToText(record.description),
      amount,
      category: category || null,
    },
  }
}

function buildWarnings(total: number, valid: number, skipped: number, minValidRows: number): string[] {
  if (total === 0) return ['No data to validate']

  const warnings: string[] = []
  if (valid < minValidRows) {
    warnings.push(
      `Only ${valid} valid transaction${valid === 1 ? '' : 's'} found. ` +
      `Analysis works best with at least ${minValidRows} transactions.`
    )
  }
  if (skipped > 0 && skipped === total) {
    warnings.push('All rows were skipped due to validation errors. Please check your file.')
  } else if (skipped > total * HIGH_REJECTION_RATE) {
    warnings.push(
      `More than half of the rows (${skipped}/${total}) were skipped. Please review your data quality.`
    )
  }
  return warnings
}

export function validateRecords(
  records: NormalizedRecord[],
  options: ValidationOptions
): { records: ValidatedRecord[]; report: ValidationReport } {
  const valid: ValidatedRecord[] = []
  const rejections: RejectionEntry[] = []
  let ambiguousDates = 0

  for (const record of records) {
    const outcome = validateRecord(record, options)
    if (outcome.ok) {
      valid.push(outcome.record)
      if (outcome.ambiguousDate) ambiguousDates++
    } else {
      rejections.push(outcome.rejection)
    }
  }

  const totalRows = records.length
  const skippedRows = rejections.length

  return {
    records: valid,
    report: {
      totalRows,
      validRows: valid.length,
      skippedRows,
      rejections,
      warnings: buildWarnings(totalRows, valid.length, skippedRows, options.minValidRows),
      ambiguousDates,
    },
  }
}

export type CellValue = string | number | boolean | Date | null

// One row of the uploaded table, keyed by the original header text
export type RawRecord = Record<string, CellValue>

export interface RawTable {
  headers: string[]
  rows: RawRecord[]
}

export type CanonicalField = 'Date' | 'Description' | 'Amount' | 'Category'

export interface ColumnMapping {
  layout: string
  label: string
  source: 'known' | 'inferred'
  columns: { Date: string; Amount: string; Description?: string; Category?: string }
}

export interface NormalizedRecord {
  rowIndex: number
  date: CellValue
  description: CellValue
  amount: CellValue
  category: CellValue
}

export interface ValidatedRecord {
  rowIndex: number
  date: string // YYYY-MM-DD
  description: string
  amount: number
  category: string | null
}

export type RejectionReason = 'MISSING_CRITICAL' | 'INVALID_AMOUNT' | 'INVALID_DATE'

export interface RejectionEntry {
  rowIndex: number
  reasonCode: RejectionReason
  detail: string
}

export interface ValidationReport {
  totalRows: number
  validRows: number
  skippedRows: number
  rejections: RejectionEntry[]
  warnings: string[]
  ambiguousDates: number
}

export interface CategorizedRecord extends Omit<ValidatedRecord, 'category'> {
  category: string
}

export type DateOrder = 'day-first' | 'month-first'

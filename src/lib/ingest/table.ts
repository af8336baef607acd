import * as XLSX from 'xlsx'
import type { CellValue, RawRecord, RawTable } from '@/types/transactions'

type Row = CellValue[]

function uniqueHeaders(cells: Row): string[] {
  const seen = new Map<string, number>()
  return cells.map((cell, i) => {
    const base = cell === null || String(cell).trim() === '' ? `Column ${i + 1}` : String(cell).trim()
    const count = (seen.get(base) ?? 0) + 1
    seen.set(base, count)
    return count === 1 ? base : `${base}_${count}`
  })
}

function toCell(value: unknown): CellValue {
  if (value === undefined || value === null) return null
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value
  if (value instanceof Date) return value
  return String(value)
}

function rowsToTable(rows: unknown[][]): RawTable {
  const nonEmpty = rows
    .map(row => row.map(toCell))
    .filter(row => row.some(cell => cell !== null && String(cell).trim() !== ''))

  if (nonEmpty.length === 0) return { headers: [], rows: [] }

  const [headerRow, ...dataRows] = nonEmpty
  const width = nonEmpty.reduce((max, row) => Math.max(max, row.length), 0)
  const paddedHeader = Array.from({ length: width }, (_, i) => headerRow[i] ?? null)
  const headers = uniqueHeaders(paddedHeader)

  return {
    headers,
    rows: dataRows.map(row => {
      const record: RawRecord = {}
      headers.forEach((header, i) => {
        record[header] = row[i] ?? null
      })
      return record
    }),
  }
}

function firstSheetRows(workbook: XLSX.WorkBook): unknown[][] {
  const sheetName = workbook.SheetNames[0]
  if (!sheetName) return []
  const sheet = workbook.Sheets[sheetName]
  if (!sheet) return []

  return XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  })
}

/**
 * Parses decoded delimited text (comma, semicolon or tab separated) into a
 * table. Cells are kept as text; type coercion happens during validation.
 */
export function parseDelimitedText(text: string): RawTable {
  const workbook = XLSX.read(text, { type: 'string', raw: true })
  return rowsToTable(firstSheetRows(workbook))
}

// Excel workbooks keep typed cells: numbers stay numbers, date cells become Date
export function readSpreadsheet(bytes: Uint8Array): RawTable {
  const workbook = XLSX.read(bytes, { type: 'array', cellDates: true })
  return rowsToTable(firstSheetRows(workbook))
}

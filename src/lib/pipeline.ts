import { extname } from 'path'
import type { PipelineConfig } from '@/lib/config'
import { PipelineError, UnsupportedFileTypeError } from '@/lib/errors'
import { decodeTable } from '@/lib/ingest/encoding'
import { readSpreadsheet } from '@/lib/ingest/table'
import { normalizeRecords, resolveColumnMapping } from '@/lib/ingest/layouts'
import { validateRecords } from '@/lib/ingest/validate'
import { categorizeTransactions } from '@/lib/categorize'
import { categorySummary, getFinancialSummary, monthlyTrend, outlierFlags } from '@/lib/reports'
import type { CategorySummary, FinancialSummary, MonthlyTrendEntry, OutlierFlag } from '@/types/reports'
import type { CategorizedRecord, ColumnMapping, RawTable, ValidationReport } from '@/types/transactions'

export type FileKind = 'delimited' | 'spreadsheet'

const FILE_KINDS: Record<string, FileKind> = {
  '.csv': 'delimited',
  '.tsv': 'delimited',
  '.txt': 'delimited',
  '.xlsx': 'spreadsheet',
  '.xls': 'spreadsheet',
}

export function detectFileKind(filename: string): FileKind {
  const kind = FILE_KINDS[extname(filename).toLowerCase()]
  if (!kind) throw new UnsupportedFileTypeError(filename)
  return kind
}

export interface UploadInput {
  filename: string
  size: number
}

// Everything one upload needs; nothing is shared between uploads
export interface UploadContext {
  filename: string
  size: number
  kind: FileKind
  config: PipelineConfig
  startedAt: number
}

export interface PipelineResult {
  filename: string
  // null for spreadsheets, which carry no text encoding
  encoding: string | null
  mapping: ColumnMapping
  report: ValidationReport
  transactions: CategorizedRecord[]
  summary: FinancialSummary
  categories: CategorySummary
  monthlyTrend: MonthlyTrendEntry[]
  outliers: OutlierFlag[]
}

function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

export function createUploadContext(input: UploadInput, config: PipelineConfig): UploadContext {
  return {
    filename: input.filename,
    size: input.size,
    kind: detectFileKind(input.filename),
    config,
    startedAt: Date.now(),
  }
}

function readTable(context: UploadContext, bytes: Uint8Array): { table: RawTable; encoding: string | null } {
  if (context.kind === 'delimited') {
    return decodeTable(bytes, context.config.encodings)
  }

  try {
    return { table: readSpreadsheet(bytes), encoding: null }
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    console.error(`[pipeline] "${context.filename}": spreadsheet read FAILED — ${message}`)
    throw new UnsupportedFileTypeError(context.filename)
  }
}

/**
 * Runs every stage for one upload. Terminal problems (empty, oversized or
 * unreadable files, missing columns) throw a PipelineError; row-level
 * problems are reported in `report` and never abort the upload.
 */
export function processUpload(context: UploadContext, bytes: Uint8Array): PipelineResult {
  const { filename, config } = context
  const label = `[pipeline] "${filename}"`

  if (bytes.length === 0) {
    throw new PipelineError('EMPTY_FILE', 'The uploaded file is empty. Please upload a CSV or Excel file with transactions.')
  }
  if (bytes.length > config.maxUploadBytes) {
    throw new PipelineError(
      'FILE_TOO_LARGE',
      `File is too large (${formatMegabytes(bytes.length)}). Maximum upload size is ${formatMegabytes(config.maxUploadBytes)}.`
    )
  }

  console.log(`${label}: starting (${(bytes.length / 1024).toFixed(0)}KB ${context.kind})`)

  const { table, encoding } = readTable(context, bytes)
  console.log(`${label}: read ${table.rows.length} rows, ${table.headers.length} columns${encoding ? ` (${encoding})` : ''}`)

  const mapping = resolveColumnMapping(table, config.bankLayouts)
  console.log(`${label}: layout ${mapping.label} (${mapping.source})`)

  const normalized = normalizeRecords(table, mapping)
  const { records, report } = validateRecords(normalized, {
    dayFirst: config.dateOrder === 'day-first',
    minValidRows: config.minValidRows,
  })
  console.log(`${label}: validation — ${report.validRows}/${report.totalRows} valid, ${report.skippedRows} skipped`)
  for (const warning of report.warnings) {
    console.warn(`${label}: ${warning}`)
  }

  const transactions = categorizeTransactions(records, config.categoryRules)
  const result: PipelineResult = {
    filename,
    encoding,
    mapping,
    report,
    transactions,
    summary: getFinancialSummary(transactions),
    categories: categorySummary(transactions),
    monthlyTrend: monthlyTrend(transactions),
    outliers: outlierFlags(transactions, config.outlierThreshold),
  }

  console.log(`${label}: complete — ${transactions.length} transactions, ${result.outliers.length} outliers (${((Date.now() - context.startedAt) / 1000).toFixed(1)}s)`)
  return result
}

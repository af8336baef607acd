import type { CanonicalField } from '@/types/transactions'

export type PipelineErrorCode =
  | 'EMPTY_FILE'
  | 'FILE_TOO_LARGE'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'UNSUPPORTED_ENCODING'
  | 'UNREADABLE_FILE'
  | 'MISSING_REQUIRED_COLUMNS'

/**
 * Terminal failure for a whole upload. `message` is shown to the user as-is,
 * so it must describe the remedy rather than the internal cause.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode

  constructor(code: PipelineErrorCode, message: string) {
    super(message)
    this.name = 'PipelineError'
    this.code = code
  }
}

export class EncodingError extends PipelineError {
  readonly attempted: string[]

  constructor(attempted: string[]) {
    super(
      'UNSUPPORTED_ENCODING',
      `Could not recognise the file's text encoding (tried ${attempted.join(', ')}). Please re-export the file as UTF-8 CSV.`
    )
    this.name = 'EncodingError'
    this.attempted = attempted
  }
}

export class TableParseError extends PipelineError {
  constructor(encoding: string) {
    super(
      'UNREADABLE_FILE',
      `The file decoded as ${encoding} but its rows could not be read. Please check it is a valid CSV export.`
    )
    this.name = 'TableParseError'
  }
}

export const EXPECTED_FORMAT = 'Date,Description,Amount,Category\n25/12/2024,Tesco,-45.30,Groceries'

export class MissingColumnsError extends PipelineError {
  readonly missing: CanonicalField[]
  readonly expectedFormat = EXPECTED_FORMAT

  constructor(missing: CanonicalField[]) {
    super(
      'MISSING_REQUIRED_COLUMNS',
      `Unable to detect required columns (${missing.join(', ')}). Please check the file format. Expected columns like:\n${EXPECTED_FORMAT}`
    )
    this.name = 'MissingColumnsError'
    this.missing = missing
  }
}

export class UnsupportedFileTypeError extends PipelineError {
  constructor(filename: string) {
    super(
      'UNSUPPORTED_FILE_TYPE',
      `File format not recognised for "${filename}". Please upload a CSV or Excel file.`
    )
    this.name = 'UnsupportedFileTypeError'
  }
}

import type { RawTable } from '@/types/transactions'
import { EncodingError, TableParseError } from '@/lib/errors'
import { parseDelimitedText } from './table'

export interface DecodedTable {
  table: RawTable
  encoding: string
}

function decodeStrict(bytes: Uint8Array, encoding: string): string {
  // Throws RangeError for unknown labels, TypeError for malformed input
  const decoder = new TextDecoder(encoding, { fatal: true })
  return decoder.decode(bytes)
}

function decodeText(bytes: Uint8Array, encodings: string[]): { text: string; encoding: string } {
  const attempted: string[] = []

  for (const encoding of encodings) {
    attempted.push(encoding)
    try {
      return { text: decodeStrict(bytes, encoding), encoding }
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error'
      console.warn(`[ingest] decode as ${encoding} failed — ${message}`)
    }
  }

  throw new EncodingError(attempted)
}

/**
 * Decodes the upload with the first candidate encoding that accepts it, then
 * parses the text once. The byte buffer is only read, never copied or stored.
 */
export function decodeTable(bytes: Uint8Array, encodings: string[]): DecodedTable {
  const { text, encoding } = decodeText(bytes, encodings)

  try {
    return { table: parseDelimitedText(text), encoding }
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    console.error(`[ingest] parse after decoding as ${encoding} FAILED — ${message}`)
    throw new TableParseError(encoding)
  }
}

import { describe, it, expect } from 'vitest'
import { DEFAULT_BANK_LAYOUTS } from '@/lib/config'
import { MissingColumnsError } from '@/lib/errors'
import {
  detectKnownLayout,
  inferColumnMapping,
  normalizeRecords,
  profileColumns,
  resolveColumnMapping,
} from '@/lib/ingest/layouts'
import type { RawTable } from '@/types/transactions'

function table(headers: string[], rows: Array<Array<string | null>>): RawTable {
  return {
    headers,
    rows: rows.map(row => Object.fromEntries(headers.map((h, i) => [h, row[i] ?? null]))),
  }
}

describe('detectKnownLayout', () => {
  it('prefers the Monzo Description column over Name', () => {
    const headers = ['Transaction ID', 'Date', 'Time', 'Type', 'Name', 'Emoji', 'Category', 'Amount', 'Description']
    expect(detectKnownLayout(headers, DEFAULT_BANK_LAYOUTS)).toEqual({
      layout: 'monzo',
      label: 'Monzo',
      source: 'known',
      columns: { Date: 'Date', Amount: 'Amount', Description: 'Description', Category: 'Category' },
    })
  })

  it('uses Name for Monzo exports without a Description column', () => {
    const mapping = detectKnownLayout(['Date', 'Name', 'Amount', 'Category'], DEFAULT_BANK_LAYOUTS)
    expect(mapping?.columns.Description).toBe('Name')
  })

  it('matches headers case-insensitively and keeps the original header text', () => {
    const mapping = detectKnownLayout(['STARTED DATE', ' Description ', 'Amount', 'Fee'], DEFAULT_BANK_LAYOUTS)
    expect(mapping?.layout).toBe('revolut')
    expect(mapping?.columns).toEqual({ Date: 'STARTED DATE', Amount: 'Amount', Description: ' Description ' })
  })

  it('matches Barclays by its Memo column', () => {
    const mapping = detectKnownLayout(['Number', 'Date', 'Account', 'Amount', 'Subcategory', 'Memo'], DEFAULT_BANK_LAYOUTS)
    expect(mapping?.layout).toBe('barclays')
    expect(mapping?.columns.Description).toBe('Memo')
  })

  it('falls through to the standard layout', () => {
    const mapping = detectKnownLayout(['Date', 'Description', 'Amount', 'Category'], DEFAULT_BANK_LAYOUTS)
    expect(mapping?.layout).toBe('standard')
    expect(mapping?.columns.Category).toBe('Category')
  })

  it('returns null when no layout has all its required headers', () => {
    expect(detectKnownLayout(['TxnDate', 'Merchant', 'Value'], DEFAULT_BANK_LAYOUTS)).toBeNull()
  })

  it('uses whatever layout table it is given', () => {
    const custom = [{ id: 'acme', name: 'Acme Bank', columns: { posted: 'Date' as const, value: 'Amount' as const }, optional: {} }]
    expect(detectKnownLayout(['Posted', 'Value'], custom)?.layout).toBe('acme')
    expect(detectKnownLayout(['Date', 'Description', 'Amount'], custom)).toBeNull()
  })
})

describe('profileColumns', () => {
  it('classifies columns from sampled content', () => {
    const t = table(['When', 'What', 'How much'], [
      ['01/03/2024', 'Tesco', '-12.00'],
      ['02/03/2024', 'Costa', '-3.10'],
      ['03/03/2024', 'Salary', '2000'],
    ])
    expect(profileColumns(t)).toEqual([
      { header: 'When', dateLike: true, amountLike: false, hasText: true },
      { header: 'What', dateLike: false, amountLike: false, hasText: true },
      { header: 'How much', dateLike: false, amountLike: true, hasText: true },
    ])
  })

  it('marks a column without values as having no text', () => {
    const t = table(['Date', 'Notes'], [['01/03/2024', null], ['02/03/2024', '  ']])
    expect(profileColumns(t)[1]).toEqual({ header: 'Notes', dateLike: false, amountLike: false, hasText: false })
  })
})

describe('inferColumnMapping', () => {
  it('assigns Date, Amount and Description from content', () => {
    const t = table(['TxnDate', 'Merchant', 'Value'], [
      ['2024-01-05', 'Coffee shop', '-3.50'],
      ['2024-01-06', 'Bookshop', '-12.99'],
      ['2024-01-07', 'Employer Ltd', '1800.00'],
    ])
    expect(inferColumnMapping(t)).toEqual({ Date: 'TxnDate', Amount: 'Value', Description: 'Merchant' })
  })

  it('picks a category column by its header', () => {
    const t = table(['Posted', 'Payee', 'Type', 'Debit/Credit'], [
      ['05/01/2024', 'Tesco', 'Groceries', '-20.00'],
      ['06/01/2024', 'Shell', 'Transport', '-40.00'],
    ])
    expect(inferColumnMapping(t)).toEqual({ Date: 'Posted', Amount: 'Debit/Credit', Description: 'Payee', Category: 'Type' })
  })

  it('skips an empty column when choosing the description', () => {
    const t = table(['TxnDate', 'Notes', 'Merchant', 'Value'], [
      ['2024-01-05', null, 'Coffee shop', '-3.50'],
      ['2024-01-06', null, 'Bookshop', '-12.99'],
    ])
    expect(inferColumnMapping(t)).toEqual({ Date: 'TxnDate', Amount: 'Value', Description: 'Merchant' })
  })

  it('does not take an empty column as the category', () => {
    const t = table(['Posted', 'Payee', 'Tag', 'Amount'], [
      ['05/01/2024', 'Tesco', null, '-20.00'],
      ['06/01/2024', 'Shell', null, '-40.00'],
    ])
    expect(inferColumnMapping(t)).toEqual({ Date: 'Posted', Amount: 'Amount', Description: 'Payee' })
  })
})

describe('resolveColumnMapping', () => {
  it('reports inferred mappings as auto-detected', () => {
    const t = table(['TxnDate', 'Merchant', 'Value'], [['2024-01-05', 'Coffee shop', '-3.50']])
    expect(resolveColumnMapping(t, DEFAULT_BANK_LAYOUTS)).toEqual({
      layout: 'unknown',
      label: 'Auto-detected',
      source: 'inferred',
      columns: { Date: 'TxnDate', Amount: 'Value', Description: 'Merchant' },
    })
  })

  it('throws when no amount column can be found', () => {
    const t = table(['When', 'What'], [['05/01/2024', 'Tesco']])
    expect(() => resolveColumnMapping(t, DEFAULT_BANK_LAYOUTS)).toThrow(MissingColumnsError)
    expect(() => resolveColumnMapping(t, DEFAULT_BANK_LAYOUTS)).toThrow(
      'Unable to detect required columns (Amount). Please check the file format. Expected columns like:\n' +
      'Date,Description,Amount,Category\n25/12/2024,Tesco,-45.30,Groceries'
    )
  })

  it('lists both fields when neither can be found', () => {
    const t = table(['Notes'], [['hello']])
    try {
      resolveColumnMapping(t, DEFAULT_BANK_LAYOUTS)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(MissingColumnsError)
      if (error instanceof MissingColumnsError) {
        expect(error.missing).toEqual(['Date', 'Amount'])
        expect(error.code).toBe('MISSING_REQUIRED_COLUMNS')
      }
    }
  })
})

describe('normalizeRecords', () => {
  it('projects rows onto canonical fields with 1-based row numbers', () => {
    const t = table(['Date', 'Description', 'Amount'], [
      ['25/12/2024', 'Tesco', '-45.30'],
      ['26/12/2024', null, '10'],
    ])
    const mapping = resolveColumnMapping(t, DEFAULT_BANK_LAYOUTS)

    expect(normalizeRecords(t, mapping)).toEqual([
      { rowIndex: 1, date: '25/12/2024', description: 'Tesco', amount: '-45.30', category: null },
      { rowIndex: 2, date: '26/12/2024', description: '', amount: '10', category: null },
    ])
  })
})

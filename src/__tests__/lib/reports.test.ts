import { describe, it, expect } from 'vitest'
import {
  categorySummary,
  getFinancialSummary,
  incomeExpenseTotals,
  monthlyTrend,
  outlierFlags,
  savingsRate,
} from '@/lib/reports'
import type { CategorizedRecord } from '@/types/transactions'

let nextRow = 1
function txn(date: string, description: string, amount: number, category: string): CategorizedRecord {
  return { rowIndex: nextRow++, date, description, amount, category }
}

const SCENARIO_A = [
  txn('2024-12-25', 'Tesco', -45.3, 'Groceries'),
  txn('2024-12-26', 'Salary', 2500, 'Income'),
]

describe('getFinancialSummary', () => {
  it('computes totals, net savings and savings rate', () => {
    expect(getFinancialSummary(SCENARIO_A)).toEqual({
      totalIncome: 2500,
      totalExpenses: 45.3,
      netSavings: 2454.7,
      savingsRate: 98.19,
    })
  })

  it('reports a zero savings rate without income', () => {
    expect(getFinancialSummary([txn('2024-01-01', 'Tesco', -10, 'Groceries')])).toEqual({
      totalIncome: 0,
      totalExpenses: 10,
      netSavings: -10,
      savingsRate: 0,
    })
  })

  it('allows a negative savings rate', () => {
    expect(savingsRate(100, -50)).toBe(-50)
  })

  it('keeps net savings equal to income minus expenses', () => {
    const records = [
      txn('2024-01-01', 'Salary', 1999.99, 'Income'),
      txn('2024-01-02', 'Rent', -850.5, 'Bills'),
      txn('2024-01-03', 'Coffee', -3.2, 'Eating Out'),
    ]
    const summary = getFinancialSummary(records)
    expect(summary.netSavings).toBeCloseTo(summary.totalIncome - summary.totalExpenses, 2)
  })

  it('counts positive non-income amounts as neither income nor expense', () => {
    expect(incomeExpenseTotals([txn('2024-01-01', 'Amazon', 20, 'Shopping')])).toEqual({ income: 0, expenses: 0 })
  })
})

describe('categorySummary', () => {
  it('matches the single-expense example', () => {
    expect(categorySummary(SCENARIO_A)).toEqual([{ category: 'Groceries', amount: 45.3, percentage: 100 }])
  })

  it('sorts by spend and breaks ties by name', () => {
    const records = [
      txn('2024-01-01', 'Bus', -50, 'Transport'),
      txn('2024-01-02', 'Gas', -400, 'Bills'),
      txn('2024-01-03', 'Tesco', -450, 'Groceries'),
      txn('2024-01-04', 'Pizza', -50, 'Eating Out'),
    ]
    expect(categorySummary(records)).toEqual([
      { category: 'Groceries', amount: 450, percentage: 47.4 },
      { category: 'Bills', amount: 400, percentage: 42.1 },
      { category: 'Eating Out', amount: 50, percentage: 5.3 },
      { category: 'Transport', amount: 50, percentage: 5.3 },
    ])
  })

  it('excludes income and positive amounts', () => {
    const records = [
      txn('2024-01-01', 'Salary', 2000, 'Income'),
      txn('2024-01-02', 'Amazon return', 20, 'Shopping'),
      txn('2024-01-03', 'Amazon', -30, 'Shopping'),
    ]
    expect(categorySummary(records)).toEqual([{ category: 'Shopping', amount: 30, percentage: 100 }])
  })

  it('is empty without expenses', () => {
    expect(categorySummary([txn('2024-01-01', 'Salary', 2000, 'Income')])).toEqual([])
  })
})

describe('monthlyTrend', () => {
  it('orders months across a year boundary', () => {
    const records = [
      txn('2025-01-28', 'Salary', 2000, 'Income'),
      txn('2025-01-03', 'Rent', -500, 'Bills'),
      txn('2024-12-15', 'Tesco', -100, 'Groceries'),
    ]
    expect(monthlyTrend(records)).toEqual([
      { month: '2024-12', income: 0, expenses: 100, netSavings: -100, savingsRate: 0 },
      { month: '2025-01', income: 2000, expenses: 500, netSavings: 1500, savingsRate: 75 },
    ])
  })

  it('returns nothing for no records', () => {
    expect(monthlyTrend([])).toEqual([])
  })
})

describe('outlierFlags', () => {
  const records = [
    txn('2024-03-01', 'Laptop', -1000, 'Shopping'),
    txn('2024-03-02', 'Sofa', -1001, 'Shopping'),
    txn('2024-03-03', 'Bonus', 1500, 'Income'),
    txn('2024-03-04', 'Tesco', -40, 'Groceries'),
  ]

  it('flags amounts strictly above the threshold', () => {
    const flags = outlierFlags(records)
    expect(flags.map(f => f.description)).toEqual(['Sofa', 'Bonus'])
  })

  it('explains each flag', () => {
    expect(outlierFlags(records)[0]).toEqual({
      date: '2024-03-02',
      description: 'Sofa',
      amount: -1001,
      category: 'Shopping',
      reason: 'Extreme value: £1,001.00 exceeds the £1,000.00 review threshold',
    })
  })

  it('accepts a custom threshold', () => {
    expect(outlierFlags(records, 40).map(f => f.description)).toEqual(['Laptop', 'Sofa', 'Bonus'])
  })
})

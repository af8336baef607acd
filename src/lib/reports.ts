import { INCOME_CATEGORY } from '@/lib/categorize'
import { DEFAULT_OUTLIER_THRESHOLD } from '@/lib/config'
import { formatCurrencyPrecise, roundCurrency, roundTo } from '@/lib/format'
import type {
  CategorySummary,
  FinancialSummary,
  MonthlyTrendEntry,
  OutlierFlag,
} from '@/types/reports'
import type { CategorizedRecord } from '@/types/transactions'

type AggregateRecord = Pick<CategorizedRecord, 'amount' | 'category'>

const MONTH_KEY = /^(\d{4}-\d{2})-\d{2}$/

export function incomeExpenseTotals(records: AggregateRecord[]): { income: number; expenses: number } {
  let income = 0
  let expenses = 0
  for (const r of records) {
    if (r.category === INCOME_CATEGORY) income += r.amount
    else if (r.amount < 0) expenses += r.amount
  }
  return { income: roundCurrency(Math.abs(income)), expenses: roundCurrency(Math.abs(expenses)) }
}

export function netSavings(income: number, expenses: number): number {
  return roundCurrency(income - expenses)
}

export function savingsRate(income: number, net: number): number {
  if (income === 0) return 0
  return roundTo((net / income) * 100, 2)
}

export function getFinancialSummary(records: AggregateRecord[]): FinancialSummary {
  const { income, expenses } = incomeExpenseTotals(records)
  const net = netSavings(income, expenses)
  return {
    totalIncome: income,
    totalExpenses: expenses,
    netSavings: net,
    savingsRate: savingsRate(income, net),
  }
}

/**
 * Expense spend per category, largest first. Income and positive amounts
 * never contribute.
 */
export function categorySummary(records: AggregateRecord[]): CategorySummary {
  const totals = new Map<string, number>()
  for (const r of records) {
    if (r.category === INCOME_CATEGORY || r.amount >= 0) continue
    totals.set(r.category, (totals.get(r.category) ?? 0) + Math.abs(r.amount))
  }

  const grandTotal = [...totals.values()].reduce((s, v) => s + v, 0)
  return [...totals.entries()]
    .map(([category, amount]) => ({
      category,
      amount: roundCurrency(amount),
      percentage: grandTotal > 0 ? roundTo((amount / grandTotal) * 100, 1) : 0,
    }))
    .sort((a, b) => b.amount - a.amount || a.category.localeCompare(b.category))
}

export function monthlyTrend(records: Array<AggregateRecord & Pick<CategorizedRecord, 'date'>>): MonthlyTrendEntry[] {
  const groups = new Map<string, AggregateRecord[]>()
  for (const r of records) {
    const match = MONTH_KEY.exec(r.date)
    if (!match) continue
    const group = groups.get(match[1])
    if (group) group.push(r)
    else groups.set(match[1], [r])
  }

  return [...groups.keys()].sort().map(month => {
    const summary = getFinancialSummary(groups.get(month) ?? [])
    return {
      month,
      income: summary.totalIncome,
      expenses: summary.totalExpenses,
      netSavings: summary.netSavings,
      savingsRate: summary.savingsRate,
    }
  })
}

// Strictly greater than the threshold; an amount equal to it is not flagged
export function outlierFlags(records: CategorizedRecord[], threshold = DEFAULT_OUTLIER_THRESHOLD): OutlierFlag[] {
  return records
    .filter(r => Math.abs(r.amount) > threshold)
    .map(r => ({
      date: r.date,
      description: r.description,
      amount: r.amount,
      category: r.category,
      reason: `Extreme value: ${formatCurrencyPrecise(Math.abs(r.amount))} exceeds the ${formatCurrencyPrecise(threshold)} review threshold`,
    }))
}

import { roundCurrency, roundTo } from '@/lib/format'
import type { AdviceSummary, CategorySummary, FinancialSummary } from '@/types/reports'

export const DEFAULT_TOP_CATEGORIES = 5

export interface AdviceSummaryOptions {
  savingsGoal?: number
  topN?: number
}

/**
 * The payload handed to the advice generator. Percentages are shares of
 * total expenses, so they may not add up to 100 when only the top N
 * categories are included.
 */
export function prepareAdviceSummary(
  summary: FinancialSummary,
  categories: CategorySummary,
  options: AdviceSummaryOptions = {}
): AdviceSummary {
  const { savingsGoal, topN = DEFAULT_TOP_CATEGORIES } = options
  const expenses = summary.totalExpenses

  const result: AdviceSummary = {
    income: roundCurrency(summary.totalIncome),
    expenses: roundCurrency(expenses),
    net_savings: roundCurrency(summary.netSavings),
    savings_rate: roundTo(summary.savingsRate, 1),
    top_categories: [...categories]
      .sort((a, b) => b.amount - a.amount)
      .slice(0, topN)
      .map(c => ({
        category: c.category,
        amount: roundCurrency(c.amount),
        percentage: expenses > 0 ? roundTo((c.amount / expenses) * 100, 1) : 0,
      })),
    total_categories: categories.length,
  }

  if (savingsGoal !== undefined) {
    result.savings_goal = roundCurrency(savingsGoal)
    result.goal_gap = roundCurrency(savingsGoal - summary.netSavings)
  }

  return result
}

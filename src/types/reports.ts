export interface FinancialSummary {
  totalIncome: number
  totalExpenses: number
  netSavings: number
  savingsRate: number
}

export interface CategorySpend {
  category: string
  amount: number
  percentage: number
}

export type CategorySummary = CategorySpend[]

export interface MonthlyTrendEntry {
  month: string // YYYY-MM
  income: number
  expenses: number
  netSavings: number
  savingsRate: number
}

export interface OutlierFlag {
  date: string
  description: string
  amount: number
  category: string
  reason: string
}

// Serialized as-is into the advice prompt, hence snake_case
export interface AdviceSummary {
  income: number
  expenses: number
  net_savings: number
  savings_rate: number
  savings_goal?: number
  goal_gap?: number
  top_categories: Array<{ category: string; amount: number; percentage: number }>
  total_categories: number
}

export type AdviceErrorKind =
  | 'not_configured'
  | 'timeout'
  | 'rate_limited'
  | 'auth'
  | 'network'
  | 'unavailable'
  | 'invalid_response'

export type AdviceResult =
  | { ok: true; value: string }
  | { ok: false; errorKind: AdviceErrorKind; message: string }

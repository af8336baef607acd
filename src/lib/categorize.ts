import type { CategoryRuleSet } from '@/lib/config'
import type { CategorizedRecord, ValidatedRecord } from '@/types/transactions'

export const INCOME_CATEGORY = 'Income'
export const UNCATEGORIZED = 'Uncategorized'

export interface CategorizationInput {
  description: string
  amount: number
  category: string | null
}

export interface CategorizationStep {
  name: string
  apply: (input: CategorizationInput, ruleSet: CategoryRuleSet) => string | null
}

function containsAny(text: string, keywords: string[]): boolean {
  return keywords.some(keyword => text.includes(keyword.toLowerCase()))
}

// Evaluated in order; the first step returning a category wins
export const CATEGORIZATION_STEPS: CategorizationStep[] = [
  {
    name: 'existing-label',
    apply: input => input.category?.trim() || null,
  },
  {
    name: 'income-keyword',
    apply: (input, ruleSet) =>
      input.amount > 0 && containsAny(input.description.toLowerCase(), ruleSet.incomeKeywords)
        ? INCOME_CATEGORY
        : null,
  },
  {
    name: 'keyword-rules',
    apply: (input, ruleSet) => {
      const text = input.description.toLowerCase()
      return ruleSet.rules.find(rule => containsAny(text, rule.keywords))?.category ?? null
    },
  },
  {
    name: 'positive-amount',
    apply: input => (input.amount > 0 ? INCOME_CATEGORY : null),
  },
  {
    name: 'uncategorized',
    apply: () => UNCATEGORIZED,
  },
]

export function categorizeTransaction(
  input: CategorizationInput,
  ruleSet: CategoryRuleSet,
  steps: CategorizationStep[] = CATEGORIZATION_STEPS
): string {
  for (const step of steps) {
    const category = step.apply(input, ruleSet)
    if (category) return category
  }
  return UNCATEGORIZED
}

export function categorizeTransactions(
  records: ValidatedRecord[],
  ruleSet: CategoryRuleSet,
  steps: CategorizationStep[] = CATEGORIZATION_STEPS
): CategorizedRecord[] {
  return records.map(record => ({
    ...record,
    category: categorizeTransaction(record, ruleSet, steps),
  }))
}

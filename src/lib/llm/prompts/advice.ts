import type { PromptTemplate, ProviderName } from '../types'

const SYSTEM_CORE = `You are a personal finance coach helping users improve their financial health. You work from a monthly summary of one bank statement, in pounds sterling.

RULES:
- Every number you mention must come from the provided data. Do not invent merchants, categories or amounts.
- Be specific: name the category and the amount for every suggestion.
- Keep the tone practical and encouraging. No generic advice such as "create a budget".
- Plain text only. No markdown tables.`

const TASK = `Analyze this financial data and provide:

1. RECOMMENDATIONS (3-5 specific, actionable items):
   - Each recommendation should include a concrete savings amount
   - Be specific about which spending category to target
   - Provide practical steps the user can take immediately

2. MONEY HABIT (1 simple habit):
   - Suggest one easy-to-adopt daily or weekly habit
   - Make it specific and actionable

3. SPENDING LEAKS (explain the biggest issues):
   - Identify the 1-2 categories where the user is overspending most
   - Explain why these are problematic
   - Provide context based on typical budgeting guidelines

Format your response clearly with these three sections labeled.`

const ADVICE_PROMPTS: Record<ProviderName, PromptTemplate> = {
  anthropic: {
    system: SYSTEM_CORE,
    user: `<user_profile>
- Monthly Income: {income}
- Monthly Expenses: {expenses}
- Net Savings: {net_savings}
- Current Savings Rate: {savings_rate}
{savings_goal_section}
</user_profile>

<spending_breakdown>
{category_breakdown}
</spending_breakdown>

<summary_json>
{summary_json}
</summary_json>

${TASK}`,
  },
  openai: {
    system: SYSTEM_CORE,
    user: `## User Profile
- Monthly Income: {income}
- Monthly Expenses: {expenses}
- Net Savings: {net_savings}
- Current Savings Rate: {savings_rate}
{savings_goal_section}

## Spending Breakdown
{category_breakdown}

## Summary (JSON)
\`\`\`json
{summary_json}
\`\`\`

## Your Task
${TASK}`,
  },
}

export function getAdvicePrompt(provider: ProviderName): PromptTemplate {
  return ADVICE_PROMPTS[provider]
}

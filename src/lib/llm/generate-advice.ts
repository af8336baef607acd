import type { LLMProvider, LLMRequest, LLMResponse, ProviderName } from './types'
import type { ProviderForTask } from './factory'
import { getAdvicePrompt } from './prompts/advice'
import {
  DEFAULT_ADVICE_MAX_TOKENS,
  DEFAULT_ADVICE_RETRY_DELAY_MS,
  DEFAULT_ADVICE_TIMEOUT_MS,
} from './config'
import { formatCurrencyPrecise } from '@/lib/format'
import type { AdviceErrorKind, AdviceResult, AdviceSummary } from '@/types/reports'

export const ADVICE_MESSAGES: Record<AdviceErrorKind, string> = {
  not_configured: 'AI Coach unavailable. Please configure API key.',
  auth: 'AI Coach unavailable. Please configure API key.',
  timeout: 'AI Coach taking longer than expected. Using basic analysis.',
  rate_limited: 'AI Coach busy. Please try again in a moment.',
  network: 'AI Coach unavailable. Please check connection.',
  unavailable: 'AI Coach unavailable. Using basic analysis.',
  invalid_response: 'AI Coach unavailable. Using basic analysis.',
}

const MAX_ATTEMPTS = 2
const RETRYABLE: ReadonlySet<AdviceErrorKind> = new Set(['rate_limited', 'network', 'unavailable'])
const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN'])

export class AdviceTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Advice request exceeded ${timeoutMs}ms`)
    this.name = 'AdviceTimeoutError'
  }
}

export interface AdviceOptions {
  timeoutMs?: number
  retryDelayMs?: number
  maxTokens?: number
}

function goalSection(summary: AdviceSummary): string {
  const goal = summary.savings_goal
  if (goal === undefined) {
    return '- No specific savings goal set\n- Recommendation: Consider setting a monthly savings target'
  }

  const gap = summary.goal_gap ?? 0
  const share = goal !== 0 ? ` (${Math.round(Math.abs((gap / goal) * 100))}% ${gap > 0 ? 'short' : 'ahead'})` : ''
  let status: string
  if (gap > 0) status = `${formatCurrencyPrecise(gap)} short${share}`
  else if (gap < 0) status = `${formatCurrencyPrecise(Math.abs(gap))} ahead${share}`
  else status = 'On target'

  return `- Savings Goal: ${formatCurrencyPrecise(goal)}/month\n- Gap to Goal: ${status}`
}

export function formatCategoryBreakdown(summary: AdviceSummary): string {
  if (summary.top_categories.length === 0) return 'No category data available.'

  const lines = ['Top Spending Categories:']
  summary.top_categories.forEach((c, i) => {
    lines.push(`${i + 1}. ${c.category}: ${formatCurrencyPrecise(c.amount)} (${c.percentage.toFixed(1)}% of expenses)`)
  })
  lines.push('', `Total categories tracked: ${summary.total_categories}`)
  return lines.join('\n')
}

export function buildAdviceRequest(
  summary: AdviceSummary,
  providerName: ProviderName,
  model: string,
  maxTokens = DEFAULT_ADVICE_MAX_TOKENS
): LLMRequest {
  const prompt = getAdvicePrompt(providerName)
  const values: Record<string, string> = {
    income: formatCurrencyPrecise(summary.income),
    expenses: formatCurrencyPrecise(summary.expenses),
    net_savings: formatCurrencyPrecise(summary.net_savings),
    savings_rate: `${summary.savings_rate.toFixed(1)}%`,
    savings_goal_section: goalSection(summary),
    category_breakdown: formatCategoryBreakdown(summary),
    summary_json: JSON.stringify(summary, null, 2),
  }
  // Replacer function so category names containing `$` are inserted literally
  const content = prompt.user.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder)

  return {
    system: prompt.system,
    messages: [{ role: 'user', content }],
    maxTokens,
    model,
  }
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') return error.code
  const cause = error.cause
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code
  return undefined
}

/**
 * Maps SDK and transport failures onto advice error kinds. Both SDKs expose
 * the HTTP status on `status`; connection failures carry a Node error code
 * on the error or its cause.
 */
export function classifyAdviceError(error: unknown): AdviceErrorKind {
  if (error instanceof AdviceTimeoutError) return 'timeout'
  if (!(error instanceof Error)) return 'unavailable'

  if ('status' in error && typeof error.status === 'number') {
    if (error.status === 429) return 'rate_limited'
    if (error.status === 401 || error.status === 403) return 'auth'
    return 'unavailable'
  }

  if (error.name === 'AbortError' || /timed out/i.test(error.message)) return 'timeout'

  const code = errorCode(error)
  if ((code && NETWORK_CODES.has(code)) || /connection error/i.test(error.message)) return 'network'

  return 'unavailable'
}

async function completeWithTimeout(
  provider: LLMProvider,
  request: LLMRequest,
  timeoutMs: number
): Promise<LLMResponse> {
  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout
      reject(new AdviceTimeoutError(timeoutMs))
      controller.abort()
    }, timeoutMs)
  })

  try {
    return await Promise.race([provider.complete({ ...request, signal: controller.signal }), timeout])
  } finally {
    clearTimeout(timer)
  }
}

function failure(errorKind: AdviceErrorKind): AdviceResult {
  return { ok: false, errorKind, message: ADVICE_MESSAGES[errorKind] }
}

/**
 * Requests coaching advice for a prepared summary. Never throws: every
 * failure is reported through the result. Transient failures are retried
 * once; timeouts, auth failures and empty replies are not.
 */
export async function generateFinancialAdvice(
  target: ProviderForTask | null,
  summary: AdviceSummary,
  options: AdviceOptions = {}
): Promise<AdviceResult> {
  if (!target) {
    console.warn('[advice] No provider configured; skipping advice')
    return failure('not_configured')
  }

  const {
    timeoutMs = DEFAULT_ADVICE_TIMEOUT_MS,
    retryDelayMs = DEFAULT_ADVICE_RETRY_DELAY_MS,
    maxTokens = DEFAULT_ADVICE_MAX_TOKENS,
  } = options
  const request = buildAdviceRequest(summary, target.providerName, target.model, maxTokens)

  for (let attempt = 1; ; attempt++) {
    const t0 = Date.now()
    try {
      const response = await completeWithTimeout(target.provider, request, timeoutMs)
      const text = response.text.trim()
      if (!text) {
        console.warn(`[advice] Empty response from ${target.model}`)
        return failure('invalid_response')
      }
      console.log(`[advice] ${target.providerName}/${target.model} responded in ${((Date.now() - t0) / 1000).toFixed(1)}s`)
      return { ok: true, value: text }
    } catch (error) {
      const kind = classifyAdviceError(error)
      const message = error instanceof Error ? error.message : 'Unknown error'
      console.warn(`[advice] Attempt ${attempt}/${MAX_ATTEMPTS} failed (${kind}): ${message}`)

      if (attempt >= MAX_ATTEMPTS || !RETRYABLE.has(kind)) {
        return failure(kind)
      }
      await new Promise(r => setTimeout(r, retryDelayMs))
    }
  }
}

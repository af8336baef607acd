import { z } from 'zod'
import type { ProviderName } from './types'

export interface ModelInfo {
  id: string
  name: string
}

export interface ProviderConfig {
  name: string
  envKey: string
  models: ModelInfo[]
  defaultModel: string
}

export const PROVIDERS: Record<ProviderName, ProviderConfig> = {
  anthropic: {
    name: 'Anthropic',
    envKey: 'ANTHROPIC_API_KEY',
    models: [
      { id: 'claude-sonnet-4-5-20250929', name: 'Claude Sonnet 4.5' },
      { id: 'claude-haiku-4-5-20251001', name: 'Claude Haiku 4.5' },
    ],
    defaultModel: 'claude-haiku-4-5-20251001',
  },
  openai: {
    name: 'OpenAI',
    envKey: 'OPENAI_API_KEY',
    models: [
      { id: 'gpt-4o', name: 'GPT-4o' },
      { id: 'gpt-4o-mini', name: 'GPT-4o Mini' },
      { id: 'gpt-5-mini', name: 'GPT-5 Mini' },
    ],
    defaultModel: 'gpt-4o-mini',
  },
}

export function isModelValidForProvider(provider: ProviderName, modelId: string): boolean {
  const config = PROVIDERS[provider]
  return config.models.some(m => m.id === modelId)
}

export const DEFAULT_ADVICE_PROVIDER: ProviderName = 'anthropic'
export const DEFAULT_ADVICE_TIMEOUT_MS = 15_000
export const DEFAULT_ADVICE_RETRY_DELAY_MS = 2_000
export const DEFAULT_ADVICE_MAX_TOKENS = 1024

export interface AdviceConfig {
  provider: ProviderName
  model: string
  timeoutMs: number
  retryDelayMs: number
  maxTokens: number
}

const adviceEnvSchema = z.object({
  ADVICE_PROVIDER: z.enum(['anthropic', 'openai']).optional(),
  ADVICE_MODEL: z.string().min(1).optional(),
  ADVICE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  ADVICE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
})

/**
 * Resolves the advice provider and model from the environment. An unknown
 * model id falls back to the provider default rather than failing.
 */
export function loadAdviceConfig(env: NodeJS.ProcessEnv = process.env): AdviceConfig {
  const parsed = adviceEnvSchema.parse(env)
  const provider = parsed.ADVICE_PROVIDER ?? DEFAULT_ADVICE_PROVIDER
  const model = parsed.ADVICE_MODEL && isModelValidForProvider(provider, parsed.ADVICE_MODEL)
    ? parsed.ADVICE_MODEL
    : PROVIDERS[provider].defaultModel

  return {
    provider,
    model,
    timeoutMs: parsed.ADVICE_TIMEOUT_MS ?? DEFAULT_ADVICE_TIMEOUT_MS,
    retryDelayMs: parsed.ADVICE_RETRY_DELAY_MS ?? DEFAULT_ADVICE_RETRY_DELAY_MS,
    maxTokens: DEFAULT_ADVICE_MAX_TOKENS,
  }
}

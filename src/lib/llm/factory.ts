import type { LLMProvider, ProviderName } from './types'
import { PROVIDERS, type AdviceConfig } from './config'
import { AnthropicProvider } from './anthropic/provider'
import { OpenAIProvider } from './openai/provider'

// Keyed by provider and API key, so a different key gets its own client
const providerCache = new Map<string, LLMProvider>()

function createProvider(name: ProviderName, apiKey: string): LLMProvider {
  switch (name) {
    case 'anthropic': return new AnthropicProvider(apiKey)
    case 'openai': return new OpenAIProvider(apiKey)
  }
}

function getOrCreateProvider(name: ProviderName, apiKey: string): LLMProvider {
  const cacheKey = `${name}:${apiKey}`
  const cached = providerCache.get(cacheKey)
  if (cached) return cached

  const provider = createProvider(name, apiKey)
  providerCache.set(cacheKey, provider)
  return provider
}

export function clearProviderCache(): void {
  providerCache.clear()
}

export interface ProviderForTask {
  provider: LLMProvider
  providerName: ProviderName
  model: string
}

// Returns null when the provider's API key is not set
export function getAdviceProvider(
  config: AdviceConfig,
  env: NodeJS.ProcessEnv = process.env
): ProviderForTask | null {
  const apiKey = env[PROVIDERS[config.provider].envKey]
  if (!apiKey) return null

  return {
    provider: getOrCreateProvider(config.provider, apiKey),
    providerName: config.provider,
    model: config.model,
  }
}

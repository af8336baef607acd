export interface LLMRequest {
  system?: string
  messages: Array<{ role: 'user' | 'assistant'; content: string }>
  maxTokens: number
  model: string
  signal?: AbortSignal
}

export interface LLMResponse {
  text: string
}

export interface LLMProvider {
  complete(request: LLMRequest): Promise<LLMResponse>
}

export type ProviderName = 'anthropic' | 'openai'

export interface PromptTemplate {
  system?: string
  user: string
}

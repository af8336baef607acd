import Anthropic from '@anthropic-ai/sdk'
import type { LLMProvider, LLMRequest, LLMResponse } from '../types'

export class AnthropicProvider implements LLMProvider {
  private client: Anthropic

  constructor(apiKey?: string) {
    // Retries are decided by the advice generator
    this.client = new Anthropic({ apiKey, maxRetries: 0 })
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: request.maxTokens,
      messages: request.messages,
      ...(request.system ? { system: request.system } : {}),
    }

    const response = await this.client.messages.create(params, { signal: request.signal })
    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('')
    return { text }
  }
}

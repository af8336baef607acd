import OpenAI from 'openai'
import type { LLMProvider, LLMRequest, LLMResponse } from '../types'

export class OpenAIProvider implements LLMProvider {
  private client: OpenAI

  constructor(apiKey?: string) {
    this.client = new OpenAI({ apiKey, maxRetries: 0 })
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }> = []

    if (request.system) {
      messages.push({ role: 'system', content: request.system })
    }
    for (const msg of request.messages) {
      messages.push({ role: msg.role, content: msg.content })
    }

    const response = await this.client.chat.completions.create({
      model: request.model,
      max_completion_tokens: request.maxTokens,
      messages,
    }, { signal: request.signal })

    const choice = response.choices[0]
    const text = choice?.message?.content ?? ''
    if (text.trim()) {
      return { text }
    }

    const finishReason = choice?.finish_reason
    const refusal = choice?.message?.refusal
    console.warn(`[openai] Empty response from ${request.model} (finish_reason: ${finishReason ?? 'none'}, refusal: ${refusal ?? 'none'})`)

    if (refusal) {
      throw new Error(`OpenAI ${request.model} refused the request: ${refusal}`)
    }
    if (finishReason === 'length') {
      throw new Error(`OpenAI ${request.model} hit token limit (max_completion_tokens: ${request.maxTokens})`)
    }
    return { text: '' }
  }
}

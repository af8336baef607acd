import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from '@/lib/config'
import { prepareAdviceSummary } from '@/lib/insights/advice-summary'
import { createUploadContext, processUpload, type PipelineResult, type UploadInput } from '@/lib/pipeline'
import type { AdviceResult, AdviceSummary } from '@/types/reports'

export type AdviceGenerator = (summary: AdviceSummary) => Promise<AdviceResult>

/**
 * Holds the latest upload's result and advice. Loading a new file discards
 * the previous state before anything is parsed, so a failed upload leaves
 * the session empty rather than showing stale numbers.
 */
export class UploadSession {
  private result: PipelineResult | null = null
  private advice: AdviceResult | null = null

  constructor(private readonly config: PipelineConfig = DEFAULT_PIPELINE_CONFIG) {}

  load(input: UploadInput, bytes: Uint8Array): PipelineResult {
    this.clear()
    const context = createUploadContext(input, this.config)
    this.result = processUpload(context, bytes)
    return this.result
  }

  get current(): PipelineResult | null {
    return this.result
  }

  get lastAdvice(): AdviceResult | null {
    return this.advice
  }

  clear(): void {
    this.result = null
    this.advice = null
  }

  adviceSummary(savingsGoal?: number): AdviceSummary | null {
    if (!this.result) return null
    return prepareAdviceSummary(this.result.summary, this.result.categories, { savingsGoal })
  }

  async requestAdvice(generate: AdviceGenerator, savingsGoal?: number): Promise<AdviceResult> {
    const loaded = this.result
    const summary = this.adviceSummary(savingsGoal)
    if (!loaded || !summary) {
      throw new Error('No statement loaded')
    }

    const advice = await generate(summary)
    // A newer upload (or clear) while waiting makes this advice stale
    if (this.result === loaded) {
      this.advice = advice
    }
    return advice
  }
}

import { z } from 'zod'
import type { EmotionClassifierProvider, EmotionScore } from '../capabilities'
import { getLogger } from '../logger'
import { fetchOk, isAbort, type Fetcher } from './http'

const ScoreSchema = z.object({ label: z.string(), score: z.number() })

// The inference API answers `[[{label, score}, ...]]` for a single input, and
// some deployments flatten it to `[{label, score}, ...]`.
const ClassifierResponseSchema = z.union([z.array(z.array(ScoreSchema)), z.array(ScoreSchema)])

export type HuggingFaceClassifierOptions = {
  token: string
  model: string
  baseUrl?: string
  fetcher?: Fetcher
}

export class HuggingFaceEmotionClassifier implements EmotionClassifierProvider {
  readonly name = 'huggingface-classifier'
  private readonly url: string
  private readonly fetcher: Fetcher

  constructor(private readonly options: HuggingFaceClassifierOptions) {
    const base = (options.baseUrl ?? 'https://api-inference.huggingface.co').replace(/\/+$/, '')
    this.url = `${base}/models/${options.model}`
    this.fetcher = options.fetcher ?? globalThis.fetch
  }

  /**
   * Transport and HTTP failures throw ProviderError. A body that is not a
   * score list resolves to no scores, which the Emotion agent reads as neutral.
   */
  async classify(text: string, signal: AbortSignal): Promise<EmotionScore[]> {
    const response = await fetchOk(this.fetcher, this.name, this.url, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.options.token}`,
        'Content-Type': 'application/json'
      },
      body: JSON.stringify({ inputs: text, options: { wait_for_model: true } }),
      signal
    })

    let json: unknown
    try {
      json = await response.json()
    } catch (err) {
      if (isAbort(err)) throw err
      json = undefined
    }

    const parsed = ClassifierResponseSchema.safeParse(json)
    if (!parsed.success) {
      getLogger().warn('classifier_payload_malformed', { provider: this.name, status: response.status })
      return []
    }
    const scores: EmotionScore[] = []
    for (const entry of parsed.data) {
      if (Array.isArray(entry)) return entry
      scores.push(entry)
    }
    return scores
  }
}

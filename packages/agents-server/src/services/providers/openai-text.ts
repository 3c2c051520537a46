import OpenAI from 'openai'
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions'
import { ProviderError, kindFromStatus, type TextGeneratorProvider, type TextRequest } from '../capabilities'

type CompletionLike = { choices: Array<{ message: { content: string | null } }> }

/** The slice of the OpenAI client this provider uses; tests pass a fake. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<CompletionLike>
    }
  }
}

export type OpenAITextOptions = {
  apiKey?: string
  model: string
  client?: ChatCompletionsClient
}

export class OpenAITextGenerator implements TextGeneratorProvider {
  readonly name = 'openai-text'
  private readonly client: ChatCompletionsClient

  constructor(private readonly options: OpenAITextOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 })
  }

  async generate(request: TextRequest, signal: AbortSignal): Promise<string> {
    let completion: CompletionLike
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt }
          ],
          max_tokens: request.maxTokens ?? 250,
          temperature: request.temperature ?? 0.7
        },
        { signal }
      )
    } catch (err) {
      if (signal.aborted) throw err
      if (err instanceof OpenAI.APIError && typeof err.status === 'number') {
        throw new ProviderError(err.message, {
          kind: kindFromStatus(err.status),
          status: err.status,
          retryable: err.status >= 500 || err.status === 429
        })
      }
      throw new ProviderError(`openai request failed: ${err instanceof Error ? err.message : String(err)}`, {
        retryable: true
      })
    }

    const content = completion.choices[0]?.message.content?.trim() ?? ''
    if (!content) {
      throw new ProviderError('openai returned an empty completion', { retryable: true })
    }
    return content
  }
}

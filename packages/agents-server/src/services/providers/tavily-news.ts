import { z } from 'zod'
import type { NewsArticle } from '@aura/shared'
import type { NewsSearchProvider } from '../capabilities'
import { cleanText, requestJson, type Fetcher } from './http'

const ResultSchema = z.object({
  title: z.string().default(''),
  url: z.string().default(''),
  content: z.string().default('')
})

const SearchResponseSchema = z.object({ results: z.array(ResultSchema).default([]) })

export const MAX_NEWS_ARTICLES = 3

export type TavilyNewsOptions = {
  apiKey: string
  maxResults?: number
  fetcher?: Fetcher
}

export class TavilyNewsSearch implements NewsSearchProvider {
  readonly name = 'tavily-news'
  private readonly fetcher: Fetcher

  constructor(private readonly options: TavilyNewsOptions) {
    this.fetcher = options.fetcher ?? globalThis.fetch
  }

  async searchNews(query: string, signal: AbortSignal): Promise<NewsArticle[]> {
    const body = await requestJson(
      this.fetcher,
      this.name,
      'https://api.tavily.com/search',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          api_key: this.options.apiKey,
          query,
          max_results: this.options.maxResults ?? 7,
          search_depth: 'advanced',
          include_answer: false,
          include_images: false
        }),
        signal
      },
      SearchResponseSchema
    )

    const seen = new Set<string>()
    const articles: NewsArticle[] = []
    for (const result of body.results) {
      const title = cleanText(result.title, 100)
      if (!result.url || !title || seen.has(result.url)) continue
      seen.add(result.url)
      articles.push({
        title,
        url: result.url,
        source: 'Trusted Source',
        snippet: cleanText(result.content, 150)
      })
      if (articles.length >= MAX_NEWS_ARTICLES) break
    }
    return articles
  }
}

import { z } from 'zod'
import type { MediaItem } from '@aura/shared'
import type { VideoSearchProvider } from '../capabilities'
import { cleanText, requestJson, type Fetcher } from './http'

const ThumbnailSchema = z.object({ url: z.string() })

const SearchItemSchema = z.object({
  id: z.object({ videoId: z.string().optional() }).passthrough(),
  snippet: z
    .object({
      title: z.string().default(''),
      description: z.string().default(''),
      channelTitle: z.string().default(''),
      thumbnails: z
        .object({ high: ThumbnailSchema.optional(), medium: ThumbnailSchema.optional(), default: ThumbnailSchema.optional() })
        .default({})
    })
    .default({})
})

const SearchResponseSchema = z.object({ items: z.array(SearchItemSchema).default([]) })

export type YoutubeSearchOptions = {
  apiKey: string
  maxResults?: number
  videoDuration?: 'any' | 'short' | 'medium' | 'long'
  baseUrl?: string
  fetcher?: Fetcher
}

export class YoutubeVideoSearch implements VideoSearchProvider {
  readonly name = 'youtube-search'
  private readonly fetcher: Fetcher

  constructor(private readonly options: YoutubeSearchOptions) {
    this.fetcher = options.fetcher ?? globalThis.fetch
  }

  buildUrl(query: string): string {
    const url = new URL(`${this.options.baseUrl ?? 'https://www.googleapis.com/youtube/v3'}/search`)
    url.searchParams.set('part', 'snippet')
    url.searchParams.set('q', query)
    url.searchParams.set('type', 'video')
    url.searchParams.set('maxResults', String(this.options.maxResults ?? 5))
    url.searchParams.set('videoEmbeddable', 'true')
    url.searchParams.set('videoDuration', this.options.videoDuration ?? 'medium')
    url.searchParams.set('key', this.options.apiKey)
    return url.toString()
  }

  async searchVideo(query: string, signal: AbortSignal): Promise<MediaItem | null> {
    const body = await requestJson(this.fetcher, this.name, this.buildUrl(query), { signal }, SearchResponseSchema)
    for (const item of body.items) {
      const videoId = item.id.videoId
      const title = cleanText(item.snippet.title, 100)
      if (!videoId || !title) continue
      const thumbs = item.snippet.thumbnails
      return {
        title,
        url: `https://youtu.be/${videoId}`,
        description: cleanText(item.snippet.description, 200),
        thumbnail: (thumbs.high ?? thumbs.medium ?? thumbs.default)?.url ?? '',
        artist: cleanText(item.snippet.channelTitle, 50)
      }
    }
    return null
  }
}

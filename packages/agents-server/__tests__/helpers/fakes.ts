import type { MediaItem, NewsArticle } from '@aura/shared'
import {
  ProviderError,
  type EmotionClassifierProvider,
  type EmotionScore,
  type MusicSearchProvider,
  type NewsSearchProvider,
  type TextGeneratorProvider,
  type TextRequest,
  type VideoSearchProvider
} from '../../src/services/capabilities'
import { loadConfig, type AppConfig } from '../../src/services/config'

export const VIDEO: MediaItem = {
  title: 'Morning stretch',
  url: 'https://youtu.be/vid123',
  description: 'Ten gentle minutes',
  thumbnail: 'https://img.test/vid123.jpg',
  artist: 'Calm Channel'
}

export const TRACK: MediaItem = {
  title: 'Quiet Light',
  url: 'https://open.spotify.test/track/1',
  description: 'Listen on Spotify',
  thumbnail: 'https://img.test/album.jpg',
  artist: 'The Placeholders',
  uri: 'spotify:track:1'
}

export const ARTICLE: NewsArticle = {
  title: 'Community garden opens',
  url: 'https://news.test/garden',
  source: 'Trusted Source',
  snippet: 'Neighbours planted 40 trees.'
}

/** Rejects with an AbortError once `signal` aborts; never settles otherwise. */
export function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    const fail = () => {
      const err = new Error('aborted')
      err.name = 'AbortError'
      reject(err)
    }
    if (signal.aborted) fail()
    else signal.addEventListener('abort', fail, { once: true })
  })
}

export function classifier(result: EmotionScore[] | Error | 'hang'): EmotionClassifierProvider & { calls: string[] } {
  const calls: string[] = []
  return {
    name: 'fake-classifier',
    calls,
    async classify(text, signal) {
      calls.push(text)
      if (result === 'hang') return untilAborted(signal)
      if (result instanceof Error) throw result
      return result
    }
  }
}

export function video(result: MediaItem | null | Error | 'hang'): VideoSearchProvider {
  return {
    name: 'fake-video',
    async searchVideo(_query, signal) {
      if (result === 'hang') return untilAborted(signal)
      if (result instanceof Error) throw result
      return result
    }
  }
}

export function music(result: MediaItem | null | Error | 'hang'): MusicSearchProvider {
  return {
    name: 'fake-music',
    async searchMusic(_query, signal) {
      if (result === 'hang') return untilAborted(signal)
      if (result instanceof Error) throw result
      return result
    }
  }
}

export function news(result: NewsArticle[] | Error | 'hang', queries: string[] = []): NewsSearchProvider {
  return {
    name: 'fake-news',
    async searchNews(query, signal) {
      queries.push(query)
      if (result === 'hang') return untilAborted(signal)
      if (result instanceof Error) throw result
      return result
    }
  }
}

export function textGenerator(
  reply: string | Error | 'hang' | ((request: TextRequest) => string)
): TextGeneratorProvider & { requests: TextRequest[] } {
  const requests: TextRequest[] = []
  return {
    name: 'fake-text',
    requests,
    async generate(request, signal) {
      requests.push(request)
      if (reply === 'hang') return untilAborted(signal)
      if (reply instanceof Error) throw reply
      return typeof reply === 'function' ? reply(request) : reply
    }
  }
}

export const unavailable = (message = 'service down') => new ProviderError(message, { kind: 'ProviderUnavailable', retryable: false })

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    EMOTION_TIMEOUT_MS: '200',
    CURATOR_TIMEOUT_MS: '200',
    JOURNAL_TIMEOUT_MS: '200',
    SUPPORT_TIMEOUT_MS: '300',
    MEMORY_TIMEOUT_MS: '100',
    TURN_DEADLINE_MS: '1000',
    SUPPORT_CONTEXT_GRACE_MS: '50',
    CLASSIFIER_TIMEOUT_MS: '100',
    SEARCH_TIMEOUT_MS: '100',
    TEXT_TIMEOUT_MS: '150',
    CAPABILITY_RETRIES: '0',
    ...overrides
  })
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
}

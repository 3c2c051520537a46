import type { CapabilityProviders } from '../capabilities'
import type { AppConfig } from '../config'
import { HuggingFaceEmotionClassifier } from './huggingface-classifier'
import { OpenAITextGenerator } from './openai-text'
import { SpotifyMusicSearch } from './spotify-search'
import { TavilyNewsSearch } from './tavily-news'
import { YoutubeVideoSearch } from './youtube-search'
import type { Fetcher } from './http'

export { HuggingFaceEmotionClassifier } from './huggingface-classifier'
export { OpenAITextGenerator, type ChatCompletionsClient } from './openai-text'
export { SpotifyMusicSearch } from './spotify-search'
export { TavilyNewsSearch, MAX_NEWS_ARTICLES } from './tavily-news'
export { YoutubeVideoSearch } from './youtube-search'
export { cleanText, requestJson, type Fetcher } from './http'

/** A provider is configured only when its credentials are present. */
export function createProvidersFromConfig(config: AppConfig, fetcher?: Fetcher): CapabilityProviders {
  const providers: CapabilityProviders = {}
  if (config.HUGGINGFACE_TOKEN) {
    providers.classifier = new HuggingFaceEmotionClassifier({
      token: config.HUGGINGFACE_TOKEN,
      model: config.HUGGINGFACE_EMOTION_MODEL,
      baseUrl: config.HUGGINGFACE_API_BASE_URL,
      fetcher
    })
  }
  if (config.YOUTUBE_API_KEY) {
    providers.video = new YoutubeVideoSearch({ apiKey: config.YOUTUBE_API_KEY, fetcher })
  }
  if (config.SPOTIFY_CLIENT_ID && config.SPOTIFY_CLIENT_SECRET) {
    providers.music = new SpotifyMusicSearch({
      clientId: config.SPOTIFY_CLIENT_ID,
      clientSecret: config.SPOTIFY_CLIENT_SECRET,
      fetcher
    })
  }
  if (config.TAVILY_API_KEY) {
    providers.news = new TavilyNewsSearch({ apiKey: config.TAVILY_API_KEY, fetcher })
  }
  if (config.OPENAI_API_KEY) {
    providers.text = new OpenAITextGenerator({ apiKey: config.OPENAI_API_KEY, model: config.OPENAI_DEFAULT_MODEL })
  }
  return providers
}

import { z } from 'zod'
import type { MediaItem } from '@aura/shared'
import { ProviderError, type MusicSearchProvider } from '../capabilities'
import { cleanText, requestJson, type Fetcher } from './http'

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().default(3600)
})

const TrackSchema = z.object({
  name: z.string().default(''),
  uri: z.string().default(''),
  artists: z.array(z.object({ name: z.string().default('') })).default([]),
  album: z.object({ images: z.array(z.object({ url: z.string() })).default([]) }).default({}),
  external_urls: z.object({ spotify: z.string().optional() }).default({})
})

const SearchResponseSchema = z.object({
  tracks: z.object({ items: z.array(TrackSchema).default([]) }).default({})
})

export type SpotifySearchOptions = {
  clientId: string
  clientSecret: string
  fetcher?: Fetcher
  now?: () => number
}

// Refresh slightly before the advertised expiry.
const TOKEN_SKEW_MS = 30_000

export class SpotifyMusicSearch implements MusicSearchProvider {
  readonly name = 'spotify-search'
  private readonly fetcher: Fetcher
  private readonly now: () => number
  private token: { value: string; expiresAt: number } | null = null

  constructor(private readonly options: SpotifySearchOptions) {
    this.fetcher = options.fetcher ?? globalThis.fetch
    this.now = options.now ?? Date.now
  }

  private async accessToken(signal: AbortSignal): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) return this.token.value
    const basic = Buffer.from(`${this.options.clientId}:${this.options.clientSecret}`).toString('base64')
    const body = await requestJson(
      this.fetcher,
      this.name,
      'https://accounts.spotify.com/api/token',
      {
        method: 'POST',
        headers: {
          Authorization: `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded'
        },
        body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
        signal
      },
      TokenResponseSchema
    )
    this.token = {
      value: body.access_token,
      expiresAt: this.now() + Math.max(0, body.expires_in * 1000 - TOKEN_SKEW_MS)
    }
    return body.access_token
  }

  async searchMusic(query: string, signal: AbortSignal): Promise<MediaItem | null> {
    const token = await this.accessToken(signal)
    const url = new URL('https://api.spotify.com/v1/search')
    url.searchParams.set('q', query)
    url.searchParams.set('type', 'track')
    url.searchParams.set('limit', '1')

    let body: z.infer<typeof SearchResponseSchema>
    try {
      body = await requestJson(
        this.fetcher,
        this.name,
        url.toString(),
        { headers: { Authorization: `Bearer ${token}` }, signal },
        SearchResponseSchema
      )
    } catch (err) {
      // A revoked token must not stay cached
      if (err instanceof ProviderError && err.status === 401) this.token = null
      throw err
    }

    const track = body.tracks.items[0]
    if (!track) return null
    const title = cleanText(track.name, 100)
    if (!title) return null
    return {
      title,
      url: track.external_urls.spotify ?? '',
      description: 'Listen on Spotify',
      thumbnail: track.album.images[0]?.url ?? '',
      artist: track.artists[0]?.name ?? '',
      uri: track.uri
    }
  }
}

import type { ErrorKind, MediaItem, NewsArticle } from '@aura/shared'
import { runWithDeadline } from '../utils/deadline'
import { errorMessage, getLogger } from './logger'

export type EmotionScore = { label: string; score: number }

export type TextRequest = {
  system: string
  prompt: string
  maxTokens?: number
  temperature?: number
}

export type CapabilityName = 'classifier' | 'video' | 'music' | 'news' | 'text'

export type CapabilityOutcome<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; kind: ErrorKind; message: string; durationMs: number }

export class ProviderError extends Error {
  readonly kind: ErrorKind
  readonly status: number | null
  readonly retryable: boolean

  constructor(
    message: string,
    opts: { kind?: ErrorKind; status?: number | null; retryable?: boolean } = {}
  ) {
    super(message)
    this.name = 'ProviderError'
    this.kind = opts.kind ?? 'ProviderUnavailable'
    this.status = opts.status ?? null
    this.retryable = opts.retryable ?? this.kind === 'ProviderUnavailable'
  }

  static fromStatus(provider: string, status: number) {
    const kind = kindFromStatus(status)
    return new ProviderError(`${provider} responded with HTTP ${status}`, {
      kind,
      status,
      retryable: status >= 500 || status === 429
    })
  }
}

export function kindFromStatus(status: number): ErrorKind {
  if (status === 408 || status === 504) return 'Timeout'
  if (status === 400 || status === 422) return 'InvalidInput'
  return 'ProviderUnavailable'
}

function isAbortError(err: unknown) {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'DeadlineExceededError')
}

export function errorKindOf(err: unknown): ErrorKind {
  if (err instanceof ProviderError) return err.kind
  if (isAbortError(err)) return 'Timeout'
  return 'Unknown'
}

// Providers: thin network adapters. Any of them may be absent.

export interface EmotionClassifierProvider {
  readonly name: string
  classify(text: string, signal: AbortSignal): Promise<EmotionScore[]>
}

export interface VideoSearchProvider {
  readonly name: string
  searchVideo(query: string, signal: AbortSignal): Promise<MediaItem | null>
}

export interface MusicSearchProvider {
  readonly name: string
  searchMusic(query: string, signal: AbortSignal): Promise<MediaItem | null>
}

export interface NewsSearchProvider {
  readonly name: string
  searchNews(query: string, signal: AbortSignal): Promise<NewsArticle[]>
}

export interface TextGeneratorProvider {
  readonly name: string
  generate(request: TextRequest, signal: AbortSignal): Promise<string>
}

export type CapabilityProviders = {
  classifier?: EmotionClassifierProvider
  video?: VideoSearchProvider
  music?: MusicSearchProvider
  news?: NewsSearchProvider
  text?: TextGeneratorProvider
}

/** What agents are allowed to call: every call is bounded and never throws. */
export interface Capabilities {
  classifyEmotion(text: string, timeoutMs?: number, signal?: AbortSignal): Promise<CapabilityOutcome<EmotionScore[]>>
  searchVideo(query: string, timeoutMs?: number, signal?: AbortSignal): Promise<CapabilityOutcome<MediaItem | null>>
  searchMusic(query: string, timeoutMs?: number, signal?: AbortSignal): Promise<CapabilityOutcome<MediaItem | null>>
  searchNews(query: string, timeoutMs?: number, signal?: AbortSignal): Promise<CapabilityOutcome<NewsArticle[]>>
  /** Absent when no text generator is configured; agents then use templates. */
  generateText?: (request: TextRequest, timeoutMs?: number, signal?: AbortSignal) => Promise<CapabilityOutcome<string>>
  available(): Record<CapabilityName, boolean>
}

export type CapabilityOptions = {
  classifierTimeoutMs: number
  searchTimeoutMs: number
  textTimeoutMs: number
  retries: number
}

export const DEFAULT_CAPABILITY_OPTIONS: CapabilityOptions = {
  classifierTimeoutMs: 2500,
  searchTimeoutMs: 4000,
  textTimeoutMs: 4500,
  retries: 1
}

/**
 * Invoke a provider call under one timeout budget. Retryable provider errors
 * are retried up to `retries` times within the same budget.
 */
export async function invokeCapability<T>(
  name: string,
  fn: (signal: AbortSignal) => Promise<T>,
  opts: { timeoutMs: number; retries?: number; signal?: AbortSignal }
): Promise<CapabilityOutcome<T>> {
  const retries = Math.max(0, opts.retries ?? 0)
  const started = Date.now()

  const result = await runWithDeadline(
    async (signal) => {
      for (let attempt = 0; ; attempt += 1) {
        try {
          return await fn(signal)
        } catch (err) {
          const retryable = err instanceof ProviderError && err.retryable
          if (!retryable || attempt >= retries || signal.aborted) throw err
          getLogger().debug('capability_retry', { capability: name, attempt: attempt + 1, error: errorMessage(err) })
        }
      }
    },
    opts.timeoutMs,
    opts.signal
  )

  const durationMs = Date.now() - started
  switch (result.status) {
    case 'ok':
      return { ok: true, value: result.value, durationMs }
    case 'timeout':
      return { ok: false, kind: 'Timeout', message: `${name} exceeded ${opts.timeoutMs}ms`, durationMs }
    case 'aborted':
      return { ok: false, kind: 'Timeout', message: `${name} cancelled`, durationMs }
    case 'error':
      return { ok: false, kind: errorKindOf(result.error), message: errorMessage(result.error), durationMs }
  }
}

function unavailable<T>(name: string): Promise<CapabilityOutcome<T>> {
  return Promise.resolve({ ok: false, kind: 'ProviderUnavailable', message: `${name} is not configured`, durationMs: 0 })
}

export function createCapabilities(
  providers: CapabilityProviders,
  options: Partial<CapabilityOptions> = {}
): Capabilities {
  const opts: CapabilityOptions = { ...DEFAULT_CAPABILITY_OPTIONS, ...options }
  const { classifier, video, music, news, text } = providers

  const capabilities: Capabilities = {
    classifyEmotion(input, timeoutMs = opts.classifierTimeoutMs, signal) {
      if (!classifier) return unavailable('classifier')
      return invokeCapability(classifier.name, (s) => classifier.classify(input, s), {
        timeoutMs,
        retries: opts.retries,
        signal
      })
    },
    searchVideo(query, timeoutMs = opts.searchTimeoutMs, signal) {
      if (!video) return unavailable('video search')
      return invokeCapability(video.name, (s) => video.searchVideo(query, s), { timeoutMs, retries: opts.retries, signal })
    },
    searchMusic(query, timeoutMs = opts.searchTimeoutMs, signal) {
      if (!music) return unavailable('music search')
      return invokeCapability(music.name, (s) => music.searchMusic(query, s), { timeoutMs, retries: opts.retries, signal })
    },
    searchNews(query, timeoutMs = opts.searchTimeoutMs, signal) {
      if (!news) return unavailable('news search')
      return invokeCapability(news.name, (s) => news.searchNews(query, s), { timeoutMs, retries: opts.retries, signal })
    },
    available() {
      return {
        classifier: Boolean(classifier),
        video: Boolean(video),
        music: Boolean(music),
        news: Boolean(news),
        text: Boolean(text)
      }
    }
  }

  if (text) {
    capabilities.generateText = (request, timeoutMs = opts.textTimeoutMs, signal) =>
      invokeCapability(text.name, (s) => text.generate(request, s), { timeoutMs, retries: opts.retries, signal })
  }

  return capabilities
}

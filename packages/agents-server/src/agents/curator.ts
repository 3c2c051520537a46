import type { ContentBundle, ErrorKind } from '@aura/shared'
import type { Capabilities, CapabilityOutcome } from '../services/capabilities'
import type { TurnContext } from '../services/turn-context'
import { getLogger } from '../services/logger'
import { AgentFailure, type TurnAgent } from './agent'
import { REFLECTIONS } from './reflections'

export const DEFAULT_KEYPHRASES = ['general information']
const MAX_KEYPHRASES = 3
const MAX_QUERY_LENGTH = 100

export function extractKeyphrases(text: string): string[] {
  const words = text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []
  const unique: string[] = []
  for (const word of words) {
    if (!unique.includes(word)) unique.push(word)
    if (unique.length >= MAX_KEYPHRASES) break
  }
  return unique.length ? unique : [...DEFAULT_KEYPHRASES]
}

export function isEmotionalQuery(text: string): boolean {
  const lower = text.toLowerCase()
  return REFLECTIONS.emotionalWords.some((word) => lower.includes(word))
}

export type CuratorQueries = { video: string; music: string; news: string }

export function buildQueries(text: string): CuratorQueries {
  const base = text.replace(/\s+/g, ' ').trim().slice(0, MAX_QUERY_LENGTH)
  const news = isEmotionalQuery(text) ? `${base} ${REFLECTIONS.positiveNewsSources}` : base
  return { video: base, music: base, news }
}

type SubResult = { source: 'video' | 'music' | 'news'; outcome: CapabilityOutcome<unknown> }

export class CuratorAgent implements TurnAgent<'curator'> {
  readonly kind = 'curator' as const

  constructor(readonly timeoutMs: number) {}

  async run(context: TurnContext, capabilities: Capabilities, signal: AbortSignal) {
    const queries = buildQueries(context.inputText)
    const [video, music, news] = await Promise.all([
      capabilities.searchVideo(queries.video, undefined, signal),
      capabilities.searchMusic(queries.music, undefined, signal),
      capabilities.searchNews(queries.news, undefined, signal)
    ])

    const subs: SubResult[] = [
      { source: 'video', outcome: video },
      { source: 'music', outcome: music },
      { source: 'news', outcome: news }
    ]
    const failures: Array<SubResult & { kind: ErrorKind; message: string }> = []
    for (const sub of subs) {
      if (!sub.outcome.ok) failures.push({ ...sub, kind: sub.outcome.kind, message: sub.outcome.message })
    }

    if (failures.length === 3) {
      const kind: ErrorKind = failures.every((f) => f.kind === 'Timeout') ? 'Timeout' : 'ProviderUnavailable'
      throw new AgentFailure(kind, failures.map((f) => `${f.source}: ${f.message}`).join('; '))
    }

    for (const failure of failures) {
      context.recordError('curator', failure.kind, `${failure.source}: ${failure.message}`)
    }
    if (failures.length) {
      getLogger().warn('curator_partial_content', {
        turnId: context.turnId,
        failed: failures.map((f) => f.source)
      })
    }

    const bundle: ContentBundle = {
      video: video.ok ? video.value : null,
      music: music.ok ? music.value : null,
      news: news.ok ? news.value : [],
      context_keyphrases: extractKeyphrases(context.inputText)
    }
    context.write('curator', 'content', bundle)
  }
}

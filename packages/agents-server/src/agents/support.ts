import type { ContentBundle, Mood } from '@aura/shared'
import type { Capabilities } from '../services/capabilities'
import type { TurnContext, TurnJournalEntry } from '../services/turn-context'
import { AgentFailure, type TurnAgent } from './agent'
import { REFLECTIONS } from './reflections'

export function isFactualQuery(text: string): boolean {
  const lower = text.trim().toLowerCase()
  if (REFLECTIONS.factualTopics.some((topic) => lower.includes(topic))) return true
  return REFLECTIONS.factualPrefixes.some((prefix) => lower.startsWith(prefix))
}

/**
 * Strip list numbering and keep at most the first three sentences, the
 * first one trailing off into an ellipsis.
 */
export function cleanResponse(text: string): string {
  const cleaned = text.replace(/\b[1-4]\./g, '').replace(/\s+/g, ' ').trim()
  const sentences = cleaned
    .split(/(?<=[.?!])\s+/)
    .map((s) => s.trim())
    .filter(Boolean)
  if (sentences.length >= 2) {
    const [first, ...rest] = sentences.slice(0, 3)
    return `${first.replace(/[.?!]+$/, '')}... ${rest.join(' ')}`
  }
  if (!cleaned) return ''
  return /[.?!]$/.test(cleaned) ? cleaned : `${cleaned}.`
}

export function templatedReply(mood: Mood, content?: ContentBundle): string {
  const parts = [REFLECTIONS.supportOpeners[mood]]
  if (content?.video) {
    parts.push(`I found something that might resonate: "${content.video.title}".`)
  } else if (content?.music) {
    parts.push(`Maybe some music could keep you company: "${content.music.title}".`)
  }
  parts.push(REFLECTIONS.supportQuestions[mood])
  return parts.join(' ')
}

const FACTUAL_INSTRUCTIONS = [
  'You are AURA, a reflective and emotionally intelligent companion.',
  'Offer thoughtful, warm and accurate answers with a human-like curiosity.',
  'Your style is poetic but grounded, never robotic.',
  'Answer clearly in two or three sentences. Mention curated content only if it feels natural.'
].join('\n')

function emotionalInstructions(mood: Mood) {
  return [
    'You are AURA, a gentle and emotionally intelligent companion.',
    'Speak softly and warmly; use a metaphor only when it truly belongs.',
    `The user is feeling "${mood}". Acknowledge it without judgement.`,
    'Reply in two or three sentences and never mention errors or system details.'
  ].join('\n')
}

export function buildSupportPrompt(
  inputText: string,
  mood: Mood,
  content?: ContentBundle,
  journal?: TurnJournalEntry
): string {
  const lines = [`${inputText} [Mood: ${mood}]`]
  const titles = [content?.video?.title, content?.music?.title].filter((t): t is string => Boolean(t))
  if (titles.length) lines.push(`Curated for them: ${titles.join('; ')}`)
  if (journal) lines.push(`Their journal reflection:\n${journal.text}`)
  return lines.join('\n\n')
}

export class SupportAgent implements TurnAgent<'support'> {
  readonly kind = 'support' as const

  constructor(
    readonly timeoutMs: number,
    private readonly contextGraceMs: number
  ) {}

  async run(context: TurnContext, capabilities: Capabilities, signal: AbortSignal) {
    const mood = context.get('mood')?.mood ?? 'neutral'
    const [content, journal] = await Promise.all([
      context.waitFor('content', this.contextGraceMs, signal),
      context.waitFor('journalEntry', this.contextGraceMs, signal)
    ])

    if (!capabilities.generateText) {
      context.write('support', 'responseText', templatedReply(mood, content))
      return
    }

    const outcome = await capabilities.generateText(
      {
        system: isFactualQuery(context.inputText) ? FACTUAL_INSTRUCTIONS : emotionalInstructions(mood),
        prompt: buildSupportPrompt(context.inputText, mood, content, journal),
        maxTokens: 300,
        temperature: 0.85
      },
      undefined,
      signal
    )
    if (!outcome.ok) throw new AgentFailure(outcome.kind, outcome.message)

    const reply = cleanResponse(outcome.value)
    if (!reply) throw new AgentFailure('Unknown', 'generator returned an empty reply')
    context.write('support', 'responseText', reply)
  }
}

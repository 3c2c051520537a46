import { randomUUID } from 'node:crypto'
import type { Mood } from '@aura/shared'
import type { Capabilities } from '../services/capabilities'
import type { TurnContext, TurnJournalEntry } from '../services/turn-context'
import { getLogger } from '../services/logger'
import type { TurnAgent } from './agent'
import { REFLECTIONS } from './reflections'

const CONDENSE_AT = 50

export function timeSymbol(date: Date): string {
  const hour = date.getUTCHours()
  if (hour >= 5 && hour < 12) return REFLECTIONS.timeSymbols.morning
  if (hour >= 12 && hour < 17) return REFLECTIONS.timeSymbols.day
  if (hour >= 17 && hour < 21) return REFLECTIONS.timeSymbols.evening
  return REFLECTIONS.timeSymbols.night
}

export function timeHeader(date: Date): string {
  const hh = String(date.getUTCHours()).padStart(2, '0')
  const mm = String(date.getUTCMinutes()).padStart(2, '0')
  return `${hh}:${mm} ${timeSymbol(date)}`
}

export function condense(text: string): string {
  const trimmed = text.trim()
  return trimmed.length > CONDENSE_AT ? `${trimmed.slice(0, CONDENSE_AT).trim()}...` : trimmed
}

/** Lines containing an arrow each take the next symbol of the cycle. */
export function decorateLines(lines: readonly string[]): string[] {
  const cycle = REFLECTIONS.symbolCycle
  let next = 0
  const out: string[] = []
  for (const raw of lines) {
    const line = raw.trim()
    if (!line) continue
    if (next < cycle.length && line.includes('→')) {
      out.push(`${line} ${cycle[next]}`)
      next += 1
    } else {
      out.push(line)
    }
  }
  return out
}

export function composeJournalText(date: Date, inputText: string, lines: readonly string[]): string {
  return [timeHeader(date), `You: "${condense(inputText)}"`, ...decorateLines(lines)].join('\n')
}

function templateLines(mood: Mood): string[] {
  return [...REFLECTIONS.journalLines[mood], REFLECTIONS.journalQuestions[mood]]
}

export function buildJournalEntry(inputText: string, mood: Mood, date: Date, lines: readonly string[]): TurnJournalEntry {
  return {
    id: randomUUID(),
    timestamp: date.toISOString(),
    mood,
    text: composeJournalText(date, inputText, lines),
    inputText
  }
}

export function minimalJournalEntry(inputText: string, mood: Mood, date: Date): TurnJournalEntry {
  return buildJournalEntry(inputText, mood, date, REFLECTIONS.minimalJournal)
}

const HEADER_LINE = /^\d{1,2}:\d{2}\b/
const QUOTE_LINE = /^(you|user)\s*:/i

function generatedLines(text: string): string[] {
  return text
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l && !HEADER_LINE.test(l) && !QUOTE_LINE.test(l))
}

export const JOURNAL_INSTRUCTIONS = [
  'You are a journal formatter.',
  'Write 2-4 short poetic lines reflecting on the user message, then one open reflective question.',
  'Connect ideas with a single "→" arrow in at most one line.',
  'Use simple metaphors that fit the given mood. No timestamps, no quotes, no lists.'
].join('\n')

export class JournalAgent implements TurnAgent<'journal'> {
  readonly kind = 'journal' as const

  constructor(
    readonly timeoutMs: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  async run(context: TurnContext, capabilities: Capabilities, signal: AbortSignal) {
    const mood = context.get('mood')?.mood ?? 'neutral'
    const date = this.now()

    if (!capabilities.generateText) {
      context.write('journal', 'journalEntry', buildJournalEntry(context.inputText, mood, date, templateLines(mood)))
      return
    }

    const outcome = await capabilities.generateText(
      {
        system: JOURNAL_INSTRUCTIONS,
        prompt: `User: "${condense(context.inputText)}"\nMood: ${mood}`,
        maxTokens: 250,
        temperature: 0.7
      },
      undefined,
      signal
    )
    const lines = outcome.ok ? generatedLines(outcome.value) : []
    if (lines.length) {
      context.write('journal', 'journalEntry', buildJournalEntry(context.inputText, mood, date, lines))
      return
    }

    const kind = outcome.ok ? 'Unknown' : outcome.kind
    const message = outcome.ok ? 'generator returned no usable lines' : outcome.message
    getLogger().warn('journal_generation_failed', { turnId: context.turnId, kind, error: message })
    context.recordError('journal', kind, message)
    context.write('journal', 'journalEntry', minimalJournalEntry(context.inputText, mood, date))
  }
}

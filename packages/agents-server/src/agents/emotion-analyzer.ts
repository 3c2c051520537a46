import { confidenceLabel, mapClassifierLabel, type Mood } from '@aura/shared'
import type { Capabilities, EmotionScore } from '../services/capabilities'
import type { MoodAssessment, TurnContext } from '../services/turn-context'
import { AgentFailure, type TurnAgent } from './agent'

export const NEUTRAL_ASSESSMENT: MoodAssessment = {
  mood: 'neutral',
  confidence: 0,
  confidenceLabel: confidenceLabel(0),
  rawLabel: null
}

/**
 * Choose the best-scoring label that maps into the mood vocabulary.
 * Unknown labels and non-finite scores are skipped.
 */
export function assessScores(scores: readonly EmotionScore[]): MoodAssessment {
  let best: { mood: Mood; score: number; label: string } | null = null
  for (const entry of scores) {
    const mood = mapClassifierLabel(entry.label)
    if (!mood || !Number.isFinite(entry.score)) continue
    const score = Math.min(1, Math.max(0, entry.score))
    if (!best || score > best.score) best = { mood, score, label: entry.label }
  }
  if (!best) return { ...NEUTRAL_ASSESSMENT }
  return {
    mood: best.mood,
    confidence: best.score,
    confidenceLabel: confidenceLabel(best.score),
    rawLabel: best.label
  }
}

export class EmotionAgent implements TurnAgent<'emotion'> {
  readonly kind = 'emotion' as const

  constructor(readonly timeoutMs: number) {}

  async run(context: TurnContext, capabilities: Capabilities, signal: AbortSignal) {
    const outcome = await capabilities.classifyEmotion(context.inputText, undefined, signal)
    if (!outcome.ok) {
      throw new AgentFailure(outcome.kind, outcome.message)
    }
    context.write('emotion', 'mood', assessScores(outcome.value))
  }
}

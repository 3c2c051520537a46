import type { MoodHistoryEntry } from '@aura/shared'
import type { Capabilities } from '../services/capabilities'
import type { MoodAssessment, Provenance, TurnContext } from '../services/turn-context'
import { AgentFailure, type TurnAgent } from './agent'

export function buildMoodRecord(
  turnId: string,
  assessment: MoodAssessment,
  provenance: Provenance | undefined,
  date: Date
): MoodHistoryEntry {
  return {
    turnId,
    mood: assessment.mood,
    confidence: assessment.confidence,
    timestamp: date.toISOString(),
    source: provenance === 'agent' ? 'classifier' : 'fallback'
  }
}

/**
 * Prepares the turn's mood history record. The session store appends it
 * during commit, so it lands even when later stages fail.
 */
export class MemoryAgent implements TurnAgent<'memory'> {
  readonly kind = 'memory' as const

  constructor(
    readonly timeoutMs: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  async run(context: TurnContext, _capabilities: Capabilities, _signal: AbortSignal) {
    const assessment = context.get('mood')
    if (!assessment) throw new AgentFailure('Unknown', 'mood is not resolved yet')
    context.write('memory', 'moodRecord', buildMoodRecord(context.turnId, assessment, context.provenanceOf('mood'), this.now()))
  }
}

import { emptyContentBundle, type AgentName, type ErrorKind, type Mood } from '@aura/shared'
import { getLogger } from '../services/logger'
import { FIELD_OWNERS, OWNED_FIELDS, type OwnedField, type TurnContext } from '../services/turn-context'
import { NEUTRAL_ASSESSMENT } from './emotion-analyzer'
import { minimalJournalEntry } from './journal'
import { buildMoodRecord } from './memory'
import { REFLECTIONS } from './reflections'

export function recoveryMessage(mood: Mood): string {
  return REFLECTIONS.recoveryMessages[mood]
}

function ownedFieldOf(agent: AgentName): OwnedField | undefined {
  return OWNED_FIELDS.find((field) => FIELD_OWNERS[field] === agent)
}

/**
 * Substitutes safe defaults for failed stages. Never scheduled on its own:
 * the coordinator calls `substitute` when a stage fails and `complete`
 * before merging.
 */
export class FallbackAgent {
  readonly kind = 'fallback' as const

  constructor(private readonly now: () => Date = () => new Date()) {}

  substitute(context: TurnContext, agent: AgentName, kind: ErrorKind, message?: string) {
    context.setStatus(agent, 'error')
    context.recordError(agent, kind, message)
    if (context.isClosed) return

    const field = ownedFieldOf(agent)
    if (!field || context.has(field)) return
    this.fill(context, field)
    context.setStatus('fallback', 'complete')
    getLogger().info('fallback_substituted', { turnId: context.turnId, agent, field, kind })
  }

  /** Fill every owned field that is still empty. */
  complete(context: TurnContext) {
    for (const field of OWNED_FIELDS) {
      if (context.has(field)) continue
      const owner = FIELD_OWNERS[field]
      if (context.statusOf(owner) === 'error') {
        this.fill(context, field)
        context.setStatus('fallback', 'complete')
      } else {
        this.substitute(context, owner, 'Unknown', `${owner} produced no ${field}`)
      }
    }
  }

  private fill(context: TurnContext, field: OwnedField) {
    const mood = context.get('mood')?.mood ?? 'neutral'
    switch (field) {
      case 'mood':
        context.write('fallback', 'mood', { ...NEUTRAL_ASSESSMENT })
        return
      case 'content':
        context.write('fallback', 'content', emptyContentBundle())
        return
      case 'journalEntry':
        context.write('fallback', 'journalEntry', minimalJournalEntry(context.inputText, mood, this.now()))
        return
      case 'responseText':
        context.write('fallback', 'responseText', recoveryMessage(mood))
        return
      case 'moodRecord': {
        const assessment = context.get('mood') ?? NEUTRAL_ASSESSMENT
        context.write('fallback', 'moodRecord', buildMoodRecord(context.turnId, assessment, context.provenanceOf('mood'), this.now()))
        return
      }
    }
  }
}

import { randomUUID } from 'node:crypto'
import {
  SessionIdSchema,
  confidenceLabel,
  emptyContentBundle,
  turnStatusFromProgress,
  type AgentLogEntry,
  type JournalEntry,
  type SessionState,
  type TurnResult
} from '@aura/shared'
import { toAgentFailure, type Agent, type AgentSet } from '../agents/agent'
import { NEUTRAL_ASSESSMENT } from '../agents/emotion-analyzer'
import { recoveryMessage, type FallbackAgent } from '../agents/fallback'
import { REFLECTIONS } from '../agents/reflections'
import { KeyedMutex } from '../utils/concurrency'
import { DeadlineExceededError, runWithDeadline } from '../utils/deadline'
import type { Capabilities } from './capabilities'
import { errorMessage, getLogger } from './logger'
import type { MessageLog } from './message-log'
import { pageJournal, type JournalPage, type SessionStateStore } from './session-store'
import { FIELD_OWNERS, OWNED_FIELDS, TurnContext, type OwnedField } from './turn-context'

export type TurnCoordinatorOptions = {
  /** Hard budget for a whole turn; pending stages are aborted when it elapses. */
  turnDeadlineMs: number
  maxInputLength: number
  now?: () => Date
  genTurnId?: () => string
}

export type TurnCoordinatorDeps = {
  agents: AgentSet
  fallback: FallbackAgent
  capabilities: Capabilities
  store: SessionStateStore
  log: MessageLog
}

export class InvalidSessionIdError extends Error {
  constructor(readonly sessionId: string) {
    super('Invalid session id')
    this.name = 'InvalidSessionIdError'
  }
}

// Fields that count towards turn progress, 25 points each.
const PROGRESS_FIELDS: readonly OwnedField[] = ['mood', 'content', 'journalEntry', 'responseText']

function laterOf(candidate: string, floor: string | undefined) {
  if (!floor) return candidate
  return Date.parse(candidate) < Date.parse(floor) ? floor : candidate
}

export class TurnCoordinator {
  private readonly sessions = new KeyedMutex()
  private readonly now: () => Date
  private readonly genTurnId: () => string

  constructor(
    private readonly deps: TurnCoordinatorDeps,
    private readonly options: TurnCoordinatorOptions
  ) {
    this.now = options.now ?? (() => new Date())
    this.genTurnId = options.genTurnId ?? randomUUID
  }

  private sessionKey(sessionId: string): string {
    const parsed = SessionIdSchema.safeParse(sessionId)
    if (!parsed.success) throw new InvalidSessionIdError(sessionId)
    return parsed.data
  }

  async processTurn(sessionId: string, inputText: string): Promise<TurnResult> {
    const key = this.sessionKey(sessionId)
    const text = inputText.trim()
    if (!text || text.length > this.options.maxInputLength) {
      return this.rejectInput(key, text ? 'input exceeds the maximum length' : 'input is empty')
    }
    return this.sessions.runExclusive(key, () => this.runTurn(key, text))
  }

  async resetSession(sessionId: string): Promise<void> {
    const key = this.sessionKey(sessionId)
    await this.sessions.runExclusive(key, () => this.deps.store.reset(key))
    getLogger().info('session_reset', { sessionId: key })
  }

  async getSession(sessionId: string): Promise<SessionState> {
    return this.deps.store.read(this.sessionKey(sessionId))
  }

  async listJournal(sessionId: string, page?: JournalPage): Promise<JournalEntry[]> {
    return this.deps.store.listJournal(this.sessionKey(sessionId), page)
  }

  listAgentLog(sessionId: string): AgentLogEntry[] {
    return this.deps.log.list(this.sessionKey(sessionId))
  }

  /** The log entry for one turn, if it belongs to this session. */
  agentLogEntry(sessionId: string, turnId: string): AgentLogEntry | undefined {
    const key = this.sessionKey(sessionId)
    const entry = this.deps.log.findByTurn(turnId)
    return entry?.sessionId === key ? entry : undefined
  }

  private async rejectInput(sessionId: string, message: string): Promise<TurnResult> {
    getLogger().info('turn_input_rejected', { sessionId, reason: message })
    const journal = await this.deps.store.listJournal(sessionId)
    return {
      turnId: this.genTurnId(),
      response: REFLECTIONS.invalidInputReply,
      mood: 'neutral',
      confidence: 0,
      confidence_label: confidenceLabel(0),
      timestamp: this.now().toISOString(),
      journal: null,
      journal_entries: journal,
      content: emptyContentBundle(),
      status: 'pending',
      errors: [{ agent: 'coordinator', kind: 'InvalidInput', message }]
    }
  }

  private async runStage(context: TurnContext, agent: Agent, turnSignal: AbortSignal) {
    const { fallback, capabilities } = this.deps
    context.setStatus(agent.kind, 'in-progress')
    const started = Date.now()
    const result = await runWithDeadline(
      (signal) => agent.run(context, capabilities, signal),
      agent.timeoutMs,
      turnSignal
    )

    const meta = { turnId: context.turnId, agent: agent.kind, durationMs: Date.now() - started }
    switch (result.status) {
      case 'ok': {
        const field = OWNED_FIELDS.find((f) => FIELD_OWNERS[f] === agent.kind)
        if (field && !context.has(field)) {
          fallback.substitute(context, agent.kind, 'Unknown', `${agent.kind} produced no ${field}`)
        } else {
          context.setStatus(agent.kind, 'complete')
        }
        getLogger().debug('agent_completed', meta)
        return
      }
      case 'timeout':
        getLogger().warn('agent_timeout', { ...meta, timeoutMs: result.timeoutMs })
        fallback.substitute(context, agent.kind, 'Timeout', `${agent.kind} exceeded ${result.timeoutMs}ms`)
        return
      case 'aborted':
        getLogger().warn('agent_aborted', meta)
        fallback.substitute(context, agent.kind, 'Timeout', 'turn deadline exceeded')
        return
      case 'error': {
        const failure = toAgentFailure(result.error)
        getLogger().warn('agent_failed', { ...meta, kind: failure.kind, error: failure.message })
        fallback.substitute(context, agent.kind, failure.kind, failure.message)
        return
      }
    }
  }

  private async runTurn(sessionId: string, inputText: string): Promise<TurnResult> {
    const { agents, fallback, store } = this.deps
    const session = await store.read(sessionId)
    const context = new TurnContext({
      turnId: this.genTurnId(),
      sessionId,
      inputText,
      session,
      now: this.now()
    })
    getLogger().info('turn_started', { sessionId, turnId: context.turnId })

    const deadline = new AbortController()
    const timer = setTimeout(
      () => deadline.abort(new DeadlineExceededError(this.options.turnDeadlineMs)),
      this.options.turnDeadlineMs
    )
    try {
      context.advance('EmotionPending')
      await this.runStage(context, agents.emotion, deadline.signal)
      context.advance('EmotionDone')
      await this.runStage(context, agents.memory, deadline.signal)

      context.advance('Dispatched')
      await Promise.all([
        this.runStage(context, agents.curator, deadline.signal),
        this.runStage(context, agents.journal, deadline.signal),
        this.runStage(context, agents.support, deadline.signal)
      ])
    } finally {
      clearTimeout(timer)
    }

    context.advance('Merging')
    fallback.complete(context)
    const draft = this.merge(context)
    context.close()

    const committed = await this.commit(context, draft)
    context.advance('Committed')
    return committed
  }

  private merge(context: TurnContext) {
    const assessment = context.get('mood') ?? NEUTRAL_ASSESSMENT
    const progress = 25 * PROGRESS_FIELDS.filter((f) => context.producedByOwner(f)).length
    return {
      assessment,
      content: context.get('content') ?? emptyContentBundle(),
      journalEntry: context.get('journalEntry'),
      response: context.get('responseText') || recoveryMessage(assessment.mood),
      moodRecord: context.get('moodRecord'),
      agents: context.agentStatuses(),
      errors: context.errors,
      progress,
      status: turnStatusFromProgress(progress)
    }
  }

  private async commit(context: TurnContext, draft: ReturnType<TurnCoordinator['merge']>): Promise<TurnResult> {
    const { store, log } = this.deps
    const { turnId, sessionId, inputText } = context
    const timestamp = this.now().toISOString()
    const committed: { journal: JournalEntry | null } = { journal: null }

    const mutate = (state: SessionState): SessionState => {
      const lastMood = state.moodHistory.at(-1)?.timestamp
      const lastJournal = state.journalEntries.at(-1)?.timestamp
      const record = draft.moodRecord ?? {
        turnId,
        mood: draft.assessment.mood,
        confidence: draft.assessment.confidence,
        timestamp,
        source: 'fallback' as const
      }
      state.moodHistory.push({ ...record, timestamp: laterOf(record.timestamp, lastMood) })

      if (draft.journalEntry) {
        const entry: JournalEntry = {
          id: draft.journalEntry.id,
          turnId,
          timestamp: laterOf(draft.journalEntry.timestamp, lastJournal),
          mood: draft.journalEntry.mood,
          text: draft.journalEntry.text,
          inputText
        }
        committed.journal = entry
        state.journalEntries.push(entry)
      }
      state.contentHistory = draft.content
      state.chatHistory.push(
        { turnId, sender: 'user', text: inputText, timestamp, mood: draft.assessment.mood },
        { turnId, sender: 'assistant', text: draft.response, timestamp }
      )
      state.updatedAt = timestamp
      return state
    }

    let journalEntries: JournalEntry[]
    try {
      const next = await store.update(sessionId, mutate)
      journalEntries = pageJournal(next.journalEntries)
    } catch (err) {
      // The response still goes out; the session simply did not record this turn
      getLogger().error('turn_commit_failed', { sessionId, turnId, error: errorMessage(err) })
      const fallbackState = mutate(structuredClone(context.session))
      journalEntries = pageJournal(fallbackState.journalEntries)
    }

    log.append({
      turnId,
      sessionId,
      timestamp,
      mood: draft.assessment.mood,
      confidence: draft.assessment.confidence,
      confidenceLabel: draft.assessment.confidenceLabel,
      agents: draft.agents,
      progress: draft.progress,
      status: draft.status,
      errors: draft.errors
    })
    getLogger().info('turn_committed', {
      sessionId,
      turnId,
      mood: draft.assessment.mood,
      progress: draft.progress,
      errors: draft.errors.length
    })

    return {
      turnId,
      response: draft.response,
      mood: draft.assessment.mood,
      confidence: draft.assessment.confidence,
      confidence_label: draft.assessment.confidenceLabel,
      timestamp,
      journal: committed.journal ? committed.journal.text : null,
      journal_entries: journalEntries,
      content: draft.content,
      status: draft.status,
      errors: draft.errors
    }
  }
}

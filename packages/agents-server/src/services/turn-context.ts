import type {
  AgentName,
  AgentStatus,
  AgentStatusMap,
  ConfidenceLabel,
  ContentBundle,
  ErrorKind,
  Mood,
  MoodHistoryEntry,
  SessionState,
  TurnError
} from '@aura/shared'

export type MoodAssessment = {
  mood: Mood
  confidence: number
  confidenceLabel: ConfidenceLabel
  /** Classifier label that produced the mood, null when defaulted. */
  rawLabel: string | null
}

export type TurnJournalEntry = {
  id: string
  timestamp: string
  mood: Mood
  text: string
  inputText: string
}

export type OwnedFields = {
  mood: MoodAssessment
  content: ContentBundle
  journalEntry: TurnJournalEntry
  responseText: string
  moodRecord: MoodHistoryEntry
}
export type OwnedField = keyof OwnedFields

export const FIELD_OWNERS: Readonly<Record<OwnedField, AgentName>> = {
  mood: 'emotion',
  content: 'curator',
  journalEntry: 'journal',
  responseText: 'support',
  moodRecord: 'memory'
}

export const OWNED_FIELDS: readonly OwnedField[] = ['mood', 'content', 'journalEntry', 'responseText', 'moodRecord']

export type Provenance = 'agent' | 'fallback'

export const TURN_PHASES = ['Created', 'EmotionPending', 'EmotionDone', 'Dispatched', 'Merging', 'Committed'] as const
export type TurnPhase = (typeof TURN_PHASES)[number]

export class TurnContextError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TurnContextError'
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

type Waiter = () => void

/**
 * Per-turn blackboard. Each owned field is written at most once, by its owner
 * or by the fallback agent after the owner failed. Nothing can be written once
 * the context is closed, so a stage abandoned at the deadline cannot leak a
 * late value into a committed turn.
 */
export class TurnContext {
  readonly turnId: string
  readonly sessionId: string
  readonly inputText: string
  readonly session: Readonly<SessionState>
  readonly startedAt: Date

  private readonly values: Partial<OwnedFields> = {}
  private readonly provenance = new Map<OwnedField, Provenance>()
  private readonly statuses: AgentStatusMap = {
    emotion: 'pending',
    curator: 'pending',
    journal: 'pending',
    support: 'pending',
    memory: 'pending',
    fallback: 'pending'
  }
  private readonly errorList: TurnError[] = []
  private readonly waiters = new Map<OwnedField, Set<Waiter>>()
  private currentPhase: TurnPhase = 'Created'
  private closed = false

  constructor(init: { turnId: string; sessionId: string; inputText: string; session: SessionState; now?: Date }) {
    this.turnId = init.turnId
    this.sessionId = init.sessionId
    this.inputText = init.inputText
    this.session = deepFreeze(structuredClone(init.session))
    this.startedAt = init.now ?? new Date()
  }

  get phase(): TurnPhase {
    return this.currentPhase
  }

  get isClosed() {
    return this.closed
  }

  /** Phases only move forward. */
  advance(phase: TurnPhase) {
    const from = TURN_PHASES.indexOf(this.currentPhase)
    const to = TURN_PHASES.indexOf(phase)
    if (to < from) {
      throw new TurnContextError(`Cannot move turn ${this.turnId} from ${this.currentPhase} back to ${phase}`)
    }
    this.currentPhase = phase
  }

  get<K extends OwnedField>(field: K): OwnedFields[K] | undefined {
    return this.values[field]
  }

  has(field: OwnedField): boolean {
    return this.values[field] !== undefined
  }

  provenanceOf(field: OwnedField): Provenance | undefined {
    return this.provenance.get(field)
  }

  write<K extends OwnedField>(writer: AgentName, field: K, value: OwnedFields[K]) {
    if (this.closed) {
      throw new TurnContextError(`Turn ${this.turnId} is closed; ${writer} cannot write ${field}`)
    }
    const owner = FIELD_OWNERS[field]
    if (writer === owner && this.statuses[owner] === 'error') {
      throw new TurnContextError(`${owner} already failed for turn ${this.turnId}; late write to ${field} rejected`)
    }
    if (writer !== owner) {
      if (writer !== 'fallback') {
        throw new TurnContextError(`${writer} does not own ${field}`)
      }
      if (this.statuses[owner] !== 'error') {
        throw new TurnContextError(`fallback cannot write ${field} while ${owner} has not failed`)
      }
    }
    if (this.values[field] !== undefined) {
      throw new TurnContextError(`${field} was already written for turn ${this.turnId}`)
    }
    this.values[field] = deepFreeze(structuredClone(value))
    this.provenance.set(field, writer === 'fallback' ? 'fallback' : 'agent')
    this.notify(field)
  }

  /**
   * Resolve with the field once written, or with undefined after `timeoutMs`,
   * when `signal` aborts or when the context closes.
   */
  waitFor<K extends OwnedField>(field: K, timeoutMs: number, signal?: AbortSignal): Promise<OwnedFields[K] | undefined> {
    const existing = this.values[field]
    if (existing !== undefined || this.closed || timeoutMs <= 0 || signal?.aborted) {
      return Promise.resolve(existing)
    }
    return new Promise((resolve) => {
      let waiters = this.waiters.get(field)
      if (!waiters) {
        waiters = new Set()
        this.waiters.set(field, waiters)
      }
      const set = waiters
      const done: Waiter = () => {
        clearTimeout(timer)
        set.delete(done)
        signal?.removeEventListener('abort', done)
        resolve(this.values[field])
      }
      const timer = setTimeout(done, timeoutMs)
      signal?.addEventListener('abort', done, { once: true })
      set.add(done)
    })
  }

  statusOf(agent: AgentName): AgentStatus {
    return this.statuses[agent]
  }

  setStatus(agent: AgentName, status: AgentStatus) {
    if (this.closed) return
    // An agent that already failed stays failed
    if (this.statuses[agent] === 'error' && status !== 'error') return
    this.statuses[agent] = status
  }

  agentStatuses(): AgentStatusMap {
    return { ...this.statuses }
  }

  recordError(agent: TurnError['agent'], kind: ErrorKind, message?: string) {
    if (this.closed) return
    this.errorList.push(message ? { agent, kind, message } : { agent, kind })
  }

  get errors(): TurnError[] {
    return this.errorList.map((e) => ({ ...e }))
  }

  /** Fields written by their owning agent rather than substituted. */
  producedByOwner(field: OwnedField): boolean {
    return this.provenance.get(field) === 'agent'
  }

  close() {
    if (this.closed) return
    this.closed = true
    for (const field of OWNED_FIELDS) this.notify(field)
  }

  private notify(field: OwnedField) {
    const waiters = this.waiters.get(field)
    if (!waiters) return
    this.waiters.delete(field)
    for (const waiter of [...waiters]) waiter()
  }
}

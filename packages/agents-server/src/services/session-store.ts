import {
  SessionStateSchema,
  emptySessionState,
  normalizeContentBundle,
  type JournalEntry,
  type SessionState
} from '@aura/shared'
import { KeyedMutex } from '../utils/concurrency'
import { InMemoryKeyValueStore, type KeyValueStore } from './kv-store'
import { errorMessage, getLogger } from './logger'

export type JournalPage = { limit?: number; skip?: number }

export interface SessionStateStore {
  /** Snapshot of the session; an unknown id reads as an empty state. */
  read(sessionId: string): Promise<SessionState>
  /** Read-modify-write in the session's critical section; rejects without writing when the stored record cannot be loaded. */
  update(sessionId: string, mutate: (state: SessionState) => SessionState): Promise<SessionState>
  reset(sessionId: string): Promise<void>
  /** Journal entries newest-first. */
  listJournal(sessionId: string, page?: JournalPage): Promise<JournalEntry[]>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Validate a persisted record, upgrading legacy content payloads on the way. */
export function parseSessionRecord(sessionId: string, raw: unknown): SessionState | null {
  if (!isRecord(raw)) return null
  const candidate = {
    ...raw,
    contentHistory: raw.contentHistory == null ? null : normalizeContentBundle(raw.contentHistory)
  }
  const parsed = SessionStateSchema.safeParse(candidate)
  if (!parsed.success || parsed.data.sessionId !== sessionId) return null
  return parsed.data
}

export function pageJournal(entries: readonly JournalEntry[], page: JournalPage = {}): JournalEntry[] {
  const skip = Math.max(0, Math.floor(page.skip ?? 0))
  const newestFirst = [...entries].reverse()
  const end = page.limit === undefined ? undefined : skip + Math.max(0, Math.floor(page.limit))
  return newestFirst.slice(skip, end)
}

/**
 * Write-through cache over a KeyValueStore. The cache is authoritative for
 * this process: a failed save is logged and the committed state is kept.
 */
export class CachedSessionStateStore implements SessionStateStore {
  private readonly cache = new Map<string, SessionState>()
  private readonly locks = new KeyedMutex()

  constructor(
    private readonly kv: KeyValueStore = new InMemoryKeyValueStore(),
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Rejects when the backend fails, so nothing is written over a record that could not be read. */
  private async load(sessionId: string): Promise<SessionState> {
    const cached = this.cache.get(sessionId)
    if (cached) return cached

    const raw = await this.kv.load(sessionId)
    if (raw === undefined) return emptySessionState(sessionId, this.now())

    const state = parseSessionRecord(sessionId, raw)
    if (!state) {
      getLogger().warn('session_record_invalid', { sessionId })
      return emptySessionState(sessionId, this.now())
    }
    this.cache.set(sessionId, state)
    return state
  }

  private async loadOrEmpty(sessionId: string): Promise<SessionState> {
    try {
      return await this.load(sessionId)
    } catch (err) {
      getLogger().warn('session_load_failed', { sessionId, error: errorMessage(err) })
      return emptySessionState(sessionId, this.now())
    }
  }

  async read(sessionId: string): Promise<SessionState> {
    return structuredClone(await this.loadOrEmpty(sessionId))
  }

  update(sessionId: string, mutate: (state: SessionState) => SessionState): Promise<SessionState> {
    return this.locks.runExclusive(sessionId, async () => {
      const current = await this.load(sessionId)
      const next = SessionStateSchema.parse(mutate(structuredClone(current)))
      this.cache.set(sessionId, next)
      try {
        await this.kv.save(sessionId, next)
      } catch (err) {
        getLogger().warn('session_persist_failed', { sessionId, error: errorMessage(err) })
      }
      return structuredClone(next)
    })
  }

  reset(sessionId: string): Promise<void> {
    return this.locks.runExclusive(sessionId, async () => {
      this.cache.delete(sessionId)
      try {
        await this.kv.delete(sessionId)
      } catch (err) {
        getLogger().warn('session_delete_failed', { sessionId, error: errorMessage(err) })
      }
    })
  }

  async listJournal(sessionId: string, page?: JournalPage): Promise<JournalEntry[]> {
    const state = await this.loadOrEmpty(sessionId)
    return structuredClone(pageJournal(state.journalEntries, page))
  }
}

import type { AgentLogEntry } from '@aura/shared'

function freeze(entry: AgentLogEntry): AgentLogEntry {
  const copy = structuredClone(entry)
  Object.freeze(copy.agents)
  copy.errors.forEach((e) => Object.freeze(e))
  Object.freeze(copy.errors)
  return Object.freeze(copy)
}

/** Append-only record of committed turns, one entry per turn. */
export class MessageLog {
  private readonly entries = new Map<string, AgentLogEntry[]>()

  append(entry: AgentLogEntry): AgentLogEntry {
    const frozen = freeze(entry)
    const list = this.entries.get(entry.sessionId) ?? []
    list.push(frozen)
    this.entries.set(entry.sessionId, list)
    return frozen
  }

  list(sessionId: string): AgentLogEntry[] {
    return [...(this.entries.get(sessionId) ?? [])]
  }

  // Chat messages carry the same turn id, so replay needs no timestamp matching
  findByTurn(turnId: string): AgentLogEntry | undefined {
    for (const list of this.entries.values()) {
      const match = list.find((e) => e.turnId === turnId)
      if (match) return match
    }
    return undefined
  }
}

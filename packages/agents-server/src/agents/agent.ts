import type { AgentName, ErrorKind } from '@aura/shared'
import type { Capabilities } from '../services/capabilities'
import type { TurnContext } from '../services/turn-context'
import type { EmotionAgent } from './emotion-analyzer'
import type { CuratorAgent } from './curator'
import type { JournalAgent } from './journal'
import type { SupportAgent } from './support'
import type { MemoryAgent } from './memory'

export type ScheduledAgentKind = Exclude<AgentName, 'fallback'>

/** Contract shared by every scheduled agent. */
export interface TurnAgent<K extends ScheduledAgentKind> {
  readonly kind: K
  readonly timeoutMs: number
  run(context: TurnContext, capabilities: Capabilities, signal: AbortSignal): Promise<void>
}

// Closed set; the coordinator wires each member into a fixed pipeline slot.
export type Agent = EmotionAgent | CuratorAgent | JournalAgent | SupportAgent | MemoryAgent

export type AgentSet = {
  emotion: EmotionAgent
  curator: CuratorAgent
  journal: JournalAgent
  support: SupportAgent
  memory: MemoryAgent
}

export class AgentFailure extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string
  ) {
    super(message)
    this.name = 'AgentFailure'
  }
}

export function toAgentFailure(err: unknown): AgentFailure {
  if (err instanceof AgentFailure) return err
  return new AgentFailure('Unknown', err instanceof Error ? err.message : String(err))
}

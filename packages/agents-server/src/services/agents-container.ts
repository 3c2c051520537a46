import { CuratorAgent } from '../agents/curator'
import { EmotionAgent } from '../agents/emotion-analyzer'
import { FallbackAgent } from '../agents/fallback'
import { JournalAgent } from '../agents/journal'
import { MemoryAgent } from '../agents/memory'
import { SupportAgent } from '../agents/support'
import type { AgentSet } from '../agents/agent'
import { createCapabilities, type Capabilities } from './capabilities'
import { getConfig, type AppConfig } from './config'
import { InMemoryKeyValueStore, JsonFileKeyValueStore, type KeyValueStore } from './kv-store'
import { getLogger } from './logger'
import { MessageLog } from './message-log'
import { createProvidersFromConfig } from './providers'
import { CachedSessionStateStore, type SessionStateStore } from './session-store'
import { TurnCoordinator } from './turn-coordinator'

export function createAgentSet(config: AppConfig, now?: () => Date): AgentSet {
  return {
    emotion: new EmotionAgent(config.EMOTION_TIMEOUT_MS),
    curator: new CuratorAgent(config.CURATOR_TIMEOUT_MS),
    journal: new JournalAgent(config.JOURNAL_TIMEOUT_MS, now),
    support: new SupportAgent(config.SUPPORT_TIMEOUT_MS, config.SUPPORT_CONTEXT_GRACE_MS),
    memory: new MemoryAgent(config.MEMORY_TIMEOUT_MS, now)
  }
}

export function createKeyValueStore(config: AppConfig): KeyValueStore {
  return config.SESSION_STORE === 'file'
    ? new JsonFileKeyValueStore(config.SESSION_STORE_DIR)
    : new InMemoryKeyValueStore()
}

export function createConfiguredCapabilities(config: AppConfig): Capabilities {
  return createCapabilities(createProvidersFromConfig(config), {
    classifierTimeoutMs: config.CLASSIFIER_TIMEOUT_MS,
    searchTimeoutMs: config.SEARCH_TIMEOUT_MS,
    textTimeoutMs: config.TEXT_TIMEOUT_MS,
    retries: config.CAPABILITY_RETRIES
  })
}

export type CoordinatorOverrides = {
  capabilities?: Capabilities
  store?: SessionStateStore
  log?: MessageLog
  agents?: AgentSet
  now?: () => Date
}

export function createCoordinator(config: AppConfig, overrides: CoordinatorOverrides = {}): TurnCoordinator {
  const capabilities = overrides.capabilities ?? createConfiguredCapabilities(config)
  return new TurnCoordinator(
    {
      agents: overrides.agents ?? createAgentSet(config, overrides.now),
      fallback: new FallbackAgent(overrides.now),
      capabilities,
      store: overrides.store ?? new CachedSessionStateStore(createKeyValueStore(config), overrides.now),
      log: overrides.log ?? new MessageLog()
    },
    {
      turnDeadlineMs: config.TURN_DEADLINE_MS,
      maxInputLength: config.MAX_INPUT_LENGTH,
      now: overrides.now
    }
  )
}

let cached: { coordinator: TurnCoordinator; capabilities: Capabilities } | null = null

function build() {
  const config = getConfig()
  const capabilities = createConfiguredCapabilities(config)
  const coordinator = createCoordinator(config, { capabilities })
  getLogger().info('coordinator_initialized', { store: config.SESSION_STORE, capabilities: capabilities.available() })
  return { coordinator, capabilities }
}

export function getCoordinator(): TurnCoordinator {
  if (!cached) cached = build()
  return cached.coordinator
}

export function getCapabilities(): Capabilities {
  if (!cached) cached = build()
  return cached.capabilities
}

/** Tests swap in a coordinator wired with fakes. */
export function setCoordinator(coordinator: TurnCoordinator, capabilities: Capabilities) {
  cached = { coordinator, capabilities }
}

export function resetCoordinator() {
  cached = null
}
